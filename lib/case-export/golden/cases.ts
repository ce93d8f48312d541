/**
 * Golden Case Export Fixtures
 *
 * Each case is a directory of small CSV exports with the outcome the
 * export must produce. Used by the unit tests and by scripts/case-golden.ts.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import type { CaseExportConfig } from "../config";
import { LIST_FIELDS } from "../constants";
import type { CaseExportErrorCode } from "../errors";
import { runCaseExport } from "../ingestion/pipeline";
import { createSilentObserver } from "../observability";
import type { CaseExportResult, ChildTable, ListFieldNaming, RecordNode } from "../types";

export const GOLDEN_FIXTURES_DIR = fileURLToPath(new URL("./fixtures", import.meta.url));

export interface GoldenExportCase {
  id: string;
  name: string;
  fixtureDir: string;
  listFields?: ListFieldNaming;
  expect: {
    status: CaseExportResult["status"];
    errorCode?: CaseExportErrorCode;
    caseOrder?: string[];
    /** case number → document ids, in output order */
    documentsByCase?: Record<string, string[]>;
    /** case number → note ids, in output order */
    notesByCase?: Record<string, string[]>;
    /** document id → attachment ids, in output order */
    attachmentsByDocument?: Record<string, string[]>;
    fileRows?: number;
    orphans?: Partial<Record<ChildTable, number>>;
  };
}

export const goldenExportCases: GoldenExportCase[] = [
  {
    id: "basic",
    name: "Documents, attachments, notes and orphans",
    fixtureDir: "basic",
    expect: {
      status: "SUCCESS",
      caseOrder: ["S-100", "S-200", "S-300"],
      documentsByCase: {
        "S-100": ["D2", "D4"],
        "S-200": ["D1"],
        "S-300": [],
      },
      notesByCase: {
        "S-100": ["N1"],
        "S-200": [],
        "S-300": ["N2"],
      },
      attachmentsByDocument: {
        D1: [],
        D2: ["C1", "C2"],
        D4: [],
      },
      fileRows: 5,
      orphans: { documents: 1, attachments: 0, notes: 1 },
    },
  },
  {
    id: "legacy-naming",
    name: "Legacy list field names",
    fixtureDir: "legacy",
    listFields: "legacy",
    expect: {
      status: "SUCCESS",
      caseOrder: ["S-1"],
      documentsByCase: { "S-1": ["D10"] },
      notesByCase: { "S-1": ["N10"] },
      attachmentsByDocument: { D10: ["C10"] },
      fileRows: 1,
      orphans: { documents: 0, attachments: 0, notes: 0 },
    },
  },
  {
    id: "missing-notes",
    name: "Missing notat.csv aborts the run",
    fixtureDir: "missing-notes",
    expect: {
      status: "FAILED",
      errorCode: "MISSING_INPUT",
    },
  },
];

export interface GoldenRun {
  result: CaseExportResult;
  tree: RecordNode[] | null;
}

/**
 * Export a golden fixture into `outputDir` and read the tree back.
 */
export function runGoldenCase(testCase: GoldenExportCase, outputDir: string): GoldenRun {
  const config: Partial<CaseExportConfig> = {
    listFields: LIST_FIELDS[testCase.listFields ?? "standard"],
  };
  const outputPath = join(outputDir, `${testCase.id}.json`);

  const result = runCaseExport({
    inputDir: join(GOLDEN_FIXTURES_DIR, testCase.fixtureDir),
    outputPath,
    config,
    observer: createSilentObserver(),
  });

  const tree =
    result.status === "SUCCESS" && existsSync(outputPath)
      ? parseTree(readFileSync(outputPath, "utf-8"))
      : null;

  return { result, tree };
}

function parseTree(text: string): RecordNode[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw new Error("Export output is not a JSON array");
  }
  return parsed.filter(isRecordNode);
}

function isRecordNode(value: unknown): value is RecordNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Validation
// ============================================================================

function childList(record: RecordNode, field: string): RecordNode[] {
  const value = record[field];
  return Array.isArray(value) ? value : [];
}

function ids(records: RecordNode[], field: string): string[] {
  return records.map((record) => {
    const value = record[field];
    return typeof value === "string" ? value : "";
  });
}

function sameList(actual: string[], expected: string[]): boolean {
  return actual.length === expected.length && actual.every((value, i) => value === expected[i]);
}

export function validateGoldenCase(
  run: GoldenRun,
  testCase: GoldenExportCase
): { passed: boolean; failures: string[] } {
  const failures: string[] = [];
  const expected = testCase.expect;
  const { result, tree } = run;
  const names = LIST_FIELDS[testCase.listFields ?? "standard"];

  if (result.status !== expected.status) {
    failures.push(`status: expected ${expected.status}, got ${result.status} (${result.error ?? "no error"})`);
  }

  if (expected.errorCode !== undefined && result.errorCode !== expected.errorCode) {
    failures.push(`errorCode: expected ${expected.errorCode}, got ${result.errorCode}`);
  }

  if (expected.status === "FAILED") {
    return { passed: failures.length === 0, failures };
  }

  if (!tree) {
    failures.push("output: no case tree was written");
    return { passed: false, failures };
  }

  const caseNumbers = ids(tree, "SagsNr");
  if (expected.caseOrder && !sameList(caseNumbers, expected.caseOrder)) {
    failures.push(
      `caseOrder: expected [${expected.caseOrder.join(", ")}], got [${caseNumbers.join(", ")}]`
    );
  }

  for (const [caseNumber, documentIds] of Object.entries(expected.documentsByCase ?? {})) {
    const found = tree.find((record) => record.SagsNr === caseNumber);
    const actual = found ? ids(childList(found, names.documents), "dokument_id") : [];
    if (!sameList(actual, documentIds)) {
      failures.push(
        `documents of ${caseNumber}: expected [${documentIds.join(", ")}], got [${actual.join(", ")}]`
      );
    }
  }

  for (const [caseNumber, noteIds] of Object.entries(expected.notesByCase ?? {})) {
    const found = tree.find((record) => record.SagsNr === caseNumber);
    const actual = found ? ids(childList(found, names.notes), "notat_id") : [];
    if (!sameList(actual, noteIds)) {
      failures.push(`notes of ${caseNumber}: expected [${noteIds.join(", ")}], got [${actual.join(", ")}]`);
    }
  }

  const documents = tree.flatMap((record) => childList(record, names.documents));
  for (const [documentId, attachmentIds] of Object.entries(expected.attachmentsByDocument ?? {})) {
    const found = documents.find((record) => record.dokument_id === documentId);
    const actual = found ? ids(childList(found, names.attachments), "cdw_id") : [];
    if (!sameList(actual, attachmentIds)) {
      failures.push(
        `attachments of ${documentId}: expected [${attachmentIds.join(", ")}], got [${actual.join(", ")}]`
      );
    }
  }

  if (expected.fileRows !== undefined && result.stats?.fileRows !== expected.fileRows) {
    failures.push(`fileRows: expected ${expected.fileRows}, got ${result.stats?.fileRows}`);
  }

  const orphanTables: ChildTable[] = ["documents", "attachments", "notes"];
  for (const table of orphanTables) {
    const count = expected.orphans?.[table];
    if (count === undefined) continue;
    const actual = result.stats?.orphans[table];
    if (actual !== count) {
      failures.push(`orphans.${table}: expected ${count}, got ${actual}`);
    }
  }

  return {
    passed: failures.length === 0,
    failures,
  };
}
