/**
 * CSV Row Source
 *
 * Reads one delimiter-separated export with csv-parse. Field text is kept
 * exactly as written, including line breaks inside quoted fields.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parse } from "csv-parse/sync";
import { INPUT_FILES } from "../constants";
import { CaseExportError } from "../errors";
import type { RawRow, TableName } from "../types";
import type { RowSource, RowSourceFactory } from "./types";

export interface CsvRowSourceOptions {
  delimiter: string;
}

export class CsvRowSource implements RowSource {
  readonly name: string;
  private header: string[] = [];
  private records: unknown[] | null;

  constructor(path: string, options: CsvRowSourceOptions) {
    this.name = path;

    const parsed: unknown = parse(readFileSync(path, "utf-8"), {
      delimiter: options.delimiter,
      quote: '"',
      bom: true,
      columns: (header: string[]) => {
        this.header = header;
        return header;
      },
      relax_column_count: true,
      skip_empty_lines: true,
    });
    this.records = Array.isArray(parsed) ? parsed : [];
  }

  *rows(): Iterable<RawRow> {
    if (!this.records) return;

    for (const record of this.records) {
      if (isFieldMap(record)) {
        yield toRawRow(this.header, record);
      }
    }
  }

  close(): void {
    this.records = null;
  }
}

function isFieldMap(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Short rows are padded with "" so every row carries every header field. */
function toRawRow(header: string[], record: Record<string, unknown>): RawRow {
  const row: RawRow = {};
  for (const field of header) {
    const value = record[field];
    row[field] = typeof value === "string" ? value : "";
  }
  return row;
}

// ============================================================================
// Input Directory
// ============================================================================

export function resolveInputPaths(inputDir: string): Record<TableName, string> {
  return {
    files: join(inputDir, INPUT_FILES.files),
    cases: join(inputDir, INPUT_FILES.cases),
    documents: join(inputDir, INPUT_FILES.documents),
    notes: join(inputDir, INPUT_FILES.notes),
  };
}

/**
 * Throws MISSING_INPUT naming every required file that is absent.
 */
export function assertInputsPresent(inputDir: string): Record<TableName, string> {
  const paths = resolveInputPaths(inputDir);
  const missing = Object.values(paths).filter((path) => !existsSync(path));

  if (missing.length > 0) {
    throw new CaseExportError(
      `Required .csv files were not found in ${inputDir}: ${missing.join(", ")}`,
      "MISSING_INPUT",
      { inputDir, missing }
    );
  }

  return paths;
}

/**
 * Checks the directory up front, then opens each table on demand.
 */
export function createCsvSourceFactory(
  inputDir: string,
  options: CsvRowSourceOptions
): RowSourceFactory {
  const paths = assertInputsPresent(inputDir);
  return (table) => new CsvRowSource(paths[table], options);
}
