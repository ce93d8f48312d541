/**
 * Case Export Pipeline
 *
 * Orchestrates one export run:
 * check inputs → join the four tables → serialize → write
 *
 * The output file is only written once the whole tree has been built.
 */

import { randomUUID } from "crypto";
import { join } from "path";
import { DEFAULT_CONFIG, type CaseExportConfig } from "../config";
import { ATTACHMENT_FIELDS } from "../constants";
import { isCaseExportError } from "../errors";
import { joinCaseTables, type JoinContext } from "../join/engine";
import { createConsoleObserver, type CaseExportObserver } from "../observability";
import { writeCaseTree } from "../output/serialize";
import { createCsvSourceFactory } from "../sources/csv-source";
import type { RowSourceFactory } from "../sources/types";
import type { CaseExportResult } from "../types";

// ============================================================================
// Pipeline Configuration
// ============================================================================

export interface CaseExportRequest {
  inputDir: string;
  config?: Partial<CaseExportConfig>;
  /** Defaults to <inputDir>/<config.outputFile> */
  outputPath?: string;
  observer?: CaseExportObserver;
  /** Replaces the CSV files in inputDir as the row source */
  openSource?: RowSourceFactory;
}

// ============================================================================
// Main Pipeline Function
// ============================================================================

export function runCaseExport(request: CaseExportRequest): CaseExportResult {
  const runId = randomUUID();
  const observer = request.observer || createConsoleObserver();
  const config: CaseExportConfig = { ...DEFAULT_CONFIG, ...request.config };
  const runStart = Date.now();

  observer.onRunStart({ runId, inputDir: request.inputDir });

  try {
    const openSource =
      request.openSource ??
      createCsvSourceFactory(request.inputDir, { delimiter: config.delimiter });

    const ctx: JoinContext = {
      runId,
      now: () => Date.now(),
      observer,
    };

    const session = joinCaseTables(
      openSource,
      {
        listFields: config.listFields,
        duplicateCases: config.duplicateCases,
        attachmentFields: ATTACHMENT_FIELDS,
      },
      ctx
    );

    const outputPath = request.outputPath ?? join(request.inputDir, config.outputFile);
    const writeStart = Date.now();
    writeCaseTree(outputPath, session.cases, {
      indent: config.indent,
      asciiOnly: config.asciiOnly,
    });
    observer.timing("case_export_write_ms", Date.now() - writeStart);

    observer.onRunEnd({
      runId,
      ok: true,
      durationMs: Date.now() - runStart,
    });

    return {
      runId,
      status: "SUCCESS",
      outputPath,
      stats: session.stats,
    };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);

    observer.onRunEnd({
      runId,
      ok: false,
      durationMs: Date.now() - runStart,
      error,
    });

    return {
      runId,
      status: "FAILED",
      error,
      errorCode: isCaseExportError(err) ? err.code : undefined,
    };
  }
}
