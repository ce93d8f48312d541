/**
 * Join Engine
 *
 * Runs the four passes in order. Each pass reads one table through its
 * own row source and depends on the indexes built before it:
 *
 *   files → cases → documents/attachments → documents into cases, notes
 */

import type { CaseExportObserver } from "../observability/types";
import { withRowSource, type RowSourceFactory } from "../sources/types";
import type { RawRow, TableName } from "../types";
import { buildCaseList } from "./case-list";
import { processDocumentRows } from "./documents";
import { buildFileIndex } from "./file-index";
import { attachDocumentsToCases, processNoteRows } from "./notes";
import {
  createJoinSession,
  type JoinDiagnostics,
  type JoinOptions,
  type JoinSession,
} from "./session";

export interface JoinContext {
  runId: string;
  now(): number;
  observer?: CaseExportObserver;
}

/**
 * Diagnostics that forward to the run's observer, tagged with its run id.
 */
export function observerDiagnostics(ctx: JoinContext): JoinDiagnostics {
  return {
    onOrphan: (meta) => ctx.observer?.onOrphan({ runId: ctx.runId, ...meta }),
    onDuplicateKey: (meta) => ctx.observer?.onDuplicateKey({ runId: ctx.runId, ...meta }),
  };
}

function runStep<T>(
  ctx: JoinContext,
  step: string,
  work: () => T,
  data: () => Record<string, unknown>
): T {
  const stepStart = ctx.now();
  ctx.observer?.onStepStart({ runId: ctx.runId, step });

  try {
    const result = work();
    ctx.observer?.onStepEnd({
      runId: ctx.runId,
      step,
      ok: true,
      durationMs: ctx.now() - stepStart,
      data: data(),
    });
    return result;
  } catch (error) {
    ctx.observer?.onStepEnd({
      runId: ctx.runId,
      step,
      ok: false,
      durationMs: ctx.now() - stepStart,
      data: { error: error instanceof Error ? error.message : String(error) },
    });
    throw error;
  }
}

function readTable(
  openSource: RowSourceFactory,
  table: TableName,
  pass: (rows: Iterable<RawRow>) => void
): void {
  withRowSource(openSource(table), pass);
}

export function joinCaseTables(
  openSource: RowSourceFactory,
  options: JoinOptions,
  ctx: JoinContext
): JoinSession {
  const session = createJoinSession(options, observerDiagnostics(ctx));
  const { stats } = session;

  runStep(
    ctx,
    "index_files",
    () => readTable(openSource, "files", (rows) => buildFileIndex(session, rows)),
    () => ({ fileRows: stats.fileRows })
  );

  runStep(
    ctx,
    "list_cases",
    () => readTable(openSource, "cases", (rows) => buildCaseList(session, rows)),
    () => ({ cases: stats.cases, duplicateCases: stats.duplicateCases })
  );

  runStep(
    ctx,
    "split_documents",
    () => readTable(openSource, "documents", (rows) => processDocumentRows(session, rows)),
    () => ({
      documentRows: stats.documentRows,
      documents: stats.documents,
      attachments: stats.attachments,
      orphanAttachments: stats.orphans.attachments,
    })
  );

  runStep(
    ctx,
    "attach_documents",
    () => attachDocumentsToCases(session),
    () => ({ orphanDocuments: stats.orphans.documents })
  );

  runStep(
    ctx,
    "attach_notes",
    () => readTable(openSource, "notes", (rows) => processNoteRows(session, rows)),
    () => ({ notes: stats.notes, orphanNotes: stats.orphans.notes })
  );

  ctx.observer?.increment("case_export_cases", stats.cases);
  ctx.observer?.increment("case_export_documents", stats.documents);
  ctx.observer?.increment("case_export_notes", stats.notes);

  return session;
}
