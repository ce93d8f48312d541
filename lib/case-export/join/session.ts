/**
 * Join Session
 *
 * Owns every index and output sequence for one export run. Each pass
 * receives the session explicitly; nothing is held at module level.
 */

import type {
  CaseRecord,
  ChildTable,
  DocumentRecord,
  DuplicateCasePolicy,
  FileRecord,
  JoinStats,
  ListFieldNames,
  NoteRecord,
  OwnerKind,
  RecordNode,
} from "../types";
import { CaseExportError } from "../errors";
import type { OrphanReporter } from "./attach";

export type FileIndex = Record<OwnerKind, Map<string, FileRecord[]>>;

export interface JoinOptions {
  listFields: ListFieldNames;
  duplicateCases: DuplicateCasePolicy;
  attachmentFields: readonly string[];
}

/**
 * Where recoverable problems are reported.
 */
export interface JoinDiagnostics {
  onOrphan(meta: {
    table: ChildTable;
    key: string;
    listField: string;
    record: RecordNode;
  }): void;
  onDuplicateKey(meta: {
    table: "cases";
    key: string;
    policy: DuplicateCasePolicy;
  }): void;
}

export interface JoinSession {
  options: JoinOptions;
  diagnostics: JoinDiagnostics;

  fileIndex: FileIndex;

  cases: CaseRecord[];
  caseIndex: Map<string, number>;

  documents: DocumentRecord[];
  documentIndex: Map<string, number>;

  notes: NoteRecord[];

  stats: JoinStats;
}

export function createJoinSession(
  options: JoinOptions,
  diagnostics: JoinDiagnostics
): JoinSession {
  return {
    options,
    diagnostics,
    fileIndex: {
      document: new Map(),
      attachment: new Map(),
      note: new Map(),
    },
    cases: [],
    caseIndex: new Map(),
    documents: [],
    documentIndex: new Map(),
    notes: [],
    stats: {
      fileRows: 0,
      cases: 0,
      duplicateCases: 0,
      documentRows: 0,
      documents: 0,
      attachments: 0,
      notes: 0,
      orphans: { documents: 0, attachments: 0, notes: 0 },
    },
  };
}

/**
 * Copy the files owned by (kind, id) onto `record`, if there are any.
 * Records without files get no field at all.
 */
export function attachFiles(
  session: JoinSession,
  kind: OwnerKind,
  id: string,
  record: RecordNode
): void {
  const files = session.fileIndex[kind].get(id);
  if (!files || files.length === 0) return;

  const field = session.options.listFields.files;
  if (record[field] !== undefined) {
    throw new CaseExportError(
      `Record ${id} already has a column named "${field}"; cannot attach its files under that name`,
      "LIST_FIELD_COLLISION",
      { key: id, listField: field }
    );
  }
  record[field] = [...files];
}

/** Read a join column, treating a missing or list value as empty. */
export function keyOf(record: RecordNode, field: string): string {
  const value = record[field];
  return typeof value === "string" ? value : "";
}

/**
 * Orphan callback for appendToParent that counts the orphan and passes it
 * on to the session's diagnostics.
 */
export function orphanReporter(session: JoinSession, table: ChildTable): OrphanReporter {
  return ({ key, listField, child }) => {
    session.stats.orphans[table]++;
    session.diagnostics.onOrphan({ table, key, listField, record: child });
  };
}
