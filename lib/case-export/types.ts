/**
 * Case Export Types
 *
 * Core type definitions shared across the case export engine.
 */

import type { CaseExportErrorCode } from "./errors";

// ============================================================================
// Rows and Records
// ============================================================================

/** A CSV row as read from a source table: header name → cell text. */
export type RawRow = Record<string, string>;

export type FieldValue = string | RecordNode[];

/**
 * A record in the output tree. Starts life as a RawRow and may gain
 * child-list fields while the tables are joined.
 */
export interface RecordNode {
  [field: string]: FieldValue;
}

export type FileRecord = RawRow;
export type CaseRecord = RecordNode;
export type DocumentRecord = RecordNode;
export type NoteRecord = RecordNode;

// ============================================================================
// Tables
// ============================================================================

export type TableName = "files" | "cases" | "documents" | "notes";

/** Tables whose rows are attached to a parent record. */
export type ChildTable = "documents" | "attachments" | "notes";

export type OwnerKind = "document" | "attachment" | "note";

// ============================================================================
// Output Shape
// ============================================================================

export type ListFieldRole = "files" | "attachments" | "documents" | "notes";

export type ListFieldNames = Record<ListFieldRole, string>;

export type ListFieldNaming = "standard" | "legacy";

export type DuplicateCasePolicy = "first" | "last" | "reject";

// ============================================================================
// Run Statistics
// ============================================================================

export interface JoinStats {
  fileRows: number;
  cases: number;
  duplicateCases: number;
  documentRows: number;
  documents: number;
  attachments: number;
  notes: number;
  orphans: Record<ChildTable, number>;
}

// ============================================================================
// Export Result
// ============================================================================

export type ExportStatus = "SUCCESS" | "FAILED";

export interface CaseExportResult {
  runId: string;
  status: ExportStatus;
  outputPath?: string;
  stats?: JoinStats;
  error?: string;
  errorCode?: CaseExportErrorCode;
}
