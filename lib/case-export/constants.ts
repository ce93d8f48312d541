/**
 * Case Export Constants
 *
 * Input file names and the column names the joins depend on.
 * All other columns pass through untouched.
 */

import type { ListFieldNames, ListFieldNaming, OwnerKind, TableName } from "./types";

export const INPUT_FILES: Record<TableName, string> = {
  files: "fil.csv",
  cases: "sag.csv",
  documents: "dokumentcdw.csv",
  notes: "notat.csv",
};

export const DEFAULT_OUTPUT_FILE = "cirius.json";
export const DEFAULT_DELIMITER = ";";
export const DEFAULT_INDENT = 4;

export const KEY_FIELDS = {
  fileOwnerKind: "notes_template_name",
  fileOwnerId: "notes_template_id",
  caseNumber: "SagsNr",
  documentId: "dokument_id",
  attachmentId: "cdw_id",
  noteId: "notat_id",
} as const;

/** Discriminator values used in fil.csv. */
export const OWNER_KIND_BY_DISCRIMINATOR: ReadonlyMap<string, OwnerKind> = new Map([
  ["dokument", "document"],
  ["cdw", "attachment"],
  ["notat", "note"],
]);

/** Columns of dokumentcdw.csv that belong to the attachment part of a row. */
export const ATTACHMENT_FIELDS: readonly string[] = [
  "cdw_id",
  "cdwDocumentUniqueID",
  "cdwCreatedDate",
  "From1",
  "PostedDate",
  "SendTo",
  "CopyTo",
  "BlindCopyTo",
  "Subject",
  "cdwBody",
];

export const LIST_FIELDS: Record<ListFieldNaming, ListFieldNames> = {
  standard: {
    files: "files",
    attachments: "attachments",
    documents: "documents",
    notes: "notes",
  },
  legacy: {
    files: "filListe",
    attachments: "cdwListe",
    documents: "dokumentListe",
    notes: "notatListe",
  },
};
