/**
 * Pass 3: split dokumentcdw rows into documents and attachments.
 *
 * A document id may appear on many rows, one per attachment. The first
 * row registers the document; every row with a non-empty attachment id
 * contributes one attachment to it.
 */

import { KEY_FIELDS } from "../constants";
import type { RawRow } from "../types";
import { appendToParent } from "./attach";
import { attachFiles, orphanReporter, type JoinSession } from "./session";

export interface SplitRow {
  document: RawRow;
  attachment: RawRow;
}

/**
 * Partition a row's fields into the attachment part and the document
 * part, keeping column order in both.
 */
export function splitDocumentRow(
  row: Record<string, string | null | undefined>,
  attachmentFields: readonly string[]
): SplitRow {
  const attachmentSet = new Set(attachmentFields);
  const document: RawRow = {};
  const attachment: RawRow = {};

  for (const [field, value] of Object.entries(row)) {
    const text = value ?? "";
    if (attachmentSet.has(field)) {
      attachment[field] = text;
    } else {
      document[field] = text;
    }
  }

  return { document, attachment };
}

export function processDocumentRows(session: JoinSession, rows: Iterable<RawRow>): void {
  const { listFields, attachmentFields } = session.options;

  for (const row of rows) {
    session.stats.documentRows++;
    const { document, attachment } = splitDocumentRow(row, attachmentFields);
    const documentId = document[KEY_FIELDS.documentId] ?? "";

    if (!session.documentIndex.has(documentId)) {
      attachFiles(session, "document", documentId, document);
      session.documents.push(document);
      session.documentIndex.set(documentId, session.documents.length - 1);
      session.stats.documents++;
    }

    const attachmentId = attachment[KEY_FIELDS.attachmentId] ?? "";
    if (attachmentId === "") continue;

    attachFiles(session, "attachment", attachmentId, attachment);
    const attached = appendToParent(
      session.documents,
      session.documentIndex,
      documentId,
      listFields.attachments,
      attachment,
      orphanReporter(session, "attachments")
    );
    if (attached) session.stats.attachments++;
  }
}
