/**
 * Pass 4: hang documents and notes under their cases.
 */

import { KEY_FIELDS } from "../constants";
import type { NoteRecord, RawRow } from "../types";
import { appendToParent } from "./attach";
import { attachFiles, keyOf, orphanReporter, type JoinSession } from "./session";

export function attachDocumentsToCases(session: JoinSession): void {
  const onOrphan = orphanReporter(session, "documents");

  for (const document of session.documents) {
    appendToParent(
      session.cases,
      session.caseIndex,
      keyOf(document, KEY_FIELDS.caseNumber),
      session.options.listFields.documents,
      document,
      onOrphan
    );
  }
}

export function processNoteRows(session: JoinSession, rows: Iterable<RawRow>): void {
  const onOrphan = orphanReporter(session, "notes");

  for (const row of rows) {
    const note: NoteRecord = row;
    attachFiles(session, "note", row[KEY_FIELDS.noteId] ?? "", note);
    session.notes.push(note);
    session.stats.notes++;

    appendToParent(
      session.cases,
      session.caseIndex,
      row[KEY_FIELDS.caseNumber] ?? "",
      session.options.listFields.notes,
      note,
      onOrphan
    );
  }
}
