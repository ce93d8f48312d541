/**
 * Pass 2: the root case sequence and its key index.
 *
 * Every row lands in the sequence. When a case number repeats, the
 * configured policy decides which row the index points at; the duplicate
 * is reported either way.
 */

import { KEY_FIELDS } from "../constants";
import { CaseExportError } from "../errors";
import type { RawRow } from "../types";
import type { JoinSession } from "./session";

export function buildCaseList(session: JoinSession, rows: Iterable<RawRow>): void {
  const policy = session.options.duplicateCases;

  for (const row of rows) {
    const caseNumber = row[KEY_FIELDS.caseNumber] ?? "";

    if (session.caseIndex.has(caseNumber)) {
      if (policy === "reject") {
        throw new CaseExportError(
          `Duplicate case number ${caseNumber} in case table`,
          "DUPLICATE_CASE",
          { caseNumber }
        );
      }

      session.stats.duplicateCases++;
      session.diagnostics.onDuplicateKey({ table: "cases", key: caseNumber, policy });
      session.cases.push(row);

      if (policy === "last") {
        session.caseIndex.set(caseNumber, session.cases.length - 1);
      }
    } else {
      session.cases.push(row);
      session.caseIndex.set(caseNumber, session.cases.length - 1);
    }

    session.stats.cases++;
  }
}
