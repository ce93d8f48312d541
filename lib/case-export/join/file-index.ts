/**
 * Pass 1: group file rows by the record that owns them.
 */

import { KEY_FIELDS, OWNER_KIND_BY_DISCRIMINATOR } from "../constants";
import { CaseExportError } from "../errors";
import type { OwnerKind, RawRow } from "../types";
import type { JoinSession } from "./session";

/**
 * Map a fil.csv discriminator to an owner kind. Anything unrecognized
 * means the export no longer has the layout we expect, so it is fatal.
 */
export function resolveOwnerKind(discriminator: string, rowNumber: number): OwnerKind {
  const kind = OWNER_KIND_BY_DISCRIMINATOR.get(discriminator);
  if (!kind) {
    throw new CaseExportError(
      `Unrecognized file owner kind "${discriminator}" in file row ${rowNumber}`,
      "UNKNOWN_OWNER_KIND",
      { discriminator, rowNumber }
    );
  }
  return kind;
}

export function buildFileIndex(session: JoinSession, rows: Iterable<RawRow>): void {
  let rowNumber = 0;

  for (const row of rows) {
    rowNumber++;
    const kind = resolveOwnerKind(row[KEY_FIELDS.fileOwnerKind] ?? "", rowNumber);
    const ownerId = row[KEY_FIELDS.fileOwnerId] ?? "";

    const byOwner = session.fileIndex[kind];
    let files = byOwner.get(ownerId);
    if (!files) {
      files = [];
      byOwner.set(ownerId, files);
    }
    files.push(row);
    session.stats.fileRows++;
  }
}
