/**
 * Parent-Attach Helper
 *
 * The one join primitive: case → document, case → note and
 * document → attachment all go through appendToParent.
 */

import { CaseExportError } from "../errors";
import type { RecordNode } from "../types";

export interface OrphanReport {
  key: string;
  listField: string;
  child: RecordNode;
}

export type OrphanReporter = (report: OrphanReport) => void;

/**
 * Append `child` to the `listField` list of the parent registered under
 * `key`, creating the list on first use.
 *
 * An unknown key is not an error: the orphan is reported and nothing is
 * mutated. Returns whether the child was attached.
 */
export function appendToParent(
  parents: RecordNode[],
  index: ReadonlyMap<string, number>,
  key: string,
  listField: string,
  child: RecordNode,
  onOrphan: OrphanReporter
): boolean {
  const position = index.get(key);
  if (position === undefined) {
    onOrphan({ key, listField, child });
    return false;
  }

  const parent = parents[position];
  const existing = parent[listField];

  if (existing === undefined) {
    parent[listField] = [child];
    return true;
  }

  if (typeof existing === "string") {
    throw new CaseExportError(
      `Parent ${key} already has a column named "${listField}"; cannot attach a child list under that name`,
      "LIST_FIELD_COLLISION",
      { key, listField }
    );
  }

  existing.push(child);
  return true;
}
