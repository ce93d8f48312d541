/**
 * JSON output for the finished case tree.
 */

import { writeFileSync } from "fs";
import { DEFAULT_INDENT } from "../constants";
import type { CaseRecord } from "../types";

export interface SerializeOptions {
  indent?: number;
  /** Write non-ASCII characters as \uXXXX escapes */
  asciiOnly?: boolean;
}

export function serializeCases(cases: readonly CaseRecord[], options: SerializeOptions = {}): string {
  const json = JSON.stringify(cases, null, options.indent ?? DEFAULT_INDENT);
  return options.asciiOnly === false ? json : escapeNonAscii(json);
}

/**
 * Characters outside printable ASCII only occur inside JSON strings, so escaping them
 * in the rendered text yields the same document.
 */
export function escapeNonAscii(json: string): string {
  return json.replace(
    /[\u007f-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`
  );
}

export function writeCaseTree(
  outputPath: string,
  cases: readonly CaseRecord[],
  options: SerializeOptions = {}
): void {
  writeFileSync(outputPath, serializeCases(cases, options), "utf-8");
}
