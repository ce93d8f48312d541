/**
 * Case Export Configuration
 *
 * Reads CASE_EXPORT_* variables from the environment. The CLI loads
 * .env.local and .env with dotenv before calling in here.
 */

import { exportEnvSchema } from "./api/schemas";
import { DEFAULT_DELIMITER, DEFAULT_INDENT, DEFAULT_OUTPUT_FILE, LIST_FIELDS } from "./constants";
import { CaseExportError } from "./errors";
import type { DuplicateCasePolicy, ListFieldNames } from "./types";

export interface CaseExportConfig {
  outputFile: string;
  delimiter: string;
  duplicateCases: DuplicateCasePolicy;
  listFields: ListFieldNames;
  indent: number;
  asciiOnly: boolean;
}

export const DEFAULT_CONFIG: CaseExportConfig = {
  outputFile: DEFAULT_OUTPUT_FILE,
  delimiter: DEFAULT_DELIMITER,
  duplicateCases: "first",
  listFields: LIST_FIELDS.standard,
  indent: DEFAULT_INDENT,
  asciiOnly: true,
};

export function loadCaseExportConfig(
  env: Record<string, string | undefined> = process.env
): CaseExportConfig {
  const parsed = exportEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new CaseExportError(
      `Invalid configuration: ${problems.join("; ")}`,
      "INVALID_CONFIG",
      { problems }
    );
  }

  const values = parsed.data;
  return {
    outputFile: values.CASE_EXPORT_OUTPUT_FILE,
    delimiter: values.CASE_EXPORT_DELIMITER,
    duplicateCases: values.CASE_EXPORT_DUPLICATE_CASES,
    listFields: LIST_FIELDS[values.CASE_EXPORT_LIST_FIELDS],
    indent: values.CASE_EXPORT_INDENT,
    asciiOnly: values.CASE_EXPORT_ASCII_ONLY,
  };
}
