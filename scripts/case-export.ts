#!/usr/bin/env tsx
/**
 * Case Export CLI
 *
 * Joins the CSV exports in a directory into <dir>/cirius.json.
 *
 * Usage:
 *   npm run export -- <input-dir>
 *
 * Settings come from CASE_EXPORT_* environment variables, optionally
 * kept in .env.local or .env.
 */

import { config } from "dotenv";
// Load .env.local first, then .env as fallback
config({ path: ".env.local" });
config();

import { resolve } from "path";
import { cliArgsSchema } from "../lib/case-export/api/schemas";
import { loadCaseExportConfig, type CaseExportConfig } from "../lib/case-export/config";
import { runCaseExport } from "../lib/case-export/ingestion";

function main(): number {
  const args = cliArgsSchema.safeParse(process.argv.slice(2));
  if (!args.success) {
    console.error("Usage: case-export <input-dir>");
    console.error(args.error.issues.map((issue) => `  ${issue.message}`).join("\n"));
    return 2;
  }

  const [inputDir] = args.data;

  let exportConfig: CaseExportConfig;
  try {
    exportConfig = loadCaseExportConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  const result = runCaseExport({
    inputDir: resolve(inputDir),
    config: exportConfig,
  });

  if (result.status !== "SUCCESS") {
    console.error(`Case export failed: ${result.error}`);
    return 1;
  }

  return 0;
}

process.exitCode = main();
