#!/usr/bin/env tsx
/**
 * Golden Case Export Runner
 *
 * Exports every golden fixture and checks the resulting tree.
 * Run with: npm run golden
 */

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  goldenExportCases,
  runGoldenCase,
  validateGoldenCase,
  type GoldenExportCase,
} from "../lib/case-export/golden/cases";

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
};

function runGoldenTests(): number {
  console.log(`\n${colors.blue}=== Case Export Golden Tests ===${colors.reset}\n`);

  const outputDir = mkdtempSync(join(tmpdir(), "case-golden-"));
  let passed = 0;
  let failed = 0;
  const allFailures: Array<{ case: GoldenExportCase; errors: string[] }> = [];

  try {
    for (const testCase of goldenExportCases) {
      console.log(`${colors.dim}Testing: ${testCase.name} (${testCase.id})${colors.reset}`);

      try {
        const run = runGoldenCase(testCase, outputDir);
        const result = validateGoldenCase(run, testCase);

        if (result.passed) {
          console.log(`  ${colors.green}✓ PASSED${colors.reset}`);
          passed++;
        } else {
          console.log(`  ${colors.red}✗ FAILED${colors.reset}`);
          result.failures.forEach((f) => {
            console.log(`    ${colors.red}- ${f}${colors.reset}`);
          });
          failed++;
          allFailures.push({ case: testCase, errors: result.failures });
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.log(`  ${colors.red}✗ ERROR: ${message}${colors.reset}`);
        failed++;
        allFailures.push({ case: testCase, errors: [message] });
      }
    }
  } finally {
    rmSync(outputDir, { recursive: true, force: true });
  }

  console.log(`\n${colors.blue}=== Summary ===${colors.reset}`);
  console.log(`  Total: ${passed + failed}`);
  console.log(`  ${colors.green}Passed: ${passed}${colors.reset}`);
  console.log(`  ${colors.red}Failed: ${failed}${colors.reset}`);

  if (allFailures.length > 0) {
    console.log(`\n${colors.yellow}=== Failure Details ===${colors.reset}`);
    for (const failure of allFailures) {
      console.log(`\n  ${failure.case.name} (${failure.case.id}):`);
      failure.errors.forEach((e) => {
        console.log(`    - ${e}`);
      });
    }
    return 1;
  }

  console.log(`\n${colors.green}All golden tests passed!${colors.reset}\n`);
  return 0;
}

process.exitCode = runGoldenTests();
