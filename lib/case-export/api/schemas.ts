/**
 * Input Schemas for the Case Export
 */

import { z } from "zod";
import {
  DEFAULT_DELIMITER,
  DEFAULT_INDENT,
  DEFAULT_OUTPUT_FILE,
} from "../constants";

// ============================================================================
// CLI Arguments
// ============================================================================

export const cliArgsSchema = z.tuple([
  z.string().trim().min(1, "Input directory is required"),
]);

export type CliArgs = z.infer<typeof cliArgsSchema>;

// ============================================================================
// Environment
// ============================================================================

export const exportEnvSchema = z.object({
  CASE_EXPORT_OUTPUT_FILE: z
    .string()
    .min(1, "Output file name must not be empty")
    .refine((name) => !/[\\/]/.test(name), {
      message: "Output file name must not contain a path separator",
    })
    .default(DEFAULT_OUTPUT_FILE),
  CASE_EXPORT_DELIMITER: z
    .string()
    .length(1, "Delimiter must be a single character")
    .default(DEFAULT_DELIMITER),
  CASE_EXPORT_DUPLICATE_CASES: z.enum(["first", "last", "reject"]).default("first"),
  CASE_EXPORT_LIST_FIELDS: z.enum(["standard", "legacy"]).default("standard"),
  CASE_EXPORT_INDENT: z.coerce.number().int().min(0).max(10).default(DEFAULT_INDENT),
  CASE_EXPORT_ASCII_ONLY: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

export type ExportEnv = z.infer<typeof exportEnvSchema>;
