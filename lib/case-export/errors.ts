/**
 * Fatal errors raised while exporting. Recoverable problems (orphaned
 * children, duplicate keys under the default policy) go to the observer
 * instead.
 */

export type CaseExportErrorCode =
  | "MISSING_INPUT"
  | "UNKNOWN_OWNER_KIND"
  | "DUPLICATE_CASE"
  | "LIST_FIELD_COLLISION"
  | "INVALID_CONFIG";

export class CaseExportError extends Error {
  constructor(
    message: string,
    public readonly code: CaseExportErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CaseExportError";
  }
}

export function isCaseExportError(error: unknown): error is CaseExportError {
  return error instanceof CaseExportError;
}
