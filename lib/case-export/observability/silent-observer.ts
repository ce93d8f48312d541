/**
 * Observer that drops every event. Used where the caller reports
 * results itself, such as the golden runner.
 */

import type { CaseExportObserver } from "./types";

export function createSilentObserver(): CaseExportObserver {
  const ignore = (): void => undefined;
  return {
    onRunStart: ignore,
    onStepStart: ignore,
    onStepEnd: ignore,
    onRunEnd: ignore,
    onOrphan: ignore,
    onDuplicateKey: ignore,
    increment: ignore,
    timing: ignore,
  };
}
