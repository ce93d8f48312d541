/**
 * Case Export Observability Types
 */

import type { ChildTable, DuplicateCasePolicy, RecordNode } from "../types";

export interface CaseExportObserver {
  onRunStart(meta: { runId: string; inputDir: string }): void;
  onStepStart(meta: { runId: string; step: string }): void;
  onStepEnd(meta: {
    runId: string;
    step: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }): void;
  onRunEnd(meta: {
    runId: string;
    ok: boolean;
    durationMs: number;
    error?: string;
  }): void;
  onOrphan(meta: {
    runId: string;
    table: ChildTable;
    key: string;
    listField: string;
    record: RecordNode;
  }): void;
  onDuplicateKey(meta: {
    runId: string;
    table: "cases";
    key: string;
    policy: DuplicateCasePolicy;
  }): void;
  increment(name: string, by?: number, tags?: Record<string, string>): void;
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

export interface ObserverMetrics {
  counters: Record<string, number>;
  timings: Record<string, number[]>;
  steps: Array<{
    step: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }>;
}
