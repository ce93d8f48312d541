/**
 * Console Observer
 *
 * Default observer. Writes one JSON object per event so a run can be
 * grepped or piped into a log collector.
 */

import type { CaseExportObserver, ObserverMetrics } from "./types";
import type { ChildTable, DuplicateCasePolicy, RecordNode } from "../types";

export class ConsoleObserver implements CaseExportObserver {
  private metrics: ObserverMetrics = {
    counters: {},
    timings: {},
    steps: [],
  };

  onRunStart(meta: { runId: string; inputDir: string }): void {
    console.log(
      JSON.stringify({
        event: "case_export_run_start",
        runId: meta.runId,
        inputDir: meta.inputDir,
        timestamp: new Date().toISOString(),
      })
    );
  }

  onStepStart(meta: { runId: string; step: string }): void {
    console.log(
      JSON.stringify({
        event: "case_export_step_start",
        runId: meta.runId,
        step: meta.step,
        timestamp: new Date().toISOString(),
      })
    );
  }

  onStepEnd(meta: {
    runId: string;
    step: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }): void {
    this.metrics.steps.push({
      step: meta.step,
      ok: meta.ok,
      durationMs: meta.durationMs,
      data: meta.data,
    });
    this.timing("case_export_step_ms", meta.durationMs, { step: meta.step });

    console.log(
      JSON.stringify({
        event: "case_export_step_end",
        runId: meta.runId,
        step: meta.step,
        ok: meta.ok,
        durationMs: meta.durationMs,
        data: meta.data,
        timestamp: new Date().toISOString(),
      })
    );
  }

  onRunEnd(meta: {
    runId: string;
    ok: boolean;
    durationMs: number;
    error?: string;
  }): void {
    console.log(
      JSON.stringify({
        event: "case_export_run_end",
        runId: meta.runId,
        ok: meta.ok,
        durationMs: meta.durationMs,
        error: meta.error,
        metrics: this.metrics,
        timestamp: new Date().toISOString(),
      })
    );
  }

  onOrphan(meta: {
    runId: string;
    table: ChildTable;
    key: string;
    listField: string;
    record: RecordNode;
  }): void {
    this.increment("case_export_orphans", 1, { table: meta.table });

    console.warn(
      JSON.stringify({
        event: "case_export_orphan",
        runId: meta.runId,
        table: meta.table,
        message: `No parent found for key ${meta.key}`,
        key: meta.key,
        listField: meta.listField,
        record: meta.record,
        timestamp: new Date().toISOString(),
      })
    );
  }

  onDuplicateKey(meta: {
    runId: string;
    table: "cases";
    key: string;
    policy: DuplicateCasePolicy;
  }): void {
    this.increment("case_export_duplicate_keys", 1, { table: meta.table });

    console.warn(
      JSON.stringify({
        event: "case_export_duplicate_key",
        runId: meta.runId,
        table: meta.table,
        key: meta.key,
        policy: meta.policy,
        timestamp: new Date().toISOString(),
      })
    );
  }

  increment(name: string, by = 1, tags?: Record<string, string>): void {
    const key = tags ? `${name}:${JSON.stringify(tags)}` : name;
    this.metrics.counters[key] = (this.metrics.counters[key] || 0) + by;
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    const key = tags ? `${name}:${JSON.stringify(tags)}` : name;
    if (!this.metrics.timings[key]) {
      this.metrics.timings[key] = [];
    }
    this.metrics.timings[key].push(durationMs);
  }

  getMetrics(): ObserverMetrics {
    return { ...this.metrics };
  }
}

/**
 * Create a new console observer instance.
 */
export function createConsoleObserver(): ConsoleObserver {
  return new ConsoleObserver();
}
