import type { CaseExportObserver } from "@/lib/case-export/observability";
import type { ChildTable, DuplicateCasePolicy, RecordNode } from "@/lib/case-export/types";

export interface OrphanEvent {
  table: ChildTable;
  key: string;
  listField: string;
  record: RecordNode;
}

/**
 * Observer that keeps every event for assertions instead of logging.
 */
export class RecordingObserver implements CaseExportObserver {
  runs: Array<{ ok: boolean; error?: string }> = [];
  steps: Array<{ step: string; ok: boolean; data?: unknown }> = [];
  orphans: OrphanEvent[] = [];
  duplicates: Array<{ key: string; policy: DuplicateCasePolicy }> = [];
  counters: Record<string, number> = {};

  onRunStart(): void {}

  onStepStart(): void {}

  onStepEnd(meta: { step: string; ok: boolean; data?: unknown }): void {
    this.steps.push({ step: meta.step, ok: meta.ok, data: meta.data });
  }

  onRunEnd(meta: { ok: boolean; error?: string }): void {
    this.runs.push({ ok: meta.ok, error: meta.error });
  }

  onOrphan(meta: OrphanEvent): void {
    this.orphans.push({
      table: meta.table,
      key: meta.key,
      listField: meta.listField,
      record: meta.record,
    });
  }

  onDuplicateKey(meta: { key: string; policy: DuplicateCasePolicy }): void {
    this.duplicates.push({ key: meta.key, policy: meta.policy });
  }

  increment(name: string, by = 1): void {
    this.counters[name] = (this.counters[name] ?? 0) + by;
  }

  timing(): void {}
}
