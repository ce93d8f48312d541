/**
 * In-memory row source, for callers that already hold the rows.
 */

import type { RawRow, TableName } from "../types";
import type { RowSource, RowSourceFactory } from "./types";

export class MemoryRowSource implements RowSource {
  private closed = false;

  constructor(
    readonly name: string,
    private readonly data: readonly RawRow[]
  ) {}

  *rows(): Iterable<RawRow> {
    for (const row of this.data) {
      if (this.closed) {
        throw new Error(`Row source ${this.name} was read after close`);
      }
      yield { ...row };
    }
  }

  close(): void {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }
}

export function createMemorySourceFactory(
  tables: Partial<Record<TableName, readonly RawRow[]>>
): RowSourceFactory {
  return (table) => new MemoryRowSource(table, tables[table] ?? []);
}
