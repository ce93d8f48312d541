/**
 * Row Source Interface
 *
 * A row source hands one table's rows to a join pass. It is opened for
 * a single pass and closed when the pass is done, whether it succeeded
 * or threw.
 */

import type { RawRow, TableName } from "../types";

export interface RowSource {
  /** Label used in log events, usually the file name */
  readonly name: string;

  rows(): Iterable<RawRow>;

  close(): void;
}

export type RowSourceFactory = (table: TableName) => RowSource;

/**
 * Run `consume` over the rows of a source and close it afterwards.
 */
export function withRowSource<T>(
  source: RowSource,
  consume: (rows: Iterable<RawRow>) => T
): T {
  try {
    return consume(source.rows());
  } finally {
    source.close();
  }
}
