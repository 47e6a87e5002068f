import { compareCells } from '@ledgerline/core';
import type { RawRecord } from '@ledgerline/core';

/** Lexicographic comparator over the given columns. */
export function byColumns(columns: readonly string[]): (a: RawRecord, b: RawRecord) => number {
  return (a, b) => {
    for (const column of columns) {
      const cmp = compareCells(a[column], b[column]);
      if (cmp !== 0) return cmp;
    }
    return 0;
  };
}

/** The batch itself when already ordered, else a stably sorted copy. */
export function ensureSorted<T extends RawRecord>(batch: readonly T[], columns: readonly string[]): readonly T[] {
  const compare = byColumns(columns);
  for (let i = 1; i < batch.length; i++) {
    const prev = batch[i - 1];
    const current = batch[i];
    if (prev && current && compare(prev, current) > 0) {
      return [...batch].sort(compare);
    }
  }
  return batch;
}
