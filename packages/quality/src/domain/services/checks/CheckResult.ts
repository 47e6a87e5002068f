/** Raw finding of a single check, before thresholds and severity are applied. */
export type CheckResult = RowCheckResult | BatchCheckResult;

export interface RowCheckResult {
  readonly scope: 'row';
  /** Ascending indices of offending rows. */
  readonly failedRows: readonly number[];
  readonly message: string;
}

export interface BatchCheckResult {
  readonly scope: 'batch';
  readonly failed: boolean;
  readonly message: string;
  readonly missingColumns?: readonly string[];
}

export function rowResult(failedRows: readonly number[], message: string): RowCheckResult {
  return { scope: 'row', failedRows, message };
}

export function batchResult(failed: boolean, message: string, missingColumns?: readonly string[]): BatchCheckResult {
  return missingColumns ? { scope: 'batch', failed, message, missingColumns } : { scope: 'batch', failed, message };
}

/** Indices of records matching a predicate. */
export function indicesWhere<T>(items: readonly T[], predicate: (item: T) => boolean): number[] {
  const indices: number[] = [];
  items.forEach((item, index) => {
    if (predicate(item)) indices.push(index);
  });
  return indices;
}
