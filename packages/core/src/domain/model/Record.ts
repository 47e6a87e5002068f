/** Scalar carried by a record cell. Decimals travel as numbers or as decimal strings. */
export type CellValue = string | number | boolean | Date | null;

/** One row of a tabular batch. A column absent from the row reads as `undefined`. */
export interface RawRecord {
  readonly [column: string]: CellValue | undefined;
}

/** Ordered sequence of records handed over by an extraction collaborator. */
export type RecordBatch = readonly RawRecord[];

/** `true` for `undefined`, `null`, `''` and `NaN`. */
export function isNullish(value: CellValue | undefined): value is null | undefined | '' {
  if (value === undefined || value === null || value === '') return true;
  return typeof value === 'number' && Number.isNaN(value);
}

/** Union of the column names present in any record of the batch, in first-seen order. */
export function columnsOf(batch: RecordBatch): string[] {
  const seen = new Set<string>();
  for (const record of batch) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  return [...seen];
}

/**
 * Convert a time-like cell to epoch milliseconds.
 *
 * Accepts `Date`, epoch numbers and strings understood by `Date.parse`. Returns `null` otherwise.
 */
export function toEpochMs(value: CellValue | undefined): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const time = Date.parse(value);
    return Number.isNaN(time) ? null : time;
  }
  return null;
}

/** Total order over cells used for sorting: nulls first, then numbers/dates, then strings. */
export function compareCells(a: CellValue | undefined, b: CellValue | undefined): number {
  const aNull = isNullish(a);
  const bNull = isNullish(b);
  if (aNull || bNull) return aNull === bNull ? 0 : aNull ? -1 : 1;

  if (a instanceof Date || b instanceof Date) {
    return (toEpochMs(a) ?? 0) - (toEpochMs(b) ?? 0);
  }
  if (typeof a === 'number' && typeof b === 'number') return a - b;

  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}
