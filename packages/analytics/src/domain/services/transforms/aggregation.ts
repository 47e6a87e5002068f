import type { Decimal } from 'decimal.js';
import { isNullish, toEpochMs } from '@ledgerline/core';
import type { CellValue, RawRecord, RecordBatch } from '@ledgerline/core';
import type {
  AggregateFunction,
  AggregationSpec,
  Frequency,
  TimeSeriesAggregationSpec,
} from '../../model/TransformSpec.js';
import { Dec, formatDecimal, scaleOf, toDecimal } from '../decimal.js';
import { byColumns } from '../ordering.js';

/** Running sum, count, min and max over the numeric values of one column. */
class Accumulator {
  private sum = new Dec(0);
  private count = 0;
  private min: Decimal | null = null;
  private max: Decimal | null = null;

  add(value: CellValue | undefined): void {
    const n = toDecimal(value);
    if (n === null) return;
    this.sum = this.sum.plus(n);
    this.count++;
    if (this.min === null || n.lessThan(this.min)) this.min = n;
    if (this.max === null || n.greaterThan(this.max)) this.max = n;
  }

  result(fn: AggregateFunction, scale: number): CellValue {
    switch (fn) {
      case 'count':
        return this.count;
      case 'sum':
        return formatDecimal(this.sum, scale);
      case 'mean':
        return this.count === 0 ? null : formatDecimal(this.sum.div(this.count), scale);
      case 'min':
        return formatDecimal(this.min, scale);
      case 'max':
        return formatDecimal(this.max, scale);
    }
  }
}

interface Group {
  readonly keyRow: Record<string, CellValue>;
  readonly accumulators: Map<string, Accumulator>;
}

function groupRows(
  batch: RecordBatch,
  keyOf: (record: RawRecord) => Record<string, CellValue> | null,
  columns: readonly string[],
): Group[] {
  const groups = new Map<string, Group>();
  for (const record of batch) {
    const keyRow = keyOf(record);
    if (keyRow === null) continue;
    const id = JSON.stringify(Object.values(keyRow).map((v) => (v instanceof Date ? v.toISOString() : v)));
    let group = groups.get(id);
    if (!group) {
      group = { keyRow, accumulators: new Map(columns.map((c) => [c, new Accumulator()])) };
      groups.set(id, group);
    }
    for (const column of columns) group.accumulators.get(column)?.add(record[column]);
  }
  return [...groups.values()];
}

/** Group-by aggregation. One row per distinct key, ordered by key. */
export function aggregate(batch: RecordBatch, spec: AggregationSpec): RawRecord[] {
  const columns = [...new Set(spec.aggregates.map((a) => a.column))];
  const groups = groupRows(
    batch,
    (record) => Object.fromEntries(spec.groupBy.map((c): [string, CellValue] => [c, record[c] ?? null])),
    columns,
  );

  const rows = groups.map(({ keyRow, accumulators }) => {
    const row: Record<string, CellValue> = { ...keyRow };
    for (const { column, fn, as } of spec.aggregates) {
      const name = as ?? `${column}_${fn}`;
      row[name] = accumulators.get(column)?.result(fn, scaleOf(name, spec.scales)) ?? null;
    }
    return row;
  });
  return rows.sort(byColumns(spec.groupBy));
}

const DAY_MS = 86_400_000;

function periodStartMs(d: Date, frequency: Frequency): number {
  const year = d.getUTCFullYear();
  const month = d.getUTCMonth();
  switch (frequency) {
    case 'D':
      return Date.UTC(year, month, d.getUTCDate());
    case 'W':
      // Weeks start on Monday.
      return Date.UTC(year, month, d.getUTCDate()) - ((d.getUTCDay() + 6) % 7) * DAY_MS;
    case 'M':
      return Date.UTC(year, month, 1);
    case 'Q':
      return Date.UTC(year, month - (month % 3), 1);
    case 'Y':
      return Date.UTC(year, 0, 1);
  }
}

/** UTC start of the period containing `epochMs`, as `YYYY-MM-DD`. */
export function periodStart(epochMs: number, frequency: Frequency): string {
  return new Date(periodStartMs(new Date(epochMs), frequency)).toISOString().slice(0, 10);
}

const SERIES_FUNCTIONS: readonly AggregateFunction[] = ['mean', 'sum', 'min', 'max', 'count'];

/**
 * Calendar bucketing of a time column, optionally per entity. Buckets are labelled by
 * their UTC start; periods with no rows are not emitted.
 */
export function timeSeriesAggregate(
  batch: RecordBatch,
  spec: TimeSeriesAggregationSpec,
): { rows: RawRecord[]; skipped: number } {
  let skipped = 0;
  const keyColumns = spec.entityColumn ? [spec.entityColumn, spec.timeColumn] : [spec.timeColumn];
  const groups = groupRows(
    batch,
    (record) => {
      const epoch = toEpochMs(record[spec.timeColumn]);
      if (epoch === null) {
        skipped++;
        return null;
      }
      const bucket = periodStart(epoch, spec.frequency);
      if (!spec.entityColumn) return { [spec.timeColumn]: bucket };
      const entity = record[spec.entityColumn];
      return { [spec.entityColumn]: isNullish(entity) ? null : entity, [spec.timeColumn]: bucket };
    },
    spec.valueColumns,
  );

  const rows = groups.map(({ keyRow, accumulators }) => {
    const row: Record<string, CellValue> = { ...keyRow };
    for (const column of spec.valueColumns) {
      for (const fn of SERIES_FUNCTIONS) {
        const name = `${column}_${fn}`;
        row[name] = accumulators.get(column)?.result(fn, scaleOf(name, spec.scales)) ?? null;
      }
    }
    return row;
  });
  return { rows: rows.sort(byColumns(keyColumns)), skipped };
}
