import type { Model } from 'sequelize';
import { isNullish, normalizeKeyCell, toEpochMs } from '@ledgerline/core';
import type { CellValue, ColumnDefinition, DestinationDefinition, RawRecord } from '@ledgerline/core';

export type ColumnValues = Record<string, CellValue>;

/** Narrow a driver value to a cell. BIGINT and DECIMAL may come back as strings or bigints. */
export function cellOf(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if (typeof value === 'bigint') return value.toString();
  throw new TypeError(`Unsupported column value of type ${typeof value}`);
}

function columnValue(column: ColumnDefinition, value: RawRecord[string]): CellValue {
  if (value === undefined || isNullish(value)) return null;
  switch (column.type) {
    case 'date':
      return normalizeKeyCell(value, 'date');
    case 'timestamp': {
      const ms = toEpochMs(value);
      return ms === null ? value : new Date(ms);
    }
    default:
      return value;
  }
}

/**
 * Project a record onto the destination's declared columns, or onto `only` of them when given.
 * Other fields are dropped.
 */
export function toRow(
  record: RawRecord,
  destination: DestinationDefinition,
  only?: ReadonlySet<string>,
): ColumnValues {
  const row: ColumnValues = {};
  for (const column of destination.columns) {
    if (only && !only.has(column.name)) continue;
    row[column.name] = columnValue(column, record[column.name]);
  }
  return row;
}

/** Declared columns carried by at least one record, natural key included. */
export function carriedColumns(records: readonly RawRecord[], destination: DestinationDefinition): Set<string> {
  const carried = new Set<string>(destination.naturalKey);
  for (const column of destination.columns) {
    if (records.some((r) => r[column.name] !== undefined)) carried.add(column.name);
  }
  return carried;
}

/** Values of the given columns, projected the same way `toRow` does. */
export function pick(record: RawRecord, destination: DestinationDefinition, columns: readonly string[]): ColumnValues {
  const row: ColumnValues = {};
  for (const name of columns) {
    const column = destination.columns.find((c) => c.name === name);
    const value = record[name];
    row[name] = column ? columnValue(column, value) : cellOf(value);
  }
  return row;
}

/** Read a fetched instance back as a record of the destination's columns. */
export function toRecord(instance: Model, columns: readonly string[]): RawRecord {
  const record: Record<string, CellValue> = {};
  for (const name of columns) {
    record[name] = cellOf(instance.get(name));
  }
  return record;
}
