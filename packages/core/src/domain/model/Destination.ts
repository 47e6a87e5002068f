import { UnknownDestination } from '../errors/EtlErrors.js';
import type { CellValue, RawRecord } from './Record.js';
import { isNullish, toEpochMs } from './Record.js';

/** Warehouse column types understood by the loader. */
export type ColumnType = 'string' | 'integer' | 'decimal' | 'date' | 'timestamp' | 'boolean';

export interface ColumnDefinition {
  readonly name: string;
  readonly type: ColumnType;
  /** Total digits for `decimal` columns. */
  readonly precision?: number;
  /** Digits after the decimal point for `decimal` columns. */
  readonly scale?: number;
  readonly nullable?: boolean;
}

/** Warehouse table a batch is written to. */
export interface DestinationDefinition {
  readonly schema?: string;
  readonly table: string;
  readonly columns: readonly ColumnDefinition[];
  /** Columns whose tuple identifies a row. Upserts resolve conflicts on it. */
  readonly naturalKey: readonly string[];
  /** Columns whose values scope a `replace` load. The whole table is replaced when omitted. */
  readonly partitionKey?: readonly string[];
}

/** `schema.table`, or `table` when no schema is declared. Also the lease resource id. */
export function destinationId(destination: DestinationDefinition): string {
  return destination.schema ? `${destination.schema}.${destination.table}` : destination.table;
}

export function findColumn(destination: DestinationDefinition, name: string): ColumnDefinition | undefined {
  return destination.columns.find((c) => c.name === name);
}

const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/;

/**
 * Canonical string form of a key cell, so that `2024-01-02`, `new Date('2024-01-02')` and
 * `'2024-01-02T00:00:00Z'` compare equal on a date column. Returns `null` for empty cells.
 */
export function normalizeKeyCell(value: CellValue | undefined, type: ColumnType | undefined): string | null {
  if (isNullish(value)) return null;

  switch (type) {
    case 'date': {
      if (typeof value === 'string') {
        const match = ISO_DATE_PREFIX.exec(value.trim());
        if (match?.[1]) return match[1];
      }
      const ms = toEpochMs(value);
      return ms === null ? String(value) : new Date(ms).toISOString().slice(0, 10);
    }
    case 'timestamp': {
      const ms = toEpochMs(value);
      return ms === null ? String(value) : new Date(ms).toISOString();
    }
    case 'integer': {
      const n = typeof value === 'number' ? value : Number(String(value).trim());
      return Number.isFinite(n) ? String(n) : String(value);
    }
    default:
      return value instanceof Date ? value.toISOString() : String(value).trim();
  }
}

function keyOf(record: RawRecord, destination: DestinationDefinition, columns: readonly string[]): string | null {
  const parts: string[] = [];
  for (const name of columns) {
    const part = normalizeKeyCell(record[name], findColumn(destination, name)?.type);
    if (part === null) return null;
    parts.push(part);
  }
  return parts.join('|');
}

/** Normalized natural key of a record, or `null` when any key column is empty. */
export function naturalKeyOf(record: RawRecord, destination: DestinationDefinition): string | null {
  return keyOf(record, destination, destination.naturalKey);
}

/** Normalized partition key of a record, or `null` when the destination has none or a column is empty. */
export function partitionKeyOf(record: RawRecord, destination: DestinationDefinition): string | null {
  if (!destination.partitionKey || destination.partitionKey.length === 0) return null;
  return keyOf(record, destination, destination.partitionKey);
}

/** Registry of known destinations, resolved by identifier. */
export class DestinationCatalog {
  private readonly destinations = new Map<string, DestinationDefinition>();

  constructor(destinations: readonly DestinationDefinition[] = []) {
    for (const destination of destinations) {
      this.register(destination);
    }
  }

  register(destination: DestinationDefinition): this {
    this.destinations.set(destinationId(destination), destination);
    return this;
  }

  has(id: string): boolean {
    return this.destinations.has(id);
  }

  /** Look up a destination. Throws `UnknownDestination` when it was never registered. */
  resolve(id: string): DestinationDefinition {
    const destination = this.destinations.get(id);
    if (!destination) {
      throw new UnknownDestination(id);
    }
    return destination;
  }

  list(): readonly DestinationDefinition[] {
    return [...this.destinations.values()];
  }
}
