import { createHash } from 'node:crypto';
import { columnsOf, isNullish } from '@ledgerline/core';
import type { CellValue, Logger, RawRecord, RecordBatch } from '@ledgerline/core';
import type { EnrichmentSpec, LookupTable, MetadataColumns } from '../../model/TransformSpec.js';

type MutableRecord = Record<string, CellValue | undefined>;

function joinValue(value: CellValue | undefined): string | null {
  if (isNullish(value)) return null;
  return value instanceof Date ? value.toISOString() : String(value);
}

/** Left join; colliding lookup columns get a `_<name>` suffix. A key matching several rows repeats the input row. */
export function leftJoin(batch: readonly RawRecord[], lookup: LookupTable): RawRecord[] {
  const input = new Set(columnsOf(batch));
  const lookupColumns = columnsOf(lookup.rows).filter((c) => c !== lookup.joinKey);
  const outputName = (column: string) => (input.has(column) ? `${column}_${lookup.name}` : column);

  const index = new Map<string, RawRecord[]>();
  for (const row of lookup.rows) {
    const key = joinValue(row[lookup.joinKey]);
    if (key === null) continue;
    const bucket = index.get(key);
    if (bucket) bucket.push(row);
    else index.set(key, [row]);
  }

  const out: RawRecord[] = [];
  for (const record of batch) {
    const key = joinValue(record[lookup.joinKey]);
    const matches = key === null ? undefined : index.get(key);
    if (!matches) {
      const row: MutableRecord = { ...record };
      for (const column of lookupColumns) row[outputName(column)] = null;
      out.push(row);
      continue;
    }
    for (const match of matches) {
      const row: MutableRecord = { ...record };
      for (const column of lookupColumns) row[outputName(column)] = match[column] ?? null;
      out.push(row);
    }
  }
  return out;
}

function canonical(value: CellValue | undefined): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  return value ?? null;
}

/** SHA-256 of the record serialized with sorted keys. */
export function recordHash(record: RawRecord): string {
  const entries = Object.keys(record)
    .sort()
    .map((key): [string, unknown] => [key, canonical(record[key])]);
  return createHash('sha256').update(JSON.stringify(entries)).digest('hex');
}

function stampMetadata(record: RawRecord, metadata: MetadataColumns): RawRecord {
  const row: MutableRecord = { ...record, source_system: metadata.sourceSystem };
  if (metadata.recordHash ?? true) row['record_hash'] = recordHash(row);
  row['load_timestamp'] = metadata.loadTimestamp;
  return row;
}

/** Joins, then derived columns, then metadata. Row order follows the input. */
export function enrich(batch: RecordBatch, spec: EnrichmentSpec, logger: Logger): RawRecord[] {
  let rows: RawRecord[] = [...batch];

  for (const lookup of spec.lookups ?? []) {
    if (!columnsOf(rows).includes(lookup.joinKey)) {
      logger.warn({ lookup: lookup.name, joinKey: lookup.joinKey }, 'enrichment_lookup_skipped');
      continue;
    }
    rows = leftJoin(rows, lookup);
    logger.info({ lookup: lookup.name, rows: rows.length }, 'enrichment_lookup_applied');
  }

  for (const [column, derive] of Object.entries(spec.derived ?? {})) {
    try {
      rows = rows.map((record) => ({ ...record, [column]: derive(record) }));
    } catch (error) {
      logger.error({ err: error, column }, 'derived_column_failed');
      throw error;
    }
    logger.debug({ column }, 'derived_column_added');
  }

  const metadata = spec.metadata;
  return metadata ? rows.map((record) => stampMetadata(record, metadata)) : rows;
}
