import { isNullish, toEpochMs } from '@ledgerline/core';
import type { CellValue, ColumnType, RawRecord, RecordBatch } from '@ledgerline/core';
import type { ComparisonOperator, CrossFieldRule, TypeRule, UniqueRule } from '../../model/Rule.js';
import { numericValue } from './accuracy.js';
import { indicesWhere, rowResult } from './CheckResult.js';
import type { CheckResult } from './CheckResult.js';
import { matchesDateFormat } from './dateFormat.js';
import type { CompiledDateFormat } from './dateFormat.js';

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const BOOLEAN_TEXT = new Set(['true', 'false', '1', '0']);

function fractionDigits(text: string): number {
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

function isDecimal(value: CellValue, scale: number | undefined): boolean {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return false;
    if (scale === undefined || Number.isInteger(value)) return true;
    const text = String(value);
    return !/e/i.test(text) && fractionDigits(text) <= scale;
  }
  if (typeof value !== 'string') return false;
  const text = value.trim();
  if (!DECIMAL.test(text)) return false;
  return scale === undefined || fractionDigits(text.replace(/0+$/, '')) <= scale;
}

/** Whether a present value converts to the column type without losing information. */
export function coercesTo(value: CellValue, dtype: ColumnType, scale?: number): boolean {
  switch (dtype) {
    case 'string':
      return true;
    case 'integer':
      if (typeof value === 'number') return Number.isSafeInteger(value);
      return typeof value === 'string' && INTEGER.test(value.trim()) && Number.isSafeInteger(Number(value));
    case 'decimal':
      return isDecimal(value, scale);
    case 'timestamp':
      return typeof value !== 'boolean' && toEpochMs(value) !== null;
    case 'date':
      if (value instanceof Date) return !Number.isNaN(value.getTime());
      return typeof value === 'string' && ISO_DATE.test(value.trim()) && toEpochMs(value.trim()) !== null;
    case 'boolean':
      if (typeof value === 'boolean') return true;
      if (typeof value === 'number') return value === 0 || value === 1;
      return typeof value === 'string' && BOOLEAN_TEXT.has(value.trim().toLowerCase());
  }
}

export function checkType(batch: RecordBatch, rule: TypeRule): CheckResult {
  const failed = indicesWhere(batch, (record) => {
    const value = record[rule.column];
    return !isNullish(value) && !coercesTo(value, rule.dtype, rule.scale);
  });
  const declared = rule.scale !== undefined ? `${rule.dtype}(scale ${rule.scale})` : rule.dtype;
  return rowResult(failed, `${failed.length} values of "${rule.column}" do not coerce to ${declared}`);
}

const CANONICAL_NUMBER = /^([+-]?)(0|[1-9]\d*)(?:\.(\d*))?$/;

/** Cell as it would compare in a natural key: calendar days for midnight dates, numbers without padding. */
function uniqueCell(value: CellValue | undefined): string | null {
  if (isNullish(value)) return null;
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return String(value);
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
  }
  const text = String(value).trim();
  const match = CANONICAL_NUMBER.exec(text);
  if (!match) return text;
  const [, sign = '', whole = '', fraction = ''] = match;
  const digits = fraction.replace(/0+$/, '');
  const number = digits === '' ? whole : `${whole}.${digits}`;
  return number === '0' || sign !== '-' ? number : `-${number}`;
}

function tupleKey(record: RawRecord, columns: readonly string[]): string {
  return JSON.stringify(columns.map((column) => uniqueCell(record[column])));
}

export function checkUnique(batch: RecordBatch, rule: UniqueRule): CheckResult {
  const seen = new Set<string>();
  const failed = indicesWhere(batch, (record) => {
    const key = tupleKey(record, rule.columns);
    if (seen.has(key)) return true;
    seen.add(key);
    return false;
  });
  return rowResult(failed, `${failed.length} duplicate rows on (${rule.columns.join(', ')})`);
}

export function checkDateFormat(batch: RecordBatch, column: string, format: CompiledDateFormat): CheckResult {
  const failed = indicesWhere(batch, (record) => {
    const value = record[column];
    if (isNullish(value) || value instanceof Date) return false;
    return typeof value !== 'string' || !matchesDateFormat(value.trim(), format);
  });
  return rowResult(failed, `${failed.length} values of "${column}" do not match format ${format.format}`);
}

function compareForRule(left: CellValue, right: CellValue): number {
  const a = numericValue(left);
  const b = numericValue(right);
  if (a !== null && b !== null) return a - b;

  if (left instanceof Date || right instanceof Date) {
    const ta = toEpochMs(left);
    const tb = toEpochMs(right);
    if (ta !== null && tb !== null) return ta - tb;
  }
  const sa = String(left);
  const sb = String(right);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function holds(cmp: number, operator: ComparisonOperator): boolean {
  switch (operator) {
    case '<':
      return cmp < 0;
    case '<=':
      return cmp <= 0;
    case '>':
      return cmp > 0;
    case '>=':
      return cmp >= 0;
    case '==':
      return cmp === 0;
    case '!=':
      return cmp !== 0;
  }
}

export function checkCrossField(batch: RecordBatch, rule: CrossFieldRule): CheckResult {
  const [leftColumn, rightColumn] = rule.columns;
  const failed = indicesWhere(batch, (record) => {
    const left = record[leftColumn];
    const right = record[rightColumn];
    if (isNullish(left) || isNullish(right)) return false;
    return !holds(compareForRule(left, right), rule.operator);
  });
  return rowResult(failed, `${failed.length} rows violate ${leftColumn} ${rule.operator} ${rightColumn}`);
}
