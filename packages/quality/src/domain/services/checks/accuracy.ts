import { isNullish } from '@ledgerline/core';
import type { CellValue, RecordBatch } from '@ledgerline/core';
import type { AllowedValuesRule, RangeRule } from '../../model/Rule.js';
import { indicesWhere, rowResult } from './CheckResult.js';
import type { CheckResult } from './CheckResult.js';

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Numeric reading of a cell, or `null` when it is not a number. */
export function numericValue(value: CellValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && NUMERIC.test(value.trim())) return Number(value);
  return null;
}

export function checkRange(batch: RecordBatch, rule: RangeRule): CheckResult {
  const failed = indicesWhere(batch, (record) => {
    const value = record[rule.column];
    if (isNullish(value)) return false;
    const n = numericValue(value);
    if (n === null) return true;
    return (rule.min !== undefined && n < rule.min) || (rule.max !== undefined && n > rule.max);
  });
  const bounds = `[${rule.min ?? '-∞'}, ${rule.max ?? '∞'}]`;
  return rowResult(failed, `${failed.length} values of "${rule.column}" outside ${bounds}`);
}

export function checkAllowedValues(batch: RecordBatch, rule: AllowedValuesRule): CheckResult {
  const allowed = new Set(rule.values.map((v) => String(v)));
  const failed = indicesWhere(batch, (record) => {
    const value = record[rule.column];
    if (isNullish(value)) return false;
    return !allowed.has(value instanceof Date ? value.toISOString() : String(value));
  });
  return rowResult(failed, `${failed.length} values of "${rule.column}" not in [${rule.values.join(', ')}]`);
}

export function checkPattern(batch: RecordBatch, column: string, pattern: RegExp): CheckResult {
  const failed = indicesWhere(batch, (record) => {
    const value = record[column];
    if (isNullish(value)) return false;
    return !pattern.test(value instanceof Date ? value.toISOString() : String(value));
  });
  return rowResult(failed, `${failed.length} values of "${column}" do not match /${pattern.source}/`);
}
