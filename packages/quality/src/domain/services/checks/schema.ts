import { columnsOf, isNullish } from '@ledgerline/core';
import type { RecordBatch } from '@ledgerline/core';
import type { NotNullRule, RequiredColumnsRule } from '../../model/Rule.js';
import { batchResult, indicesWhere, rowResult } from './CheckResult.js';
import type { CheckResult } from './CheckResult.js';

/** Column presence is judged on the batch as a whole. An empty batch has no columns to judge. */
export function checkRequiredColumns(batch: RecordBatch, rule: RequiredColumnsRule): CheckResult {
  if (batch.length === 0) return batchResult(false, 'Empty batch, column presence not checked', []);
  const present = new Set(columnsOf(batch));
  const missing = rule.columns.filter((column) => !present.has(column));
  return batchResult(
    missing.length > 0,
    missing.length > 0 ? `Missing required columns: ${missing.join(', ')}` : 'All required columns present',
    missing,
  );
}

export function checkNotNull(batch: RecordBatch, rule: NotNullRule): CheckResult {
  const failed = indicesWhere(batch, (record) => isNullish(record[rule.column]));
  return rowResult(failed, `${failed.length} null values in "${rule.column}"`);
}
