import { isNullish } from '@ledgerline/core';
import type { RecordBatch } from '@ledgerline/core';
import type { ExpectedCountRule, MinRowsRule, NotNullRateRule } from '../../model/Rule.js';
import { batchResult, indicesWhere, rowResult } from './CheckResult.js';
import type { CheckResult } from './CheckResult.js';

export function nullRate(nullCount: number, total: number): number {
  return total === 0 ? 0 : (nullCount / total) * 100;
}

export function checkNotNullRate(batch: RecordBatch, rule: NotNullRateRule): CheckResult {
  const failed = indicesWhere(batch, (record) => isNullish(record[rule.column]));
  const rate = nullRate(failed.length, batch.length);
  return rowResult(
    failed,
    `Column "${rule.column}" is ${rate.toFixed(2)}% null (limit ${rule.nullThresholdPct ?? 0}%)`,
  );
}

export function checkMinRows(batch: RecordBatch, rule: MinRowsRule): CheckResult {
  return batchResult(batch.length < rule.minRows, `Batch has ${batch.length} rows, minimum is ${rule.minRows}`);
}

export function checkExpectedCount(batch: RecordBatch, rule: ExpectedCountRule): CheckResult {
  const actual = batch.length;
  const tolerancePct = rule.tolerancePct ?? 10;
  const failed =
    rule.expected === 0 ? actual !== 0 : Math.abs(actual - rule.expected) / rule.expected > tolerancePct / 100;
  return batchResult(failed, `Batch has ${actual} rows, expected ${rule.expected} ± ${tolerancePct}%`);
}
