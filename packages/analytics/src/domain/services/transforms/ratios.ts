import type { Decimal } from 'decimal.js';
import type { RawRecord, RecordBatch } from '@ledgerline/core';
import type { RatioSpec } from '../../model/TransformSpec.js';
import { formatDecimal, safeDiv, scaleOf, toDecimal } from '../decimal.js';
import { byColumns } from '../ordering.js';

type Ratio = (n: (column: string) => Decimal | null) => Decimal | null;

const RATIOS: Readonly<Record<string, Ratio>> = {
  debt_to_equity: (n) => safeDiv(n('total_liabilities'), n('shareholders_equity')),
  current_ratio: (n) => safeDiv(n('current_assets'), n('current_liabilities')),
  quick_ratio: (n) => {
    const assets = n('current_assets');
    const inventory = n('inventory');
    return safeDiv(assets !== null && inventory !== null ? assets.minus(inventory) : null, n('current_liabilities'));
  },
  roa: (n) => safeDiv(n('net_income'), n('total_assets')),
  roe: (n) => safeDiv(n('net_income'), n('shareholders_equity')),
  profit_margin: (n) => safeDiv(n('net_income'), n('revenue')),
  asset_turnover: (n) => safeDiv(n('revenue'), n('total_assets')),
};

/** Balance-sheet and income ratios per reporting period, ordered by symbol, year and period. */
export function financialRatios(batch: RecordBatch, spec: RatioSpec): RawRecord[] {
  const rows = batch.map((record) => {
    const n = (column: string) => toDecimal(record[column]);
    const row: Record<string, RawRecord[string]> = { ...record };
    for (const [column, ratio] of Object.entries(RATIOS)) {
      row[column] = formatDecimal(ratio(n), scaleOf(column, spec.scales));
    }
    return row;
  });
  return rows.sort(byColumns(['symbol', 'fiscal_year', 'fiscal_period']));
}
