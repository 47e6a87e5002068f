import type { RawRecord } from '@ledgerline/core';
import type { RuleSet } from '../../src/domain/model/RuleSet.js';

/** ISO date `offset` days after 2024-01-01. */
export function isoDay(offset: number): string {
  return new Date(Date.UTC(2024, 0, 1 + offset)).toISOString().slice(0, 10);
}

export function priceRecords(symbol: string, days: number): RawRecord[] {
  return Array.from({ length: days }, (_, day) => ({
    symbol,
    trade_date: isoDay(day),
    close_price: 100 + day,
  }));
}

export const priceRules: RuleSet = {
  dataset: 'daily_stock_prices',
  keyColumns: ['symbol', 'trade_date'],
  rules: [
    { kind: 'schema', check: 'required_columns', columns: ['symbol', 'trade_date', 'close_price'] },
    { kind: 'completeness', check: 'not_null_rate', column: 'close_price' },
    { kind: 'accuracy', check: 'range', column: 'close_price', min: 0 },
  ],
};
