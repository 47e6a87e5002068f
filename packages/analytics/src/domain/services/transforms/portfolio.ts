import type { Decimal } from 'decimal.js';
import type { RawRecord, RecordBatch } from '@ledgerline/core';
import type { PortfolioSpec } from '../../model/TransformSpec.js';
import { Dec, formatDecimal, safeDiv, scaleOf, toDecimal } from '../decimal.js';
import { byColumns } from '../ordering.js';

function groupKey(record: RawRecord): string {
  return JSON.stringify([record['portfolio_id'] ?? null, String(record['position_date'] ?? '')]);
}

/**
 * Market value, unrealized P&L, P&L percentage and weight within the portfolio on the
 * same date. Ordered by portfolio, date and symbol.
 */
export function portfolioPositions(batch: RecordBatch, spec: PortfolioSpec): RawRecord[] {
  const values = batch.map((record) => {
    const quantity = toDecimal(record['quantity']);
    const price = toDecimal(record['current_price']);
    const cost = toDecimal(record['avg_cost']);
    const marketValue = quantity !== null && price !== null ? quantity.times(price) : null;
    const pnl = quantity !== null && price !== null && cost !== null ? price.minus(cost).times(quantity) : null;
    const basis = quantity !== null && cost !== null ? cost.times(quantity) : null;
    return { record, marketValue, pnl, basis };
  });

  const totals = new Map<string, Decimal>();
  for (const { record, marketValue } of values) {
    if (marketValue === null) continue;
    const key = groupKey(record);
    totals.set(key, (totals.get(key) ?? new Dec(0)).plus(marketValue));
  }

  const scale = (column: string) => scaleOf(column, spec.scales);
  const rows = values.map(({ record, marketValue, pnl, basis }) => {
    const pnlPct = safeDiv(pnl, basis);
    return {
      ...record,
      market_value: formatDecimal(marketValue, scale('market_value')),
      unrealized_pnl: formatDecimal(pnl, scale('unrealized_pnl')),
      weight: formatDecimal(safeDiv(marketValue, totals.get(groupKey(record)) ?? null), scale('weight')),
      pnl_percentage: formatDecimal(pnlPct === null ? null : pnlPct.times(100), scale('pnl_percentage')),
    };
  });
  return rows.sort(byColumns(['portfolio_id', 'position_date', 'symbol']));
}
