import { DestinationCatalog } from '@ledgerline/core';
import type { ColumnDefinition, DestinationDefinition } from '@ledgerline/core';

const decimal = (name: string, precision: number, scale: number): ColumnDefinition => ({
  name,
  type: 'decimal',
  precision,
  scale,
  nullable: true,
});

export const dailyStockAnalytics: DestinationDefinition = {
  schema: 'analytics',
  table: 'daily_stock_analytics',
  columns: [
    { name: 'symbol', type: 'string', nullable: false },
    { name: 'trade_date', type: 'date', nullable: false },
    decimal('open_price', 18, 4),
    decimal('high_price', 18, 4),
    decimal('low_price', 18, 4),
    decimal('close_price', 18, 4),
    { name: 'volume', type: 'integer', nullable: true },
    decimal('daily_return', 10, 6),
    decimal('volatility_20d', 10, 6),
    decimal('moving_avg_20d', 18, 4),
    decimal('moving_avg_50d', 18, 4),
    decimal('moving_avg_200d', 18, 4),
    decimal('rsi_14d', 6, 2),
  ],
  naturalKey: ['symbol', 'trade_date'],
  partitionKey: ['trade_date'],
};

export const financialRatios: DestinationDefinition = {
  schema: 'analytics',
  table: 'financial_ratios',
  columns: [
    { name: 'symbol', type: 'string', nullable: false },
    { name: 'fiscal_period', type: 'string', nullable: false },
    { name: 'fiscal_year', type: 'integer', nullable: false },
    decimal('pe_ratio', 10, 2),
    decimal('pb_ratio', 10, 2),
    decimal('debt_to_equity', 10, 4),
    decimal('current_ratio', 10, 4),
    decimal('quick_ratio', 10, 4),
    decimal('roa', 8, 4),
    decimal('roe', 8, 4),
    decimal('profit_margin', 8, 4),
    decimal('asset_turnover', 8, 4),
  ],
  naturalKey: ['symbol', 'fiscal_period', 'fiscal_year'],
};

export const portfolioPositions: DestinationDefinition = {
  schema: 'analytics',
  table: 'portfolio_positions',
  columns: [
    { name: 'portfolio_id', type: 'string', nullable: false },
    { name: 'symbol', type: 'string', nullable: false },
    { name: 'position_date', type: 'date', nullable: false },
    decimal('quantity', 18, 4),
    decimal('avg_cost', 18, 4),
    decimal('current_price', 18, 4),
    decimal('market_value', 20, 2),
    decimal('unrealized_pnl', 20, 2),
    decimal('weight', 6, 4),
  ],
  naturalKey: ['portfolio_id', 'symbol', 'position_date'],
  partitionKey: ['position_date'],
};

/** Catalog preloaded with the analytics tables. */
export function builtinCatalog(): DestinationCatalog {
  return new DestinationCatalog([dailyStockAnalytics, financialRatios, portfolioPositions]);
}
