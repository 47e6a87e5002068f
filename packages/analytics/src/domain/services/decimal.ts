import { Decimal } from 'decimal.js';
import type { CellValue } from '@ledgerline/core';
import type { ScaleOverrides } from '../model/TransformSpec.js';

/** Decimal constructor for all analytics arithmetic. */
export const Dec = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Decimal reading of a cell, `null` for empty or non-numeric cells. */
export function toDecimal(value: CellValue | undefined): Decimal | null {
  if (typeof value === 'number') return Number.isFinite(value) ? new Dec(value) : null;
  if (typeof value === 'string') {
    const text = value.trim();
    return NUMERIC.test(text) ? new Dec(text) : null;
  }
  return null;
}

/** `numerator / denominator`, or `null` when either is missing or the denominator is zero. */
export function safeDiv(numerator: Decimal | null, denominator: Decimal | null): Decimal | null {
  if (numerator === null || denominator === null || denominator.isZero()) return null;
  return numerator.div(denominator);
}

/** Fixed-scale string, rounded half up. */
export function formatDecimal(value: Decimal | null, scale: number): string | null {
  if (value === null || !value.isFinite()) return null;
  const text = value.toFixed(scale, Decimal.ROUND_HALF_UP);
  return /^-0(\.0+)?$/.test(text) ? text.slice(1) : text;
}

const DEFAULT_SCALES: readonly (readonly [RegExp, number])[] = [
  [/^daily_return$/, 6],
  [/^volatility_\d+d$/, 6],
  [/^moving_avg_\d+d$/, 4],
  [/^rsi_\d+d$/, 2],
  [/^(market_value|unrealized_pnl)$/, 2],
];

/** Output scale for a column: override, else the warehouse default, else 4. */
export function scaleOf(column: string, overrides: ScaleOverrides = {}): number {
  const override = overrides[column];
  if (override !== undefined) return override;
  return DEFAULT_SCALES.find(([pattern]) => pattern.test(column))?.[1] ?? 4;
}
