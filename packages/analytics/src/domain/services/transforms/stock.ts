import type { Decimal } from 'decimal.js';
import type { RawRecord, RecordBatch } from '@ledgerline/core';
import type { StockAnalyticsSpec } from '../../model/TransformSpec.js';
import { formatDecimal, scaleOf, toDecimal } from '../decimal.js';
import { MovingAverage, RollingStdDev, WilderRsi } from '../indicators.js';
import { ensureSorted } from '../ordering.js';

const DEFAULT_WINDOWS = [20, 50, 200] as const;

/** Indicator state of one entity. */
class EntitySeries {
  private lastClose: Decimal | null = null;
  private readonly averages: MovingAverage[];
  private readonly volatility: RollingStdDev;
  private readonly rsi: WilderRsi;

  constructor(
    private readonly windows: readonly number[],
    volatilityWindow: number,
    rsiPeriod: number,
  ) {
    this.averages = windows.map((w) => new MovingAverage(w));
    this.volatility = new RollingStdDev(volatilityWindow);
    this.rsi = new WilderRsi(rsiPeriod);
  }

  /** Consume one close. Null closes leave the state untouched. */
  next(close: Decimal | null): {
    dailyReturn: Decimal | null;
    averages: (Decimal | null)[];
    volatility: Decimal | null;
    rsi: Decimal | null;
  } {
    if (close === null) {
      return { dailyReturn: null, averages: this.windows.map(() => null), volatility: null, rsi: null };
    }

    const previous = this.lastClose;
    this.lastClose = close;

    let dailyReturn: Decimal | null = null;
    let volatility: Decimal | null = null;
    let rsi: Decimal | null = null;
    if (previous !== null) {
      if (!previous.isZero()) {
        dailyReturn = close.div(previous).minus(1);
        volatility = this.volatility.push(dailyReturn);
      }
      rsi = this.rsi.push(close.minus(previous));
    }

    return { dailyReturn, averages: this.averages.map((ma) => ma.push(close)), volatility, rsi };
  }
}

/**
 * Daily return, moving averages, return volatility and RSI per entity.
 *
 * Rows come back ordered by entity then time. State resets at every entity boundary.
 */
export function stockAnalytics(batch: RecordBatch, spec: StockAnalyticsSpec): RawRecord[] {
  const entity = spec.entityColumn ?? 'symbol';
  const time = spec.timeColumn ?? 'trade_date';
  const price = spec.priceColumn ?? 'close_price';
  const windows: readonly number[] = spec.movingAverageWindows ?? DEFAULT_WINDOWS;
  const volatilityWindow = spec.volatilityWindow ?? 20;
  const rsiPeriod = spec.rsiPeriod ?? 14;

  const returnColumn = 'daily_return';
  const averageColumns = windows.map((w) => `moving_avg_${w}d`);
  const volatilityColumn = `volatility_${volatilityWindow}d`;
  const rsiColumn = `rsi_${rsiPeriod}d`;
  const scale = (column: string) => scaleOf(column, spec.scales);

  const out: RawRecord[] = [];
  let currentEntity: string | null = null;
  let series = new EntitySeries(windows, volatilityWindow, rsiPeriod);

  for (const record of ensureSorted(batch, [entity, time])) {
    const key = String(record[entity] ?? '');
    if (key !== currentEntity) {
      currentEntity = key;
      series = new EntitySeries(windows, volatilityWindow, rsiPeriod);
    }

    const step = series.next(toDecimal(record[price]));
    const row: Record<string, RawRecord[string]> = { ...record };
    row[returnColumn] = formatDecimal(step.dailyReturn, scale(returnColumn));
    averageColumns.forEach((column, i) => {
      row[column] = formatDecimal(step.averages[i] ?? null, scale(column));
    });
    row[volatilityColumn] = formatDecimal(step.volatility, scale(volatilityColumn));
    row[rsiColumn] = formatDecimal(step.rsi, scale(rsiColumn));
    out.push(row);
  }
  return out;
}
