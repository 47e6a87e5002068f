import type { Decimal } from 'decimal.js';
import { Dec } from './decimal.js';
import { RollingWindow } from './RollingWindow.js';

/** Mean of the trailing `window` observations, kept with a running sum. */
export class MovingAverage {
  private readonly values: RollingWindow<Decimal>;
  private sum = new Dec(0);

  constructor(readonly window: number) {
    this.values = new RollingWindow<Decimal>(window);
  }

  /** Add an observation. Returns the mean once the window is full. */
  push(value: Decimal): Decimal | null {
    const evicted = this.values.push(value);
    this.sum = this.sum.plus(value);
    if (evicted !== undefined) this.sum = this.sum.minus(evicted);
    return this.values.full ? this.sum.div(this.window) : null;
  }
}

/** Sample standard deviation of the trailing `window` observations. */
export class RollingStdDev {
  private readonly values: RollingWindow<Decimal>;

  constructor(readonly window: number) {
    if (window < 2) throw new Error(`Standard deviation needs a window of at least 2, got ${window}`);
    this.values = new RollingWindow<Decimal>(window);
  }

  push(value: Decimal): Decimal | null {
    this.values.push(value);
    if (!this.values.full) return null;

    const observations = this.values.values();
    const mean = observations.reduce((acc, v) => acc.plus(v), new Dec(0)).div(this.window);
    const squares = observations.reduce((acc, v) => acc.plus(v.minus(mean).pow(2)), new Dec(0));
    return squares.div(this.window - 1).sqrt();
  }
}

/**
 * Wilder's relative strength index.
 *
 * The first average is the simple mean of `period` changes; later ones are smoothed as
 * `(previous × (period − 1) + current) / period`. A zero average loss reads as 100.
 */
export class WilderRsi {
  private seen = 0;
  private gainSum = new Dec(0);
  private lossSum = new Dec(0);
  private avgGain: Decimal | null = null;
  private avgLoss: Decimal | null = null;

  constructor(readonly period: number) {
    if (!Number.isInteger(period) || period < 1) throw new Error(`RSI period must be a positive integer, got ${period}`);
  }

  /** Add one price change. Returns the RSI once `period` changes have been seen. */
  push(change: Decimal): Decimal | null {
    const gain = change.isPositive() && !change.isZero() ? change : new Dec(0);
    const loss = change.isNegative() && !change.isZero() ? change.negated() : new Dec(0);

    if (this.avgGain === null || this.avgLoss === null) {
      this.seen++;
      this.gainSum = this.gainSum.plus(gain);
      this.lossSum = this.lossSum.plus(loss);
      if (this.seen < this.period) return null;
      this.avgGain = this.gainSum.div(this.period);
      this.avgLoss = this.lossSum.div(this.period);
    } else {
      this.avgGain = this.avgGain.times(this.period - 1).plus(gain).div(this.period);
      this.avgLoss = this.avgLoss.times(this.period - 1).plus(loss).div(this.period);
    }

    if (this.avgLoss.isZero()) return new Dec(100);
    const rs = this.avgGain.div(this.avgLoss);
    return new Dec(100).minus(new Dec(100).div(rs.plus(1)));
  }
}
