import { describe, it, expect } from 'vitest';
import { stockAnalytics } from '../../../../src/domain/services/transforms/stock.js';
import { column, priceRecords } from '../../../support/fixtures.js';

describe('stockAnalytics', () => {
  it('should leave the 20-day average null with 19 observations', () => {
    const rows = stockAnalytics(priceRecords(['AAPL'], 19), { kind: 'stock' });
    expect(column(rows, 'moving_avg_20d').every((v) => v === null)).toBe(true);
  });

  it('should define the 20-day average only on the 20th observation', () => {
    const rows = stockAnalytics(priceRecords(['AAPL'], 20), { kind: 'stock' });
    const averages = column(rows, 'moving_avg_20d');

    expect(averages.slice(0, 19).every((v) => v === null)).toBe(true);
    expect(averages[19]).toBe('109.5000');
  });

  it('should compute daily returns against the previous close', () => {
    const rows = stockAnalytics(priceRecords(['AAPL'], 3), { kind: 'stock' });
    expect(column(rows, 'daily_return')).toEqual([null, '0.010000', '0.009901']);
  });

  it('should read RSI 100 after 14 non-negative changes', () => {
    const rows = stockAnalytics(priceRecords(['AAPL'], 15), { kind: 'stock' });
    const rsi = column(rows, 'rsi_14d');

    expect(rsi[13]).toBeNull();
    expect(rsi[14]).toBe('100.00');
  });

  it('should need 20 returns for volatility', () => {
    const rows = stockAnalytics(priceRecords(['AAPL'], 21, () => 50), { kind: 'stock' });
    const volatility = column(rows, 'volatility_20d');

    expect(volatility[19]).toBeNull();
    expect(volatility[20]).toBe('0.000000');
  });

  it('should skip null closes and bridge to the last known close', () => {
    const closes = [100, null, 110];
    const rows = stockAnalytics(priceRecords(['AAPL'], 3, (day) => closes[day] ?? null), {
      kind: 'stock',
      movingAverageWindows: [2],
    });

    expect(rows[1]).toMatchObject({ daily_return: null, moving_avg_2d: null, rsi_14d: null });
    expect(rows[2]).toMatchObject({ daily_return: '0.100000', moving_avg_2d: '105.0000' });
  });

  it('should return null after a zero close', () => {
    const closes = [0, 5];
    const rows = stockAnalytics(priceRecords(['AAPL'], 2, (day) => closes[day] ?? null), { kind: 'stock' });
    expect(column(rows, 'daily_return')).toEqual([null, null]);
  });

  it('should reset the windows at each entity', () => {
    const rows = stockAnalytics(priceRecords(['AAPL', 'MSFT'], 2), { kind: 'stock', movingAverageWindows: [2] });

    expect(column(rows, 'symbol')).toEqual(['AAPL', 'AAPL', 'MSFT', 'MSFT']);
    expect(column(rows, 'daily_return')).toEqual([null, '0.010000', null, '0.010000']);
    expect(column(rows, 'moving_avg_2d')).toEqual([null, '100.5000', null, '100.5000']);
  });

  it('should sort unordered input by entity and date', () => {
    const input = priceRecords(['MSFT', 'AAPL'], 3).reverse();
    const rows = stockAnalytics(input, { kind: 'stock' });

    expect(column(rows, 'symbol')).toEqual(['AAPL', 'AAPL', 'AAPL', 'MSFT', 'MSFT', 'MSFT']);
    expect(column(rows, 'trade_date')).toEqual([
      '2024-01-01',
      '2024-01-02',
      '2024-01-03',
      '2024-01-01',
      '2024-01-02',
      '2024-01-03',
    ]);
  });

  it('should honour column names and scale overrides', () => {
    const input = [
      { ticker: 'AAPL', day: '2024-01-01', px: '10' },
      { ticker: 'AAPL', day: '2024-01-02', px: '11' },
    ];
    const rows = stockAnalytics(input, {
      kind: 'stock',
      entityColumn: 'ticker',
      timeColumn: 'day',
      priceColumn: 'px',
      scales: { daily_return: 2 },
    });
    expect(rows[1]?.['daily_return']).toBe('0.10');
  });

  it('should produce deep-equal output for the same input', () => {
    const input = priceRecords(['AAPL', 'MSFT'], 40, (day) => 100 + ((day * 7) % 11) - 5);
    expect(stockAnalytics(input, { kind: 'stock' })).toEqual(stockAnalytics(input, { kind: 'stock' }));
  });
});
