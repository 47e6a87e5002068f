import { describe, it, expect } from 'vitest';
import { aggregate, periodStart, timeSeriesAggregate } from '../../../../src/domain/services/transforms/aggregation.js';

describe('aggregate', () => {
  const rows = [
    { sector: 'Tech', v: 1 },
    { sector: 'Energy', v: '2.5' },
    { sector: 'Tech', v: 3 },
    { sector: 'Tech', v: null },
  ];

  it('should emit one row per key ordered by key', () => {
    const out = aggregate(rows, {
      kind: 'aggregation',
      groupBy: ['sector'],
      aggregates: [
        { column: 'v', fn: 'sum' },
        { column: 'v', fn: 'mean' },
        { column: 'v', fn: 'count' },
        { column: 'v', fn: 'max', as: 'v_peak' },
      ],
    });

    expect(out).toEqual([
      { sector: 'Energy', v_sum: '2.5000', v_mean: '2.5000', v_count: 1, v_peak: '2.5000' },
      { sector: 'Tech', v_sum: '4.0000', v_mean: '2.0000', v_count: 2, v_peak: '3.0000' },
    ]);
  });

  it('should leave the mean of an all-null group null', () => {
    const out = aggregate([{ sector: 'Tech', v: null }], {
      kind: 'aggregation',
      groupBy: ['sector'],
      aggregates: [
        { column: 'v', fn: 'mean' },
        { column: 'v', fn: 'min' },
      ],
      scales: { v_mean: 2 },
    });
    expect(out).toEqual([{ sector: 'Tech', v_mean: null, v_min: null }]);
  });
});

describe('periodStart', () => {
  it('should label periods by their UTC start', () => {
    expect(periodStart(Date.UTC(2024, 4, 15, 13), 'D')).toBe('2024-05-15');
    expect(periodStart(Date.UTC(2024, 0, 7), 'W')).toBe('2024-01-01');
    expect(periodStart(Date.UTC(2024, 0, 8), 'W')).toBe('2024-01-08');
    expect(periodStart(Date.UTC(2024, 1, 29), 'M')).toBe('2024-02-01');
    expect(periodStart(Date.UTC(2024, 4, 15), 'Q')).toBe('2024-04-01');
    expect(periodStart(Date.UTC(2024, 11, 31), 'Y')).toBe('2024-01-01');
  });
});

describe('timeSeriesAggregate', () => {
  it('should bucket rows into Monday-based weeks', () => {
    const { rows, skipped } = timeSeriesAggregate(
      [
        { d: '2024-01-01', v: 1 },
        { d: '2024-01-03', v: 2 },
        { d: '2024-01-08', v: 4 },
        { d: 'someday', v: 8 },
      ],
      { kind: 'time_series_aggregation', timeColumn: 'd', frequency: 'W', valueColumns: ['v'] },
    );

    expect(skipped).toBe(1);
    expect(rows).toEqual([
      { d: '2024-01-01', v_mean: '1.5000', v_sum: '3.0000', v_min: '1.0000', v_max: '2.0000', v_count: 2 },
      { d: '2024-01-08', v_mean: '4.0000', v_sum: '4.0000', v_min: '4.0000', v_max: '4.0000', v_count: 1 },
    ]);
  });

  it('should bucket per entity when asked', () => {
    const { rows } = timeSeriesAggregate(
      [
        { s: 'MSFT', d: '2024-01-15', v: 1 },
        { s: 'AAPL', d: '2024-01-20', v: 2 },
        { s: 'AAPL', d: '2024-02-01', v: 3 },
      ],
      { kind: 'time_series_aggregation', timeColumn: 'd', frequency: 'M', valueColumns: ['v'], entityColumn: 's' },
    );
    expect(rows.map((r) => `${String(r['s'])}@${String(r['d'])}`)).toEqual([
      'AAPL@2024-01-01',
      'AAPL@2024-02-01',
      'MSFT@2024-01-01',
    ]);
  });
});
