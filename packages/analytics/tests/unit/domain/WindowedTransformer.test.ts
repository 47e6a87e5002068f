import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { WindowedTransformer, transformAll } from '../../../src/domain/services/WindowedTransformer.js';
import { priceRecords } from '../../support/fixtures.js';

describe('WindowedTransformer', () => {
  it('should chain specs in order', () => {
    const rows = transformAll(priceRecords(['AAPL'], 2), [
      { kind: 'stock', movingAverageWindows: [2] },
      {
        kind: 'aggregation',
        groupBy: ['symbol'],
        aggregates: [{ column: 'moving_avg_2d', fn: 'max' }],
      },
    ]);
    expect(rows).toEqual([{ symbol: 'AAPL', moving_avg_2d_max: '100.5000' }]);
  });

  it('should return the input when an aggregation has no keys', () => {
    const input = priceRecords(['AAPL'], 2);
    const rows = new WindowedTransformer().transform(input, { kind: 'aggregation', groupBy: [], aggregates: [] });
    expect(rows).toEqual(input);
  });

  it('should log transform_completed with record counts', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });

    new WindowedTransformer({ logger }).transform(priceRecords(['AAPL'], 3), { kind: 'stock' });

    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      msg: 'transform_completed',
      component: 'transformer',
      kind: 'stock',
      inputRecords: 3,
      outputRecords: 3,
    });
  });
});
