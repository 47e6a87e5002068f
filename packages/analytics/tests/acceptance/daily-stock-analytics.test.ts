import { describe, it, expect } from 'vitest';
import { transformAll } from '../../src/domain/services/WindowedTransformer.js';
import type { TransformSpec } from '../../src/domain/model/TransformSpec.js';
import { priceRecords } from '../support/fixtures.js';

describe('Acceptance: daily stock analytics', () => {
  const specs: TransformSpec[] = [
    { kind: 'stock' },
    {
      kind: 'enrichment',
      metadata: { sourceSystem: 'vendor-feed', loadTimestamp: new Date(Date.UTC(2024, 2, 1)) },
    },
  ];
  const input = priceRecords(['AAPL', 'MSFT', 'NVDA'], 60, (day) => 100 + ((day * 13) % 17) - 8);

  it('should be deterministic', () => {
    expect(transformAll(input, specs)).toEqual(transformAll(input, specs));
  });

  it('should define indicators only once enough history exists', () => {
    const rows = transformAll(input, specs);
    const defined = (column: string) => rows.filter((r) => r[column] !== null).length;

    expect(rows).toHaveLength(180);
    expect(defined('daily_return')).toBe(3 * 59);
    expect(defined('moving_avg_20d')).toBe(3 * 41);
    expect(defined('moving_avg_50d')).toBe(3 * 11);
    expect(defined('moving_avg_200d')).toBe(0);
    expect(defined('volatility_20d')).toBe(3 * 40);
    expect(defined('rsi_14d')).toBe(3 * 46);
  });

  it('should not modify the input batch', () => {
    const before = JSON.stringify(input);
    transformAll(input, specs);
    expect(JSON.stringify(input)).toBe(before);
  });
});
