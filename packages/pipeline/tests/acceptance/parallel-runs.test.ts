import { describe, it, expect } from 'vitest';
import { destinationId } from '@ledgerline/core';
import type { DomainEvent } from '@ledgerline/core';
import { ParallelRunner } from '../../src/application/ParallelRunner.js';
import type { PipelineJob } from '../../src/application/ParallelRunner.js';
import { dailyStockAnalytics, financialRatios } from '../../src/catalog/destinations.js';
import { harness, priceRecords } from '../support/harness.js';

const statement = {
  symbol: 'AAA',
  fiscal_year: 2023,
  fiscal_period: 'Q4',
  total_assets: 750,
  total_liabilities: 500,
  shareholders_equity: 250,
  current_assets: 300,
  current_liabilities: 150,
  inventory: 60,
  revenue: 400,
  net_income: 50,
};

function stockJob(symbol: string): PipelineJob {
  return {
    batch: priceRecords([symbol], 30),
    options: {
      dataset: 'daily_stock_prices',
      destination: destinationId(dailyStockAnalytics),
      transforms: [{ kind: 'stock' }],
      batchSize: 10,
    },
  };
}

/** Pairs of lease acquire/release per resource, in the order they were emitted. */
function leaseTimeline(events: readonly DomainEvent[], resourceId: string): string[] {
  return events.flatMap((event) =>
    (event.type === 'lease:acquired' || event.type === 'lease:released') && event.resourceId === resourceId
      ? [event.type]
      : [],
  );
}

describe('Parallel pipeline runs', () => {
  it('should load jobs on the same destination one lease at a time', async () => {
    const { pipeline, warehouse, sink, events } = harness({ realTime: true });
    const jobs: PipelineJob[] = [
      stockJob('AAA'),
      stockJob('BBB'),
      {
        batch: [statement],
        options: { dataset: 'financial_statements', destination: 'analytics.financial_ratios', transforms: [{ kind: 'ratios' }] },
      },
    ];

    const results = await new ParallelRunner(pipeline).runAll(jobs, { maxConcurrent: 3 });

    expect(results.map((r) => r.status === 'fulfilled' && r.value.status)).toEqual(['SUCCESS', 'SUCCESS', 'SUCCESS']);
    expect(warehouse.rows(dailyStockAnalytics)).toHaveLength(60);
    expect(sink.runs).toHaveLength(3);
    expect(leaseTimeline(events, 'analytics.daily_stock_analytics')).toEqual([
      'lease:acquired',
      'lease:released',
      'lease:acquired',
      'lease:released',
    ]);

    expect(warehouse.rows(financialRatios)).toEqual([
      expect.objectContaining({
        symbol: 'AAA',
        debt_to_equity: '2.0000',
        current_ratio: '2.0000',
        quick_ratio: '1.6000',
        roa: '0.0667',
        roe: '0.2000',
        profit_margin: '0.1250',
        asset_turnover: '0.5333',
      }),
    ]);
  });

  it('should rewrite rows unchanged when the same batch is loaded twice', async () => {
    const { pipeline, warehouse } = harness();
    const job = stockJob('AAA');

    const first = await pipeline.run(job.batch, job.options);
    const before = warehouse.rows(dailyStockAnalytics);
    const second = await pipeline.run(job.batch, job.options);

    expect(first.load?.recordsInserted).toBe(30);
    expect(second.load?.recordsInserted).toBe(0);
    expect(second.load?.recordsUpdated).toBe(30);
    expect(second.runId).not.toBe(first.runId);
    expect(warehouse.rows(dailyStockAnalytics)).toEqual(before);
  });
});
