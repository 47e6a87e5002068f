import { describe, it, expect } from 'vitest';
import pino from 'pino';
import type { RecordBatch, RunReport } from '@ledgerline/core';
import { ParallelRunner } from '../../../src/application/ParallelRunner.js';
import type { JobRunner, PipelineJob } from '../../../src/application/ParallelRunner.js';
import type { RunOptions } from '../../../src/application/EtlPipeline.js';

function reportFor(destination: string): RunReport {
  return {
    runId: `run-${destination}`,
    dataset: 'daily_stock_prices',
    destination,
    status: 'SUCCESS',
    counts: { extracted: 1, validated: 1, transformed: 1, loaded: 1, rejected: 0 },
    startedAt: 0,
    finishedAt: 0,
  };
}

/** Runner that settles each job after `delayMs` and tracks how many run at once. */
function trackingRunner(delayMs: number) {
  let active = 0;
  let peak = 0;
  const runner: JobRunner = {
    run: async (_batch: RecordBatch, options: RunOptions) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      active--;
      const destination = typeof options.destination === 'string' ? options.destination : options.destination.table;
      if (destination === 'broken') throw new Error('destination broken');
      return reportFor(destination);
    },
  };
  return { runner, peak: () => peak };
}

const job = (destination: string): PipelineJob => ({ batch: [], options: { destination } });

describe('ParallelRunner', () => {
  it('should never run more jobs at once than allowed', async () => {
    const { runner, peak } = trackingRunner(5);

    const results = await new ParallelRunner(runner).runAll(['a', 'b', 'c', 'd', 'e'].map(job), { maxConcurrent: 2 });

    expect(results).toHaveLength(5);
    expect(peak()).toBe(2);
  });

  it('should return one settled result per job in job order', async () => {
    const { runner } = trackingRunner(1);

    const results = await new ParallelRunner(runner).runAll([job('a'), job('broken'), job('c')]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    const first = results[0];
    expect(first?.status === 'fulfilled' && first.value.destination).toBe('a');
    const second = results[1];
    expect(second?.status === 'rejected' && second.reason).toEqual(new Error('destination broken'));
  });

  it('should log failed jobs and a summary', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });
    const { runner } = trackingRunner(1);

    await new ParallelRunner(runner, logger).runAll([job('broken'), job('b')]);

    const entries = lines.map((line): unknown => JSON.parse(line));
    expect(entries).toEqual([
      expect.objectContaining({ msg: 'job_failed', job: 0, error: 'destination broken', component: 'parallel_runner' }),
      expect.objectContaining({ msg: 'jobs_completed', jobs: 2, failed: 1 }),
    ]);
  });

  it('should return nothing for no jobs', async () => {
    const { runner } = trackingRunner(1);
    await expect(new ParallelRunner(runner).runAll([])).resolves.toEqual([]);
  });

  it('should reject a concurrency below one', async () => {
    const { runner } = trackingRunner(1);
    await expect(new ParallelRunner(runner).runAll([job('a')], { maxConcurrent: 0 })).rejects.toThrow(
      'maxConcurrent must be a positive integer, got 0',
    );
  });
});
