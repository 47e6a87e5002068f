import { errorMessage, silentLogger } from '@ledgerline/core';
import type { Logger, RecordBatch, RunReport } from '@ledgerline/core';
import type { EtlPipeline, RunOptions } from './EtlPipeline.js';

/** Anything that runs one job, usually an `EtlPipeline`. */
export type JobRunner = Pick<EtlPipeline, 'run'>;

export interface PipelineJob {
  readonly batch: RecordBatch;
  readonly options: RunOptions;
}

export interface RunAllOptions {
  /** Default: `4`. */
  readonly maxConcurrent?: number;
}

/**
 * Runs several pipeline jobs with bounded concurrency.
 *
 * Jobs on different destinations overlap; jobs on the same destination serialize on its lease.
 * Results come back in job order, one settled result per job.
 */
export class ParallelRunner {
  private readonly logger: Logger;

  constructor(
    private readonly pipeline: JobRunner,
    logger?: Logger,
  ) {
    this.logger = (logger ?? silentLogger()).child({ component: 'parallel_runner' });
  }

  async runAll(jobs: readonly PipelineJob[], options: RunAllOptions = {}): Promise<PromiseSettledResult<RunReport>[]> {
    const maxConcurrent = options.maxConcurrent ?? 4;
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }

    const results: PromiseSettledResult<RunReport>[] = [];
    const active = new Set<Promise<void>>();

    for (const [index, job] of jobs.entries()) {
      while (active.size >= maxConcurrent) {
        await Promise.race(active);
      }

      const running: Promise<void> = this.pipeline
        .run(job.batch, job.options)
        .then(
          (report) => {
            results[index] = { status: 'fulfilled', value: report };
          },
          (reason: unknown) => {
            this.logger.error({ job: index, error: errorMessage(reason) }, 'job_failed');
            results[index] = { status: 'rejected', reason };
          },
        )
        .finally(() => {
          active.delete(running);
        });
      active.add(running);
    }

    await Promise.all(active);
    this.logger.info(
      { jobs: jobs.length, failed: results.filter((r) => r.status === 'rejected').length },
      'jobs_completed',
    );
    return results;
  }
}
