import { LeaseExpired, LoadCancelled, RunStatus } from '@ledgerline/core';
import type { BulkLoader, DestinationDefinition, LoadOptions, LoadResult, Logger, RawRecord } from '@ledgerline/core';
import type { Stage } from '../../domain/Stage.js';
import type { RunContext } from '../RunContext.js';

export interface LoadBatchOptions extends LoadOptions {
  /** Reloads through upsert after the lease lapsed mid-load. Default: `1`. */
  readonly leaseRetries?: number;
}

/**
 * Writes the transformed rows through the bulk loader.
 *
 * A lease that lapsed during an upsert is retried by reloading the whole batch: upserts are
 * idempotent, so rows the first attempt committed are rewritten unchanged.
 */
export class LoadBatch implements Stage<RawRecord[], LoadResult> {
  readonly name = 'load';

  constructor(
    private readonly loader: BulkLoader,
    private readonly destination: DestinationDefinition,
    private readonly options: LoadBatchOptions,
    private readonly logger: Logger,
  ) {}

  async run(rows: RawRecord[], ctx: RunContext): Promise<LoadResult> {
    ctx.transitionTo(RunStatus.LOADING);
    const { leaseRetries = 1, ...loadOptions } = this.options;
    const mode = loadOptions.mode ?? 'upsert';

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await this.loader.load(rows, this.destination, loadOptions);
        ctx.load = result;
        return result;
      } catch (error) {
        if (error instanceof LoadCancelled) {
          ctx.load = error.partial;
        }
        if (error instanceof LeaseExpired && mode === 'upsert' && attempt < leaseRetries) {
          this.logger.warn({ runId: ctx.runId, resourceId: error.resourceId, attempt: attempt + 1 }, 'load_retry_after_lease_expiry');
          continue;
        }
        throw error;
      }
    }
  }
}
