import { randomUUID } from 'node:crypto';
import {
  DestinationCatalog,
  RunStatus,
  ValidationFailure,
  destinationId,
  errorMessage,
  silentLogger,
} from '@ledgerline/core';
import type {
  BulkLoader,
  DestinationDefinition,
  EventBus,
  LoadMode,
  Logger,
  RecordBatch,
  RunLogger,
  RunReport,
} from '@ledgerline/core';
import { WindowedTransformer } from '@ledgerline/analytics';
import type { TransformSpec } from '@ledgerline/analytics';
import { Validator, ruleSetFor } from '@ledgerline/quality';
import type { RuleSet, RuleSetConfig } from '@ledgerline/quality';
import { composeStages } from '../domain/Stage.js';
import { RunContext } from './RunContext.js';
import { LoadBatch } from './stages/LoadBatch.js';
import { TransformBatch } from './stages/TransformBatch.js';
import { ValidateBatch } from './stages/ValidateBatch.js';

export interface EtlPipelineOptions {
  readonly loader: BulkLoader;
  readonly runLogger: RunLogger;
  /** Destinations addressable by id. */
  readonly catalog?: DestinationCatalog;
  /** Rule sets addressable by dataset name. */
  readonly ruleSets?: RuleSetConfig;
  readonly transformer?: WindowedTransformer;
  readonly eventBus?: EventBus;
  readonly logger?: Logger;
  /** Default strictness of validation. Default: `true`. */
  readonly strict?: boolean;
  readonly clock?: () => number;
}

export interface RunOptions {
  /** Dataset name used for the run log and to look up the rule set. */
  readonly dataset?: string;
  /** Rule set to validate with; overrides the configured one for `dataset`. */
  readonly ruleSet?: RuleSet;
  /** Destination definition, or the id of one in the catalog. */
  readonly destination: DestinationDefinition | string;
  readonly transforms?: readonly TransformSpec[];
  /** Default: `'upsert'`. */
  readonly mode?: LoadMode;
  readonly batchSize?: number;
  readonly strict?: boolean;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
  /** Reloads after a lapsed lease, upsert only. Default: `1`. */
  readonly leaseRetries?: number;
}

/**
 * Runs a batch through validate → transform → load and records the run.
 *
 * A run that fails is logged as `FAILED` and its error propagates. In non-strict mode a
 * batch rejected by a batch-level rule returns its `FAILED` report instead; a missing
 * required column always propagates as `SchemaViolation`.
 */
export class EtlPipeline {
  private readonly loader: BulkLoader;
  private readonly runLogger: RunLogger;
  private readonly catalog: DestinationCatalog;
  private readonly ruleSets: RuleSetConfig;
  private readonly transformer: WindowedTransformer;
  private readonly eventBus: EventBus | null;
  private readonly logger: Logger;
  private readonly strict: boolean;
  private readonly clock: () => number;

  constructor(options: EtlPipelineOptions) {
    this.loader = options.loader;
    this.runLogger = options.runLogger;
    this.catalog = options.catalog ?? new DestinationCatalog();
    this.ruleSets = options.ruleSets ?? {};
    this.logger = (options.logger ?? silentLogger()).child({ component: 'pipeline' });
    this.transformer = options.transformer ?? new WindowedTransformer({ logger: this.logger });
    this.eventBus = options.eventBus ?? null;
    this.strict = options.strict ?? true;
    this.clock = options.clock ?? Date.now;
  }

  async run(batch: RecordBatch, options: RunOptions): Promise<RunReport> {
    const destination =
      typeof options.destination === 'string' ? this.catalog.resolve(options.destination) : options.destination;
    const ruleSet = options.ruleSet ?? ruleSetFor(this.ruleSets, options.dataset ?? destination.table);
    const strict = options.strict ?? this.strict;
    const target = destinationId(destination);

    const ctx = new RunContext(randomUUID(), ruleSet.dataset, target, batch.length, this.eventBus, this.clock);
    this.runLogger.started(ctx.runId, ctx.dataset, target, batch.length);
    ctx.emit({
      type: 'run:started',
      runId: ctx.runId,
      dataset: ctx.dataset,
      destination: target,
      totalRecords: batch.length,
      timestamp: ctx.now(),
    });

    const stages = composeStages(
      composeStages(
        new ValidateBatch(new Validator(ruleSet, { logger: this.logger }), strict),
        new TransformBatch(this.transformer, options.transforms ?? [], destination),
      ),
      new LoadBatch(
        this.loader,
        destination,
        {
          mode: options.mode,
          batchSize: options.batchSize,
          signal: options.signal,
          timeoutMs: options.timeoutMs,
          leaseRetries: options.leaseRetries,
        },
        this.logger,
      ),
    );

    try {
      await stages.run(batch, ctx);
    } catch (error) {
      const report = await this.fail(ctx, error);
      if (!strict && error instanceof ValidationFailure) {
        return report;
      }
      throw error;
    }

    const status = ctx.outcome();
    ctx.transitionTo(status);
    const report = ctx.report(status);
    await this.runLogger.completed(report);
    ctx.emit({ type: 'run:completed', runId: ctx.runId, status, timestamp: ctx.now() });
    return report;
  }

  private async fail(ctx: RunContext, error: unknown): Promise<RunReport> {
    const message = errorMessage(error);
    ctx.transitionTo(RunStatus.FAILED);
    const report = ctx.report(RunStatus.FAILED, message);
    try {
      await this.runLogger.completed(report);
    } catch (logError) {
      this.logger.error({ err: logError, runId: ctx.runId }, 'run_log_failed');
    }
    ctx.emit({ type: 'run:failed', runId: ctx.runId, error: message, timestamp: ctx.now() });
    return report;
  }
}
