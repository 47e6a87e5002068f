import { silentLogger } from '@ledgerline/core';
import type { Logger, RawRecord, RecordBatch } from '@ledgerline/core';
import type { TransformSpec } from '../model/TransformSpec.js';
import { aggregate, timeSeriesAggregate } from './transforms/aggregation.js';
import { enrich } from './transforms/enrichment.js';
import { portfolioPositions } from './transforms/portfolio.js';
import { financialRatios } from './transforms/ratios.js';
import { stockAnalytics } from './transforms/stock.js';

export interface WindowedTransformerOptions {
  readonly logger?: Logger;
}

/**
 * Applies transform specs to record batches.
 *
 * Holds no state between calls: the same batch and spec always produce deep-equal output.
 */
export class WindowedTransformer {
  private readonly logger: Logger;

  constructor(options: WindowedTransformerOptions = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'transformer' });
  }

  transform(batch: RecordBatch, spec: TransformSpec): RawRecord[] {
    this.logger.debug({ kind: spec.kind, inputRecords: batch.length }, 'transform_started');
    const output = this.apply(batch, spec);
    this.logger.info({ kind: spec.kind, inputRecords: batch.length, outputRecords: output.length }, 'transform_completed');
    return output;
  }

  /** Apply specs in order, each to the previous output. */
  transformAll(batch: RecordBatch, specs: readonly TransformSpec[]): RawRecord[] {
    let current: RawRecord[] = [...batch];
    for (const spec of specs) {
      current = this.transform(current, spec);
    }
    return current;
  }

  private apply(batch: RecordBatch, spec: TransformSpec): RawRecord[] {
    switch (spec.kind) {
      case 'stock':
        return stockAnalytics(batch, spec);
      case 'ratios':
        return financialRatios(batch, spec);
      case 'portfolio':
        return portfolioPositions(batch, spec);
      case 'enrichment':
        return enrich(batch, spec, this.logger);
      case 'aggregation':
        if (spec.groupBy.length === 0 || spec.aggregates.length === 0) {
          this.logger.warn({ reason: 'missing_parameters' }, 'aggregation_skipped');
          return [...batch];
        }
        return aggregate(batch, spec);
      case 'time_series_aggregation': {
        const { rows, skipped } = timeSeriesAggregate(batch, spec);
        if (skipped > 0) {
          this.logger.warn({ column: spec.timeColumn, skipped }, 'unparseable_time_values');
        }
        return rows;
      }
    }
  }
}

/** One-shot transform with a silent logger. */
export function transform(batch: RecordBatch, spec: TransformSpec): RawRecord[] {
  return new WindowedTransformer().transform(batch, spec);
}

/** One-shot chain of transforms with a silent logger. */
export function transformAll(batch: RecordBatch, specs: readonly TransformSpec[]): RawRecord[] {
  return new WindowedTransformer().transformAll(batch, specs);
}
