// Transform specs
export type {
  TransformSpec,
  TransformKind,
  ScaleOverrides,
  StockAnalyticsSpec,
  RatioSpec,
  PortfolioSpec,
  EnrichmentSpec,
  LookupTable,
  MetadataColumns,
  DerivedColumn,
  AggregationSpec,
  AggregateColumn,
  AggregateFunction,
  TimeSeriesAggregationSpec,
  Frequency,
} from './domain/model/TransformSpec.js';

// Transformer
export { WindowedTransformer, transform, transformAll } from './domain/services/WindowedTransformer.js';
export type { WindowedTransformerOptions } from './domain/services/WindowedTransformer.js';

// Building blocks
export { RollingWindow } from './domain/services/RollingWindow.js';
export { MovingAverage, RollingStdDev, WilderRsi } from './domain/services/indicators.js';
export { Dec, toDecimal, safeDiv, formatDecimal, scaleOf } from './domain/services/decimal.js';
export { recordHash, leftJoin } from './domain/services/transforms/enrichment.js';
export { periodStart } from './domain/services/transforms/aggregation.js';
