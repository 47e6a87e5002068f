import type { CellValue, RawRecord, RecordBatch } from '@ledgerline/core';

/** Output scale per column, overriding the defaults. */
export type ScaleOverrides = Readonly<Record<string, number>>;

/** Per-entity technical indicators over a price series. */
export interface StockAnalyticsSpec {
  readonly kind: 'stock';
  /** Default: `'symbol'`. */
  readonly entityColumn?: string;
  /** Default: `'trade_date'`. */
  readonly timeColumn?: string;
  /** Default: `'close_price'`. */
  readonly priceColumn?: string;
  /** Default: `[20, 50, 200]`. */
  readonly movingAverageWindows?: readonly number[];
  /** Returns in the volatility window. Default: `20`. */
  readonly volatilityWindow?: number;
  /** Price changes in the RSI window. Default: `14`. */
  readonly rsiPeriod?: number;
  readonly scales?: ScaleOverrides;
}

/** Ratios over one reporting period of one company. */
export interface RatioSpec {
  readonly kind: 'ratios';
  readonly scales?: ScaleOverrides;
}

/** Valuation and weights of portfolio positions. */
export interface PortfolioSpec {
  readonly kind: 'portfolio';
  readonly scales?: ScaleOverrides;
}

export interface LookupTable {
  /** Suffix for columns that collide with the input, e.g. `_sectors`. */
  readonly name: string;
  readonly joinKey: string;
  readonly rows: RecordBatch;
}

export interface MetadataColumns {
  readonly sourceSystem: string;
  /** Stamped as given; the transformer never reads the clock. */
  readonly loadTimestamp: Date;
  /** Add `record_hash`. Default: `true`. */
  readonly recordHash?: boolean;
}

export type DerivedColumn = (record: RawRecord) => CellValue;

/** Left joins, derived columns and metadata stamping. */
export interface EnrichmentSpec {
  readonly kind: 'enrichment';
  readonly lookups?: readonly LookupTable[];
  /** Applied in insertion order, after the joins. */
  readonly derived?: Readonly<Record<string, DerivedColumn>>;
  readonly metadata?: MetadataColumns;
}

export type AggregateFunction = 'sum' | 'mean' | 'min' | 'max' | 'count';

export interface AggregateColumn {
  readonly column: string;
  readonly fn: AggregateFunction;
  /** Default: `<column>_<fn>`. */
  readonly as?: string;
}

/** Group-by with declared aggregates. One output row per key, ordered by key. */
export interface AggregationSpec {
  readonly kind: 'aggregation';
  readonly groupBy: readonly string[];
  readonly aggregates: readonly AggregateColumn[];
  readonly scales?: ScaleOverrides;
}

export type Frequency = 'D' | 'W' | 'M' | 'Q' | 'Y';

/** Calendar bucketing of a time column. */
export interface TimeSeriesAggregationSpec {
  readonly kind: 'time_series_aggregation';
  readonly timeColumn: string;
  readonly frequency: Frequency;
  readonly valueColumns: readonly string[];
  /** Bucket per entity when set. */
  readonly entityColumn?: string;
  readonly scales?: ScaleOverrides;
}

export type TransformSpec =
  | StockAnalyticsSpec
  | RatioSpec
  | PortfolioSpec
  | EnrichmentSpec
  | AggregationSpec
  | TimeSeriesAggregationSpec;

export type TransformKind = TransformSpec['kind'];
