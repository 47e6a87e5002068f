import {
  BulkLoader,
  EventBus,
  InMemoryLeaseStore,
  InMemoryRunLogSink,
  InMemoryWarehouse,
  LockManager,
  RunLogger,
} from '@ledgerline/core';
import type { DomainEvent, RawRecord, RunLogSink, WriteOperation } from '@ledgerline/core';
import type { RuleSet } from '@ledgerline/quality';
import { EtlPipeline } from '../../src/application/EtlPipeline.js';
import { builtinCatalog } from '../../src/catalog/destinations.js';

export const priceRules: RuleSet = {
  dataset: 'daily_stock_prices',
  keyColumns: ['symbol', 'trade_date'],
  rules: [
    { kind: 'schema', check: 'required_columns', columns: ['symbol', 'trade_date', 'close_price'] },
    { kind: 'completeness', check: 'not_null_rate', column: 'close_price' },
    { kind: 'accuracy', check: 'range', column: 'close_price', min: 0 },
  ],
};

export const statementRules: RuleSet = {
  dataset: 'financial_statements',
  rules: [{ kind: 'schema', check: 'required_columns', columns: ['symbol', 'fiscal_year', 'fiscal_period'] }],
};

/** ISO date `offset` days after 2024-01-01. */
export function isoDay(offset: number): string {
  return new Date(Date.UTC(2024, 0, 1 + offset)).toISOString().slice(0, 10);
}

export function priceRecords(symbols: readonly string[], days: number): RawRecord[] {
  return symbols.flatMap((symbol) =>
    Array.from({ length: days }, (_, day) => ({ symbol, trade_date: isoDay(day), close_price: 100 + day })),
  );
}

/** Clock whose time only moves when told to. */
export function manualClock(start = 1_700_000_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

export interface HarnessOptions {
  readonly beforeWrite?: (write: WriteOperation) => void | Promise<void>;
  readonly leaseTtlMs?: number;
  readonly sink?: RunLogSink;
  /** Use the wall clock and real backoff, for runs that contend for a lease. */
  readonly realTime?: boolean;
}

export function harness(options: HarnessOptions = {}) {
  const clock = manualClock();
  const now = options.realTime ? Date.now : clock.now;
  const eventBus = new EventBus();
  const events: DomainEvent[] = [];
  eventBus.onAny((event) => events.push(event));

  const warehouse = new InMemoryWarehouse({ beforeWrite: options.beforeWrite });
  const lockManager = new LockManager(
    new InMemoryLeaseStore(),
    options.realTime
      ? { baseDelayMs: 2, maxDelayMs: 10, maxAttempts: 100, eventBus }
      : { clock: clock.now, maxAttempts: 1, eventBus },
  );
  const loader = new BulkLoader({
    warehouse,
    lockManager,
    eventBus,
    leaseTtlMs: options.leaseTtlMs ?? 60_000,
    sleep: () => Promise.resolve(),
  });
  const sink = new InMemoryRunLogSink();
  const pipeline = new EtlPipeline({
    loader,
    runLogger: new RunLogger(options.sink ?? sink),
    catalog: builtinCatalog(),
    ruleSets: { daily_stock_prices: priceRules, financial_statements: statementRules },
    eventBus,
    clock: now,
  });
  return { clock, eventBus, events, warehouse, sink, pipeline };
}
