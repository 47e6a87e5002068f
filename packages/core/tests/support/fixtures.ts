import type { DestinationDefinition } from '../../src/domain/model/Destination.js';
import type { RawRecord } from '../../src/domain/model/Record.js';

export const pricesDestination: DestinationDefinition = {
  schema: 'analytics',
  table: 'daily_prices',
  columns: [
    { name: 'symbol', type: 'string' },
    { name: 'trade_date', type: 'date' },
    { name: 'close_price', type: 'decimal', precision: 18, scale: 4 },
  ],
  naturalKey: ['symbol', 'trade_date'],
  partitionKey: ['trade_date'],
};

/** ISO date `offset` days after 2024-01-01. */
export function isoDay(offset: number): string {
  return new Date(Date.UTC(2024, 0, 1 + offset)).toISOString().slice(0, 10);
}

/** `days` consecutive daily closes for each symbol, ordered by symbol then date. */
export function priceRecords(symbols: readonly string[], days: number, close = (day: number) => 100 + day): RawRecord[] {
  const records: RawRecord[] = [];
  for (const symbol of symbols) {
    for (let day = 0; day < days; day++) {
      records.push({ symbol, trade_date: isoDay(day), close_price: close(day) });
    }
  }
  return records;
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
