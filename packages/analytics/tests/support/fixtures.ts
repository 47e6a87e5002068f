import type { RawRecord } from '@ledgerline/core';

/** ISO date `offset` days after 2024-01-01. */
export function isoDay(offset: number): string {
  return new Date(Date.UTC(2024, 0, 1 + offset)).toISOString().slice(0, 10);
}

/** `days` consecutive daily closes per symbol, ordered by symbol then date. */
export function priceRecords(
  symbols: readonly string[],
  days: number,
  close: (day: number) => number | null = (day) => 100 + day,
): RawRecord[] {
  const records: RawRecord[] = [];
  for (const symbol of symbols) {
    for (let day = 0; day < days; day++) {
      records.push({ symbol, trade_date: isoDay(day), close_price: close(day) });
    }
  }
  return records;
}

export function column(rows: readonly RawRecord[], name: string): RawRecord[string][] {
  return rows.map((row) => row[name]);
}
