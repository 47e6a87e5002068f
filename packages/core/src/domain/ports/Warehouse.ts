import type { DestinationDefinition } from '../model/Destination.js';
import type { RawRecord } from '../model/Record.js';

/** Operations available inside a warehouse transaction. */
export interface WarehouseSession {
  /** Normalized natural keys (see `naturalKeyOf`) of the given records that already exist in the destination. */
  findExistingKeys(destination: DestinationDefinition, records: readonly RawRecord[]): Promise<ReadonlySet<string>>;
  /** Insert all records with one multi-row statement. */
  insertRows(destination: DestinationDefinition, records: readonly RawRecord[]): Promise<void>;
  /** Insert-or-update all records keyed by the natural key with one multi-row statement. */
  upsertRows(destination: DestinationDefinition, records: readonly RawRecord[]): Promise<void>;
  /**
   * Delete the rows sharing a partition-key value with any of the given records,
   * or every row when the destination declares no partition key. Returns the deleted count.
   */
  deletePartitions(destination: DestinationDefinition, records: readonly RawRecord[]): Promise<number>;
}

/**
 * Port for the target warehouse.
 *
 * `transaction()` commits when `work` resolves and rolls back when it rejects, re-throwing the error.
 */
export interface Warehouse {
  transaction<T>(work: (session: WarehouseSession) => Promise<T>): Promise<T>;
}
