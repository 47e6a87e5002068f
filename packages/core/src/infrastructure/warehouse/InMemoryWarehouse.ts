import type { DestinationDefinition } from '../../domain/model/Destination.js';
import { destinationId, naturalKeyOf, partitionKeyOf } from '../../domain/model/Destination.js';
import type { RawRecord } from '../../domain/model/Record.js';
import type { Warehouse, WarehouseSession } from '../../domain/ports/Warehouse.js';

/** Write about to be applied inside a transaction. */
export interface WriteOperation {
  readonly destination: string;
  readonly operation: 'insert' | 'upsert' | 'delete';
  readonly records: readonly RawRecord[];
}

export interface InMemoryWarehouseOptions {
  /** Called before every write. Throwing from it fails the write and rolls the transaction back. */
  readonly beforeWrite?: (write: WriteOperation) => void | Promise<void>;
}

type Table = Map<string, RawRecord>;

/**
 * Warehouse held in memory, keyed by normalized natural key.
 *
 * Transactions work on copies of the tables they touch and swap them in on commit, so a
 * rolled-back transaction leaves nothing behind.
 */
export class InMemoryWarehouse implements Warehouse {
  private tables = new Map<string, Table>();
  private readonly beforeWrite: InMemoryWarehouseOptions['beforeWrite'];
  transactionCount = 0;
  rollbackCount = 0;

  constructor(options: InMemoryWarehouseOptions = {}) {
    this.beforeWrite = options.beforeWrite;
  }

  async transaction<T>(work: (session: WarehouseSession) => Promise<T>): Promise<T> {
    this.transactionCount++;
    const drafts = new Map<string, Table>();
    const tableFor = (destination: DestinationDefinition): Table => {
      const id = destinationId(destination);
      let draft = drafts.get(id);
      if (!draft) {
        draft = new Map(this.tables.get(id));
        drafts.set(id, draft);
      }
      return draft;
    };

    const session: WarehouseSession = {
      findExistingKeys: (destination, records) => {
        const table = tableFor(destination);
        const found = new Set<string>();
        for (const record of records) {
          const key = naturalKeyOf(record, destination);
          if (key !== null && table.has(key)) found.add(key);
        }
        return Promise.resolve(found);
      },
      insertRows: async (destination, records) => {
        await this.beforeWrite?.({ destination: destinationId(destination), operation: 'insert', records });
        const table = tableFor(destination);
        for (const record of records) {
          const key = this.requireKey(record, destination);
          if (table.has(key)) {
            throw new Error(`Duplicate key ${key} violates unique constraint on ${destinationId(destination)}`);
          }
          table.set(key, { ...record });
        }
      },
      upsertRows: async (destination, records) => {
        await this.beforeWrite?.({ destination: destinationId(destination), operation: 'upsert', records });
        const table = tableFor(destination);
        for (const record of records) {
          const key = this.requireKey(record, destination);
          table.set(key, { ...table.get(key), ...record });
        }
      },
      deletePartitions: async (destination, records) => {
        await this.beforeWrite?.({ destination: destinationId(destination), operation: 'delete', records });
        const table = tableFor(destination);
        const before = table.size;
        if (!destination.partitionKey || destination.partitionKey.length === 0) {
          table.clear();
          return before;
        }
        const partitions = new Set(records.map((r) => partitionKeyOf(r, destination)));
        for (const [key, row] of table) {
          if (partitions.has(partitionKeyOf(row, destination))) table.delete(key);
        }
        return before - table.size;
      },
    };

    try {
      const result = await work(session);
      for (const [id, draft] of drafts) {
        this.tables.set(id, draft);
      }
      return result;
    } catch (error) {
      this.rollbackCount++;
      throw error;
    }
  }

  /** Rows of a destination in insertion order. */
  rows(destination: DestinationDefinition | string): readonly RawRecord[] {
    const id = typeof destination === 'string' ? destination : destinationId(destination);
    return [...(this.tables.get(id)?.values() ?? [])];
  }

  /** Replace the committed contents of a destination. */
  seed(destination: DestinationDefinition, records: readonly RawRecord[]): void {
    const table: Table = new Map();
    for (const record of records) {
      table.set(this.requireKey(record, destination), { ...record });
    }
    this.tables.set(destinationId(destination), table);
  }

  private requireKey(record: RawRecord, destination: DestinationDefinition): string {
    const key = naturalKeyOf(record, destination);
    if (key === null) {
      throw new Error(`Null value in natural key of ${destinationId(destination)}`);
    }
    return key;
  }
}
