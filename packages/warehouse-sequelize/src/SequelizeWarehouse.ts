import { ConnectionAcquireTimeoutError, ConnectionTimedOutError, Op } from 'sequelize';
import type { Sequelize, Transaction, WhereOptions } from 'sequelize';
import {
  ResourceUnavailable,
  destinationId,
  naturalKeyOf,
  partitionKeyOf,
  silentLogger,
} from '@ledgerline/core';
import type { DestinationDefinition, Logger, RawRecord, Warehouse, WarehouseSession } from '@ledgerline/core';
import { defineDestinationModel, tableLocationOf } from './models/DestinationModel.js';
import type { DestinationModel } from './models/DestinationModel.js';
import { carriedColumns, pick, toRecord, toRow } from './mappers/RowMapper.js';
import type { ColumnValues } from './mappers/RowMapper.js';

export interface SequelizeWarehouseOptions {
  /** Key tuples per lookup or delete statement. Default: `200`. */
  readonly keysPerStatement?: number;
  readonly logger?: Logger;
}

/** `(a = ? AND b = ?) OR ...` over the distinct tuples, or `IN` for a single column. */
function tupleWhere(tuples: ColumnValues[], columns: readonly string[]): WhereOptions {
  const [only] = columns;
  if (columns.length === 1 && only !== undefined) {
    return { [only]: { [Op.in]: tuples.map((t) => t[only] ?? null) } };
  }
  return { [Op.or]: tuples };
}

function distinctTuples(
  records: readonly RawRecord[],
  destination: DestinationDefinition,
  columns: readonly string[],
  keyOf: (record: RawRecord) => string | null,
): ColumnValues[] {
  const seen = new Map<string, ColumnValues>();
  for (const record of records) {
    const key = keyOf(record);
    if (key !== null && !seen.has(key)) seen.set(key, pick(record, destination, columns));
  }
  return [...seen.values()];
}

function slices<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/**
 * Warehouse backed by a relational database through Sequelize.
 *
 * Each destination maps to a model whose primary key is the natural key, so upserts resolve
 * conflicts on it. Call `sync()` for the destinations a process writes before the first load
 * when the tables are not provisioned elsewhere.
 */
export class SequelizeWarehouse implements Warehouse {
  private readonly models = new Map<string, DestinationModel>();
  private readonly keysPerStatement: number;
  private readonly logger: Logger;
  private readonly nativeSchemas: boolean;

  constructor(
    private readonly sequelize: Sequelize,
    options: SequelizeWarehouseOptions = {},
  ) {
    this.keysPerStatement = Math.max(1, options.keysPerStatement ?? 200);
    this.logger = (options.logger ?? silentLogger()).child({ component: 'sequelize_warehouse' });
    this.nativeSchemas = sequelize.getDialect() !== 'sqlite';
  }

  /** Create the destination tables (and their schemas) that do not exist yet. */
  async sync(destinations: readonly DestinationDefinition[]): Promise<void> {
    for (const destination of destinations) {
      if (destination.schema && this.nativeSchemas) {
        await this.sequelize.createSchema(destination.schema, { logging: false });
      }
      await this.modelFor(destination).sync();
      this.logger.debug({ destination: destinationId(destination) }, 'destination_synced');
    }
  }

  async transaction<T>(work: (session: WarehouseSession) => Promise<T>): Promise<T> {
    try {
      return await this.sequelize.transaction((transaction) => work(this.sessionFor(transaction)));
    } catch (error) {
      if (error instanceof ConnectionAcquireTimeoutError || error instanceof ConnectionTimedOutError) {
        throw new ResourceUnavailable(`Warehouse connection unavailable: ${error.message}`, error);
      }
      throw error;
    }
  }

  /** Every row of a destination, ordered by its natural key. */
  async rows(destination: DestinationDefinition): Promise<RawRecord[]> {
    const instances = await this.modelFor(destination).findAll({
      order: destination.naturalKey.map((column): [string, string] => [column, 'ASC']),
    });
    const columns = destination.columns.map((c) => c.name);
    return instances.map((instance) => toRecord(instance, columns));
  }

  private sessionFor(transaction: Transaction): WarehouseSession {
    return {
      findExistingKeys: async (destination, records) => {
        const model = this.modelFor(destination);
        const columns = destination.naturalKey;
        const tuples = distinctTuples(records, destination, columns, (r) => naturalKeyOf(r, destination));
        const found = new Set<string>();
        for (const slice of slices(tuples, this.keysPerStatement)) {
          const existing = await model.findAll({
            attributes: [...columns],
            where: tupleWhere(slice, columns),
            transaction,
          });
          for (const instance of existing) {
            const key = naturalKeyOf(toRecord(instance, columns), destination);
            if (key !== null) found.add(key);
          }
        }
        return found;
      },

      insertRows: async (destination, records) => {
        await this.modelFor(destination).bulkCreate(
          records.map((r) => toRow(r, destination)),
          { transaction },
        );
      },

      upsertRows: async (destination, records) => {
        const keys = new Set(destination.naturalKey);
        const carried = carriedColumns(records, destination);
        const fields = [...carried];
        const updatable = fields.filter((name) => !keys.has(name));
        await this.modelFor(destination).bulkCreate(
          records.map((r) => toRow(r, destination, carried)),
          updatable.length > 0
            ? { transaction, fields, updateOnDuplicate: updatable }
            : { transaction, fields, ignoreDuplicates: true },
        );
      },

      deletePartitions: async (destination, records) => {
        const model = this.modelFor(destination);
        const columns = destination.partitionKey ?? [];
        if (columns.length === 0) {
          return model.destroy({ where: {}, transaction });
        }
        const tuples = distinctTuples(records, destination, columns, (r) => partitionKeyOf(r, destination));
        let deleted = 0;
        for (const slice of slices(tuples, this.keysPerStatement)) {
          deleted += await model.destroy({ where: tupleWhere(slice, columns), transaction });
        }
        return deleted;
      },
    };
  }

  private modelFor(destination: DestinationDefinition): DestinationModel {
    const id = destinationId(destination);
    let model = this.models.get(id);
    if (!model) {
      model = defineDestinationModel(this.sequelize, destination, tableLocationOf(destination, this.nativeSchemas));
      this.models.set(id, model);
    }
    return model;
  }
}
