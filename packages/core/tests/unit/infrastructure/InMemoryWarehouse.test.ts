import { describe, it, expect } from 'vitest';
import { InMemoryWarehouse } from '../../../src/infrastructure/warehouse/InMemoryWarehouse.js';
import { pricesDestination } from '../../support/fixtures.js';

describe('InMemoryWarehouse', () => {
  it('should commit writes when the transaction resolves', async () => {
    const warehouse = new InMemoryWarehouse();

    await warehouse.transaction((session) =>
      session.insertRows(pricesDestination, [{ symbol: 'AAA', trade_date: '2024-01-01', close_price: 10 }]),
    );

    expect(warehouse.rows(pricesDestination)).toEqual([{ symbol: 'AAA', trade_date: '2024-01-01', close_price: 10 }]);
  });

  it('should discard writes when the transaction rejects', async () => {
    const warehouse = new InMemoryWarehouse();

    await expect(
      warehouse.transaction(async (session) => {
        await session.insertRows(pricesDestination, [{ symbol: 'AAA', trade_date: '2024-01-01', close_price: 10 }]);
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(warehouse.rows(pricesDestination)).toEqual([]);
    expect(warehouse.rollbackCount).toBe(1);
  });

  it('should reject inserting an existing natural key', async () => {
    const warehouse = new InMemoryWarehouse();
    warehouse.seed(pricesDestination, [{ symbol: 'AAA', trade_date: '2024-01-01', close_price: 10 }]);

    await expect(
      warehouse.transaction((session) =>
        session.insertRows(pricesDestination, [{ symbol: 'AAA', trade_date: new Date(Date.UTC(2024, 0, 1)) }]),
      ),
    ).rejects.toThrow('Duplicate key AAA|2024-01-01');
  });

  it('should update in place on upsert and report existing keys', async () => {
    const warehouse = new InMemoryWarehouse();
    warehouse.seed(pricesDestination, [{ symbol: 'AAA', trade_date: '2024-01-01', close_price: 10 }]);
    const rows = [
      { symbol: 'AAA', trade_date: '2024-01-01', close_price: 11 },
      { symbol: 'BBB', trade_date: '2024-01-01', close_price: 20 },
    ];

    const existing = await warehouse.transaction(async (session) => {
      const found = await session.findExistingKeys(pricesDestination, rows);
      await session.upsertRows(pricesDestination, rows);
      return found;
    });

    expect([...existing]).toEqual(['AAA|2024-01-01']);
    expect(warehouse.rows(pricesDestination)).toEqual(rows);
  });

  it('should delete only the partitions present in the records', async () => {
    const warehouse = new InMemoryWarehouse();
    warehouse.seed(pricesDestination, [
      { symbol: 'AAA', trade_date: '2024-01-01', close_price: 10 },
      { symbol: 'AAA', trade_date: '2024-01-02', close_price: 11 },
      { symbol: 'BBB', trade_date: '2024-01-02', close_price: 21 },
    ]);

    const deleted = await warehouse.transaction((session) =>
      session.deletePartitions(pricesDestination, [{ symbol: 'CCC', trade_date: '2024-01-02' }]),
    );

    expect(deleted).toBe(2);
    expect(warehouse.rows(pricesDestination)).toEqual([{ symbol: 'AAA', trade_date: '2024-01-01', close_price: 10 }]);
  });

  it('should clear the whole table when no partition key is declared', async () => {
    const unpartitioned = { ...pricesDestination, partitionKey: undefined };
    const warehouse = new InMemoryWarehouse();
    warehouse.seed(unpartitioned, [
      { symbol: 'AAA', trade_date: '2024-01-01' },
      { symbol: 'BBB', trade_date: '2024-01-02' },
    ]);

    const deleted = await warehouse.transaction((session) => session.deletePartitions(unpartitioned, []));

    expect(deleted).toBe(2);
    expect(warehouse.rows(unpartitioned)).toEqual([]);
  });

  it('should fail a write from the beforeWrite hook', async () => {
    const warehouse = new InMemoryWarehouse({
      beforeWrite: (write) => {
        if (write.operation === 'upsert') throw new Error('disk full');
      },
    });

    await expect(
      warehouse.transaction((session) => session.upsertRows(pricesDestination, [{ symbol: 'AAA', trade_date: '2024-01-01' }])),
    ).rejects.toThrow('disk full');
    expect(warehouse.rows(pricesDestination)).toEqual([]);
  });
});
