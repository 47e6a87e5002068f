import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LockContention, LockManager } from '@ledgerline/core';
import { SequelizeLeaseStore } from '../../src/SequelizeLeaseStore.js';
import { openTestDatabase } from '../support/sqlite.js';
import type { TestDatabase } from '../support/sqlite.js';

const RESOURCE = 'analytics.daily_stock_analytics';
const T0 = 1_700_000_000_000;

describe('SequelizeLeaseStore', () => {
  let db: TestDatabase;
  let store: SequelizeLeaseStore;

  beforeEach(async () => {
    db = openTestDatabase();
    store = new SequelizeLeaseStore(db.sequelize);
    await store.initialize();
  });

  afterEach(async () => {
    await db.close();
  });

  it('should grant a free resource', async () => {
    const lease = await store.tryAcquire(RESOURCE, 'holder-a', 1_000, T0);

    expect(lease).toEqual({ resourceId: RESOURCE, holderToken: 'holder-a', acquiredAt: T0, ttlMs: 1_000, expiresAt: T0 + 1_000 });
    expect(await store.get(RESOURCE, T0 + 500)).toEqual(lease);
  });

  it('should refuse a resource while its lease is valid', async () => {
    await store.tryAcquire(RESOURCE, 'holder-a', 1_000, T0);

    expect(await store.tryAcquire(RESOURCE, 'holder-b', 1_000, T0 + 999)).toBeNull();
  });

  it('should hand a lapsed lease to the next holder', async () => {
    await store.tryAcquire(RESOURCE, 'holder-a', 1_000, T0);

    const lease = await store.tryAcquire(RESOURCE, 'holder-b', 1_000, T0 + 1_000);

    expect(lease?.holderToken).toBe('holder-b');
    expect(await store.get(RESOURCE, T0 + 1_500)).toEqual(lease);
  });

  it("should release only the caller's own lease", async () => {
    const lease = await store.tryAcquire(RESOURCE, 'holder-a', 1_000, T0);
    if (!lease) throw new Error('expected a lease');

    expect(await store.release({ ...lease, holderToken: 'holder-b' })).toBe(false);
    expect(await store.release(lease)).toBe(true);
    expect(await store.get(RESOURCE, T0)).toBeNull();
    expect(await store.release(lease)).toBe(false);
  });

  it('should extend a valid lease from the renewal time', async () => {
    const lease = await store.tryAcquire(RESOURCE, 'holder-a', 1_000, T0);
    if (!lease) throw new Error('expected a lease');

    const renewed = await store.renew(lease, 2_000, T0 + 800);

    expect(renewed).toEqual({ ...lease, ttlMs: 2_000, expiresAt: T0 + 2_800 });
    expect(await store.tryAcquire(RESOURCE, 'holder-b', 1_000, T0 + 2_000)).toBeNull();
  });

  it('should not renew a lapsed lease or one taken over by another holder', async () => {
    const lease = await store.tryAcquire(RESOURCE, 'holder-a', 1_000, T0);
    if (!lease) throw new Error('expected a lease');

    expect(await store.renew(lease, 1_000, T0 + 1_000)).toBeNull();
    await store.tryAcquire(RESOURCE, 'holder-b', 1_000, T0 + 1_000);
    expect(await store.renew(lease, 1_000, T0 + 1_100)).toBeNull();
  });

  it('should let a lock manager serialize holders through the table', async () => {
    let now = T0;
    const first = new LockManager(store, { clock: () => now, maxAttempts: 2, sleep: () => Promise.resolve() });
    const second = new LockManager(store, { clock: () => now, maxAttempts: 2, sleep: () => Promise.resolve() });

    const held = await first.acquire(RESOURCE, 1_000);
    await expect(second.acquire(RESOURCE, 1_000)).rejects.toBeInstanceOf(LockContention);

    await first.release(held);
    now += 10;
    const next = await second.acquire(RESOURCE, 1_000);
    expect(next.acquiredAt).toBe(T0 + 10);
  });
});
