import { describe, it, expect } from 'vitest';
import { InMemoryLeaseStore } from '../../../src/infrastructure/leases/InMemoryLeaseStore.js';

describe('InMemoryLeaseStore', () => {
  it('should refuse a second holder while the lease is valid', async () => {
    const store = new InMemoryLeaseStore();

    const lease = await store.tryAcquire('res', 'holder-a', 100, 1_000);
    expect(lease).toEqual({ resourceId: 'res', holderToken: 'holder-a', acquiredAt: 1_000, ttlMs: 100, expiresAt: 1_100 });
    await expect(store.tryAcquire('res', 'holder-b', 100, 1_099)).resolves.toBeNull();
  });

  it('should let another holder take over at expiry', async () => {
    const store = new InMemoryLeaseStore();
    await store.tryAcquire('res', 'holder-a', 100, 1_000);

    const lease = await store.tryAcquire('res', 'holder-b', 100, 1_100);
    expect(lease?.holderToken).toBe('holder-b');
  });

  it('should keep leases on different resources independent', async () => {
    const store = new InMemoryLeaseStore();
    await store.tryAcquire('res-1', 'holder-a', 100, 0);

    await expect(store.tryAcquire('res-2', 'holder-b', 100, 0)).resolves.not.toBeNull();
  });

  it('should only release or renew for the owning holder', async () => {
    const store = new InMemoryLeaseStore();
    const lease = await store.tryAcquire('res', 'holder-a', 100, 0);
    const impostor = { ...lease!, holderToken: 'holder-b' };

    await expect(store.release(impostor)).resolves.toBe(false);
    await expect(store.renew(impostor, 100, 50)).resolves.toBeNull();
    await expect(store.renew(lease!, 100, 50)).resolves.toMatchObject({ expiresAt: 150, acquiredAt: 0 });
    await expect(store.release(lease!)).resolves.toBe(true);
    await expect(store.get('res', 60)).resolves.toBeNull();
  });

  it('should not renew a lapsed lease', async () => {
    const store = new InMemoryLeaseStore();
    const lease = await store.tryAcquire('res', 'holder-a', 100, 0);

    await expect(store.renew(lease!, 100, 100)).resolves.toBeNull();
  });
});
