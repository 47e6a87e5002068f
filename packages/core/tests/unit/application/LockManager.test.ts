import { describe, it, expect, vi } from 'vitest';
import { LockManager } from '../../../src/application/LockManager.js';
import { EventBus } from '../../../src/application/EventBus.js';
import { InMemoryLeaseStore } from '../../../src/infrastructure/leases/InMemoryLeaseStore.js';
import { LeaseExpired, LockContention, isRetryable } from '../../../src/domain/errors/EtlErrors.js';
import type { LeaseContendedEvent } from '../../../src/domain/events/DomainEvents.js';
import { manualClock } from '../../support/fixtures.js';

const RESOURCE = 'analytics.daily_prices';

function setup(options: { maxAttempts?: number; baseDelayMs?: number; maxDelayMs?: number } = {}) {
  const clock = manualClock();
  const store = new InMemoryLeaseStore();
  const delays: number[] = [];
  const eventBus = new EventBus();
  const sleep = (ms: number): Promise<void> => {
    delays.push(ms);
    return Promise.resolve();
  };
  const make = () => new LockManager(store, { ...options, clock: clock.now, sleep, eventBus });
  return { clock, store, delays, eventBus, make };
}

describe('LockManager', () => {
  it('should grant a lease with a random holder token and TTL-based expiry', async () => {
    const { clock, make } = setup();
    const lease = await make().acquire(RESOURCE, 1_000);

    expect(lease.resourceId).toBe(RESOURCE);
    expect(lease.holderToken).toMatch(/^[0-9a-f-]{36}$/);
    expect(lease.acquiredAt).toBe(clock.now());
    expect(lease.expiresAt).toBe(clock.now() + 1_000);
  });

  it('should emit lease:acquired on success', async () => {
    const { eventBus, make } = setup();
    const handler = vi.fn();
    eventBus.on('lease:acquired', handler);

    await make().acquire(RESOURCE, 1_000);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0]![0]).toMatchObject({ resourceId: RESOURCE, attempt: 1 });
  });

  it('should never grant two valid leases on the same resource', async () => {
    const { make } = setup({ maxAttempts: 1 });
    const first = make();
    const second = make();

    const results = await Promise.allSettled([first.acquire(RESOURCE, 1_000), second.acquire(RESOURCE, 1_000)]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
  });

  it('should retry with exponential backoff then raise a retryable LockContention', async () => {
    const { delays, eventBus, make } = setup({ maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 5_000 });
    const contended: LeaseContendedEvent[] = [];
    eventBus.on('lease:contended', (event) => contended.push(event));

    await make().acquire(RESOURCE, 60_000);
    const error = await make()
      .acquire(RESOURCE, 60_000)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LockContention);
    expect(isRetryable(error)).toBe(true);
    expect(delays).toEqual([100, 200, 400]);
    expect(contended.map((e) => e.attempt)).toEqual([1, 2, 3, 4]);
    expect(contended.map((e) => e.delayMs)).toEqual([100, 200, 400, 0]);
  });

  it('should cap the backoff at maxDelayMs', () => {
    const { make } = setup({ baseDelayMs: 100, maxDelayMs: 250 });
    const manager = make();

    expect([1, 2, 3, 4].map((attempt) => manager.backoffDelay(attempt))).toEqual([100, 200, 250, 250]);
  });

  it('should grant the lease to a waiter once the holder releases', async () => {
    const { make } = setup({ maxAttempts: 1 });
    const holder = make();
    const lease = await holder.acquire(RESOURCE, 60_000);

    await expect(make().acquire(RESOURCE, 60_000)).rejects.toThrow(LockContention);
    await expect(holder.release(lease)).resolves.toBe(true);
    await expect(make().acquire(RESOURCE, 60_000)).resolves.toMatchObject({ resourceId: RESOURCE });
  });

  it('should grant the lease to another holder once the TTL lapses', async () => {
    const { clock, make } = setup({ maxAttempts: 1 });
    await make().acquire(RESOURCE, 1_000);

    clock.advance(999);
    await expect(make().acquire(RESOURCE, 1_000)).rejects.toThrow(LockContention);

    clock.advance(1);
    await expect(make().acquire(RESOURCE, 1_000)).resolves.toMatchObject({ resourceId: RESOURCE });
  });

  it('should extend a valid lease on renew', async () => {
    const { clock, make } = setup();
    const manager = make();
    const lease = await manager.acquire(RESOURCE, 1_000);

    clock.advance(600);
    const renewed = await manager.renew(lease);

    expect(renewed.expiresAt).toBe(clock.now() + 1_000);
    expect(renewed.holderToken).toBe(lease.holderToken);
  });

  it('should raise LeaseExpired when renewing a lapsed lease', async () => {
    const { clock, make } = setup();
    const manager = make();
    const lease = await manager.acquire(RESOURCE, 1_000);

    clock.advance(1_000);
    await expect(manager.renew(lease)).rejects.toThrow(LeaseExpired);
  });

  it('should not release a lease that was taken over after expiry', async () => {
    const { clock, make } = setup();
    const stale = await make().acquire(RESOURCE, 1_000);
    clock.advance(1_500);
    const current = await make().acquire(RESOURCE, 1_000);

    await expect(make().release(stale)).resolves.toBe(false);
    await expect(make().tryAcquire(RESOURCE)).resolves.toBeNull();
    expect(current.holderToken).not.toBe(stale.holderToken);
  });

  it('should release the lease when the scoped work throws', async () => {
    const { store, clock, make } = setup();
    const manager = make();

    await expect(
      manager.withLease(RESOURCE, 60_000, () => Promise.reject(new Error('write failed'))),
    ).rejects.toThrow('write failed');
    await expect(store.get(RESOURCE, clock.now())).resolves.toBeNull();
  });

  it('should return the scoped work result and release afterwards', async () => {
    const { store, clock, make } = setup();

    const result = await make().withLease(RESOURCE, 60_000, async (lease) => {
      await expect(store.get(RESOURCE, clock.now())).resolves.toEqual(lease);
      return 42;
    });

    expect(result).toBe(42);
    await expect(store.get(RESOURCE, clock.now())).resolves.toBeNull();
  });
});
