import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { LeaseExpired, LockContention } from '../domain/errors/EtlErrors.js';
import type { Lease } from '../domain/model/Lease.js';
import type { LeaseStore } from '../domain/ports/LeaseStore.js';
import { silentLogger } from '../infrastructure/logging/logger.js';
import type { EventBus } from './EventBus.js';

export interface LockManagerOptions {
  /** Acquire attempts before giving up with `LockContention`. Default: `10`. */
  readonly maxAttempts?: number;
  /** Backoff after the first failed attempt, doubled after each further one. Default: `100`. */
  readonly baseDelayMs?: number;
  /** Upper bound of a single backoff. Default: `5000`. */
  readonly maxDelayMs?: number;
  /** TTL used when `acquire()` is called without one. Default: `300000`. */
  readonly defaultTtlMs?: number;
  readonly clock?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly eventBus?: EventBus;
  readonly logger?: Logger;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Grants time-bounded exclusive leases keyed by resource id.
 *
 * Exclusivity comes entirely from the `LeaseStore`; this class adds bounded retry, holder tokens and events.
 */
export class LockManager {
  private readonly store: LeaseStore;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly defaultTtlMs: number;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly eventBus: EventBus | null;
  private readonly logger: Logger;

  constructor(store: LeaseStore, options: LockManagerOptions = {}) {
    this.store = store;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 10);
    this.baseDelayMs = options.baseDelayMs ?? 100;
    this.maxDelayMs = options.maxDelayMs ?? 5_000;
    this.defaultTtlMs = options.defaultTtlMs ?? 300_000;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.eventBus = options.eventBus ?? null;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'lock_manager' });
  }

  /** Current time as seen by the lease store. */
  now(): number {
    return this.clock();
  }

  /** Backoff before attempt `attempt + 1`, given that attempt `attempt` (1-based) was contended. */
  backoffDelay(attempt: number): number {
    return Math.min(this.baseDelayMs * Math.pow(2, attempt - 1), this.maxDelayMs);
  }

  /** Single check-and-set attempt without retry. */
  async tryAcquire(resourceId: string, ttlMs: number = this.defaultTtlMs): Promise<Lease | null> {
    return this.store.tryAcquire(resourceId, randomUUID(), ttlMs, this.clock());
  }

  /** Acquire a lease, retrying with exponential backoff. Throws `LockContention` after `maxAttempts`. */
  async acquire(resourceId: string, ttlMs: number = this.defaultTtlMs): Promise<Lease> {
    const holderToken = randomUUID();

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const lease = await this.store.tryAcquire(resourceId, holderToken, ttlMs, this.clock());
      if (lease) {
        this.logger.info({ resourceId, attempt, expiresAt: lease.expiresAt }, 'lock_acquired');
        this.eventBus?.emit({
          type: 'lease:acquired',
          resourceId,
          holderToken,
          attempt,
          expiresAt: lease.expiresAt,
          timestamp: Date.now(),
        });
        return lease;
      }

      const delayMs = attempt < this.maxAttempts ? this.backoffDelay(attempt) : 0;
      this.logger.debug({ resourceId, attempt, delayMs }, 'lock_contended');
      this.eventBus?.emit({
        type: 'lease:contended',
        resourceId,
        attempt,
        maxAttempts: this.maxAttempts,
        delayMs,
        timestamp: Date.now(),
      });
      if (delayMs > 0) {
        await this.sleep(delayMs);
      }
    }

    this.logger.warn({ resourceId, attempts: this.maxAttempts }, 'lock_acquisition_failed');
    throw new LockContention(resourceId, this.maxAttempts);
  }

  /** Release the caller's lease. Returns `false` when the lease had already lapsed and been taken over or removed. */
  async release(lease: Lease): Promise<boolean> {
    const released = await this.store.release(lease);
    if (released) {
      this.logger.info({ resourceId: lease.resourceId }, 'lock_released');
      this.eventBus?.emit({
        type: 'lease:released',
        resourceId: lease.resourceId,
        holderToken: lease.holderToken,
        timestamp: Date.now(),
      });
    } else {
      this.logger.warn({ resourceId: lease.resourceId }, 'lock_release_skipped');
    }
    return released;
  }

  /** Extend the caller's lease from now. Throws `LeaseExpired` when it already lapsed. */
  async renew(lease: Lease, ttlMs: number = lease.ttlMs): Promise<Lease> {
    const renewed = await this.store.renew(lease, ttlMs, this.clock());
    if (!renewed) {
      this.logger.warn({ resourceId: lease.resourceId }, 'lease_expired');
      throw new LeaseExpired(lease.resourceId);
    }
    return renewed;
  }

  /** Run `work` while holding the lease; the lease is released whatever the outcome. */
  async withLease<T>(resourceId: string, ttlMs: number, work: (lease: Lease) => Promise<T>): Promise<T> {
    const lease = await this.acquire(resourceId, ttlMs);
    try {
      return await work(lease);
    } finally {
      await this.releaseQuietly(lease);
    }
  }

  /** Release from a `finally` block: a store failure is logged so it does not mask the error being propagated. */
  async releaseQuietly(lease: Lease): Promise<void> {
    try {
      await this.release(lease);
    } catch (error) {
      this.logger.error({ err: error, resourceId: lease.resourceId }, 'lock_release_failed');
    }
  }
}
