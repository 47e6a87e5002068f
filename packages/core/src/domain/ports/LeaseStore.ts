import type { Lease } from '../model/Lease.js';

/**
 * Port for the shared lease table.
 *
 * Every operation must be atomic against the backing store: a `tryAcquire` is a check-and-set,
 * `release` a compare-and-delete and `renew` a compare-and-extend keyed by the holder token.
 * The store is the only source of mutual exclusion, so every worker must reach the same one.
 */
export interface LeaseStore {
  /** Grant the lease when no valid lease exists at `now`. Returns `null` when another holder owns it. */
  tryAcquire(resourceId: string, holderToken: string, ttlMs: number, now: number): Promise<Lease | null>;
  /** Drop the lease if it still belongs to its holder. Returns `false` when it was already gone or taken over. */
  release(lease: Lease): Promise<boolean>;
  /** Extend the lease from `now`. Returns `null` when it lapsed or belongs to someone else. */
  renew(lease: Lease, ttlMs: number, now: number): Promise<Lease | null>;
  /** Current valid lease on the resource, if any. */
  get(resourceId: string, now: number): Promise<Lease | null>;
}
