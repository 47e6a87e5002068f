import type { Lease } from '../../domain/model/Lease.js';
import { createLease, isLeaseValid } from '../../domain/model/Lease.js';
import type { LeaseStore } from '../../domain/ports/LeaseStore.js';

/** Single-process lease store. Exclusive only among `LockManager`s sharing this instance. */
export class InMemoryLeaseStore implements LeaseStore {
  private leases = new Map<string, Lease>();

  tryAcquire(resourceId: string, holderToken: string, ttlMs: number, now: number): Promise<Lease | null> {
    const current = this.leases.get(resourceId);
    if (current && isLeaseValid(current, now)) {
      return Promise.resolve(null);
    }
    const lease = createLease(resourceId, holderToken, ttlMs, now);
    this.leases.set(resourceId, lease);
    return Promise.resolve(lease);
  }

  release(lease: Lease): Promise<boolean> {
    const current = this.leases.get(lease.resourceId);
    if (!current || current.holderToken !== lease.holderToken) {
      return Promise.resolve(false);
    }
    this.leases.delete(lease.resourceId);
    return Promise.resolve(true);
  }

  renew(lease: Lease, ttlMs: number, now: number): Promise<Lease | null> {
    const current = this.leases.get(lease.resourceId);
    if (!current || current.holderToken !== lease.holderToken || !isLeaseValid(current, now)) {
      return Promise.resolve(null);
    }
    const renewed: Lease = { ...current, ttlMs, expiresAt: now + ttlMs };
    this.leases.set(lease.resourceId, renewed);
    return Promise.resolve(renewed);
  }

  get(resourceId: string, now: number): Promise<Lease | null> {
    const current = this.leases.get(resourceId);
    return Promise.resolve(current && isLeaseValid(current, now) ? current : null);
  }
}
