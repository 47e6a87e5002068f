/** Time-bounded exclusive hold on a destination resource. */
export interface Lease {
  readonly resourceId: string;
  /** Random token identifying the holder. Release and renew compare against it. */
  readonly holderToken: string;
  /** Epoch milliseconds. */
  readonly acquiredAt: number;
  readonly ttlMs: number;
  /** Epoch milliseconds after which the lease is no longer valid. */
  readonly expiresAt: number;
}

export function createLease(resourceId: string, holderToken: string, ttlMs: number, now: number): Lease {
  return { resourceId, holderToken, acquiredAt: now, ttlMs, expiresAt: now + ttlMs };
}

export function isLeaseValid(lease: Lease, now: number): boolean {
  return now < lease.expiresAt;
}
