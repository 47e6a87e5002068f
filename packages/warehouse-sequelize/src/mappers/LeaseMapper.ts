import type { Model } from 'sequelize';
import type { Lease } from '@ledgerline/core';

export interface LeaseRow {
  readonly lease: Lease;
  /** Optimistic-lock version, bumped on every change of holder or expiry. */
  readonly version: number;
}

function text(instance: Model, field: string): string {
  const value: unknown = instance.get(field);
  if (typeof value !== 'string') throw new TypeError(`Lease column ${field} is not text`);
  return value;
}

function integer(instance: Model, field: string): number {
  const value: unknown = instance.get(field);
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isSafeInteger(n)) throw new TypeError(`Lease column ${field} is not an integer`);
  return n;
}

export function toDomain(instance: Model): LeaseRow {
  return {
    lease: {
      resourceId: text(instance, 'resourceId'),
      holderToken: text(instance, 'holderToken'),
      acquiredAt: integer(instance, 'acquiredAt'),
      ttlMs: integer(instance, 'ttlMs'),
      expiresAt: integer(instance, 'expiresAt'),
    },
    version: integer(instance, 'version'),
  };
}

export function toRow(lease: Lease, version: number): Record<string, string | number> {
  return {
    resourceId: lease.resourceId,
    holderToken: lease.holderToken,
    acquiredAt: lease.acquiredAt,
    ttlMs: lease.ttlMs,
    expiresAt: lease.expiresAt,
    version,
  };
}
