import { UniqueConstraintError } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { createLease, isLeaseValid } from '@ledgerline/core';
import type { Lease, LeaseStore } from '@ledgerline/core';
import { defineLeaseModel } from './models/LeaseModel.js';
import type { LeaseModel } from './models/LeaseModel.js';
import * as LeaseMapper from './mappers/LeaseMapper.js';

export interface SequelizeLeaseStoreOptions {
  /** Default: `'etl_leases'`. */
  readonly tableName?: string;
}

/**
 * Lease table shared by every worker that reaches the same database.
 *
 * Each change of holder or expiry is a conditional update on the row's `version`, so two
 * workers racing for a lapsed lease cannot both win. Call `initialize()` to create the table.
 */
export class SequelizeLeaseStore implements LeaseStore {
  private readonly Lease: LeaseModel;

  constructor(sequelize: Sequelize, options: SequelizeLeaseStoreOptions = {}) {
    this.Lease = defineLeaseModel(sequelize, options.tableName ?? 'etl_leases');
  }

  async initialize(): Promise<void> {
    await this.Lease.sync();
  }

  async tryAcquire(resourceId: string, holderToken: string, ttlMs: number, now: number): Promise<Lease | null> {
    const lease = createLease(resourceId, holderToken, ttlMs, now);
    const existing = await this.Lease.findByPk(resourceId);

    if (!existing) {
      try {
        await this.Lease.create(LeaseMapper.toRow(lease, 0));
        return lease;
      } catch (error) {
        // Another worker created the row first.
        if (error instanceof UniqueConstraintError) return null;
        throw error;
      }
    }

    const current = LeaseMapper.toDomain(existing);
    if (isLeaseValid(current.lease, now)) return null;
    return (await this.swap(current.version, lease)) ? lease : null;
  }

  async release(lease: Lease): Promise<boolean> {
    const deleted = await this.Lease.destroy({
      where: { resourceId: lease.resourceId, holderToken: lease.holderToken },
    });
    return deleted > 0;
  }

  async renew(lease: Lease, ttlMs: number, now: number): Promise<Lease | null> {
    const existing = await this.Lease.findByPk(lease.resourceId);
    if (!existing) return null;

    const current = LeaseMapper.toDomain(existing);
    if (current.lease.holderToken !== lease.holderToken || !isLeaseValid(current.lease, now)) return null;

    const renewed: Lease = { ...current.lease, ttlMs, expiresAt: now + ttlMs };
    return (await this.swap(current.version, renewed)) ? renewed : null;
  }

  async get(resourceId: string, now: number): Promise<Lease | null> {
    const existing = await this.Lease.findByPk(resourceId);
    if (!existing) return null;
    const { lease } = LeaseMapper.toDomain(existing);
    return isLeaseValid(lease, now) ? lease : null;
  }

  /** Replace the row if nobody changed it since `version` was read. */
  private async swap(version: number, next: Lease): Promise<boolean> {
    const [affected] = await this.Lease.update(LeaseMapper.toRow(next, version + 1), {
      where: { resourceId: next.resourceId, version },
    });
    return affected === 1;
  }
}
