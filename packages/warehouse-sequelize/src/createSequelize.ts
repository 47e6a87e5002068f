import { Sequelize } from 'sequelize';
import { silentLogger } from '@ledgerline/core';
import type { Logger, PoolSettings } from '@ledgerline/core';

/**
 * Sequelize instance whose driver pool follows the engine's pool settings:
 * `max = size + maxOverflow`, `acquire = acquireTimeoutMs`.
 */
export function createSequelize(databaseUrl: string, pool: PoolSettings, logger?: Logger): Sequelize {
  const log = (logger ?? silentLogger()).child({ component: 'sequelize' });
  return new Sequelize(databaseUrl, {
    logging: (sql: string) => log.trace({ sql }, 'query'),
    pool: {
      max: pool.size + pool.maxOverflow,
      min: 0,
      acquire: pool.acquireTimeoutMs,
    },
  });
}
