import { Sequelize } from 'sequelize';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BetterSqliteDatabase } from './better-sqlite3-adapter.js';

export interface TestDatabase {
  readonly sequelize: Sequelize;
  close(): Promise<void>;
}

/** Sequelize on a throwaway SQLite file. */
export function openTestDatabase(): TestDatabase {
  const storage = path.join(os.tmpdir(), `ledgerline-${String(Date.now())}-${String(Math.random()).slice(2)}.sqlite`);
  const sequelize = new Sequelize({
    dialect: 'sqlite',
    storage,
    logging: false,
    dialectModule: { Database: BetterSqliteDatabase },
    pool: { max: 1, min: 1, idle: 30_000, acquire: 60_000, evict: 30_000 },
  });

  return {
    sequelize,
    close: async () => {
      await sequelize.close();
      fs.rmSync(storage, { force: true });
    },
  };
}
