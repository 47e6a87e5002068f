import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'warehouse-sequelize',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@ledgerline/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
