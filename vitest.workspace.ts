import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/quality/vitest.config.ts',
  'packages/analytics/vitest.config.ts',
  'packages/pipeline/vitest.config.ts',
  'packages/warehouse-sequelize/vitest.config.ts',
]);
