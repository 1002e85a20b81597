import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/sources/vitest.config.ts',
  'packages/state-sequelize/vitest.config.ts',
]);
