import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/braze/vitest.config.ts',
  'packages/lambda/vitest.config.ts',
  'packages/state-sequelize/vitest.config.ts',
]);
