import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@trackimport/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'state-sequelize',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
