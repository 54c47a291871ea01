import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    globals: false,
    testTimeout: 30000,
  },
});
