import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // in-process Postgres boot + bcrypt dominate test time
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
