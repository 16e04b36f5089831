import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    testTimeout: 30000,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // better-sqlite3 is a native addon; forks keep Buffer/Float32Array in one realm
    pool: 'forks',
  },
});
