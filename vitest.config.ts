import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // config tests change the working directory
    pool: 'forks',
    testTimeout: 30_000,
  },
});
