import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Every suite opens its own SQLite database; nothing should take long
    testTimeout: 15000,
    hookTimeout: 10000,
    teardownTimeout: 5000,
    watch: false,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/__tests__/fixtures.ts'],
    },
  },
});
