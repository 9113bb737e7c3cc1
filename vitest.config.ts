import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    // Catalog state is module-scoped; keep suites in separate forks.
    pool: 'forks',
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['src/server/**', 'src/services/**', 'src/utils/**', 'src/models/**', 'src/config/**']
    }
  }
});
