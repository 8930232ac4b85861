import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'api-tests/tests/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      // tsc compiles test files into dist/ too; running those would execute stale copies.
      '**/dist/**',
    ],
    testTimeout: 15_000,
    coverage: {
      exclude: [
        '**/*.test.ts',
        // Test infrastructure: builders and helpers used only by tests
        'src/test-helpers/**',
        'api-tests/harness/**',
      ],
      reporter: ['text', 'html'],
      reportsDirectory: './coverage',
    },
  },
});
