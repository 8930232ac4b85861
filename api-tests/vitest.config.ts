/**
 * Vitest configuration for API integration tests.
 *
 * Runs the real Hono app against an in-memory SQLite database and a stub
 * agent. Requests go through app.request(), so no port is opened and each
 * file's fork keeps its own database.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['api-tests/tests/**/*.test.ts'],
    isolate: true,
    fileParallelism: true,
    // Dataset runs execute in the background, so allow some headroom
    testTimeout: 15_000,
    hookTimeout: 15_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'html', 'lcov'],
      reportsDirectory: './coverage-api',
      include: ['src/server/**/*.ts', 'src/services/**/*.ts', 'src/db/index.ts'],
      exclude: [
        '**/*.test.ts',
        '**/types.ts',
      ],
    },
  },
});
