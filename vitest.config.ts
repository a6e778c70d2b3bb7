import { defineConfig } from 'vitest/config';

/**
 * objfuzz test configuration
 *
 * Each workspace package is a Vitest project with its own vitest.config.ts,
 * which carries its retry and timeout settings. Projects do not inherit test
 * options from this file; only reporters and coverage apply here.
 */

export default defineConfig({
  test: {
    // ========================================================================
    // MONOREPO PROJECT CONFIGURATION
    // ========================================================================

    projects: ['packages/*'],

    reporters: ['default'],

    // ========================================================================
    // COVERAGE CONFIGURATION
    // ========================================================================

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/index.ts',
      ],
    },
  },
});
