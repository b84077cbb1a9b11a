import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * codemint - Vitest configuration
 *
 * - @codemint/core resolves to its TypeScript sources through tsconfig paths
 * - No retries, so flaky randomness surfaces immediately
 * - Property tests pin their fast-check seeds in the test files
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    // ========================================================================
    // EXECUTION ENVIRONMENT
    // ========================================================================

    environment: 'node',

    // ========================================================================
    // TEST DISCOVERY AND EXECUTION
    // ========================================================================

    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    testTimeout: isCI ? 30000 : 10000,

    // ========================================================================
    // COVERAGE CONFIGURATION
    // ========================================================================

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
      thresholds: {
        branches: 85,
        functions: 85,
        lines: 85,
        statements: 85,
      },
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
