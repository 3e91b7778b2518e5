import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * yangtree - Vitest configuration
 *
 * Each package is a project with its own vitest.config.ts; this file holds
 * what they share.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    pool: 'forks',

    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // No retries - surface issues immediately
    retry: 0,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/types.ts',
      ],
    },

    projects: ['packages/*'],

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
