import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    // Unix-like systems use forks for better isolation
    pool: process.platform === 'win32' ? 'threads' : 'forks',
    setupFiles: ['./test/setup.ts'],

    include: ['packages/**/src/**/*.{test,spec}.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    retry: 0,
    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
