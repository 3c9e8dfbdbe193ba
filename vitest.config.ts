import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const source = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  // Workspace packages export built output to Node; tests run their sources
  resolve: {
    alias: {
      '@tvlink/models': source('models'),
      '@tvlink/schemas': source('schemas'),
      '@tvlink/core': source('core'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    // Use forks pool with reasonable concurrency limits
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        maxForks: 8,
      },
    },
    maxConcurrency: 5,
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'packages/tvlink/src/cli.ts',
        '**/*.test.ts',
        '**/__tests__/test-utils.ts',
        '**/__tests__/unit/test-utils.ts',
        '**/dist/*',
        '**/*.config.ts',
      ],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
