import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/test-fixtures/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        statements: 85,
        lines: 85,
        functions: 85,
        branches: 77,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.d.ts',
        '**/index.ts',
        '**/*.config.ts',
        'packages/extractor/src/types.ts', // type-only module (no runtime statements)
        // CLI entry points are exercised through their command modules
        'packages/extractor/src/cli.ts',
        'packages/cli/src/lib.ts',
      ],
    },
    testTimeout: 10000,
  },
});
