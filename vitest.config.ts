import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'packages/core/src/config/**/*.ts',
        'packages/core/src/graph/**/*.ts',
        'packages/core/src/loader/**/*.ts',
        'packages/core/src/pipeline/**/*.ts',
        'packages/core/src/retrieval/**/*.ts',
        'packages/core/src/runtime.ts',
        'packages/api-server/src/**/*.ts',
        'packages/cli/src/commands/**/*.ts',
      ],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/core/src/types/**/*.ts',
        'packages/*/src/**/index.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
