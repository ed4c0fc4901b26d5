import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const root = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.d.ts', 'packages/*/src/index.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'threads',
  },
  resolve: {
    alias: {
      '@trellis/core': root('./packages/core/src/index.ts'),
      '@trellis/arguments': root('./packages/arguments/src/index.ts'),
    },
  },
  esbuild: {
    target: 'node20',
  },
});
