import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        '**/*.test.ts',
        '**/*.spec.ts',
        '**/index.ts',
      ],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@kubesim/shared': path.resolve(rootDir, './packages/shared/src/index.ts'),
      '@kubesim/core': path.resolve(rootDir, './packages/core/src/index.ts'),
      '@kubesim/node-runtime': path.resolve(rootDir, './packages/node-runtime/src/index.ts'),
      '@kubesim/server': path.resolve(rootDir, './packages/server/src/index.ts'),
      '@kubesim/cli': path.resolve(rootDir, './packages/cli/src/program.ts'),
    },
  },
});
