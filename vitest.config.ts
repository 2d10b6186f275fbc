import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@core': path.resolve(rootDir, './src/core'),
      '@resolvers': path.resolve(rootDir, './src/resolvers'),
      '@filters': path.resolve(rootDir, './src/filters'),
      '@shared': path.resolve(rootDir, './src/shared'),
      '@': path.resolve(rootDir, './src'),
    },
  },
});
