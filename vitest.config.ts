import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Every workspace keeps its tests in test/
    include: ['packages/*/test/**/*.{test,spec}.{ts,tsx}'],
    exclude: ['node_modules/**', '**/dist/**'],
    environment: 'node',
    testTimeout: 30000,
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: {
      // Test against the core sources, not a build
      '@sixdegrees/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  esbuild: {
    jsx: 'automatic',
    jsxImportSource: 'react',
  },
});
