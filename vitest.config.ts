import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration. Packages resolve each other from source, so
 * no build is needed before a run.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@schemakit/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // No retries - surface issues immediately
    retry: 0,
    // Extended timeouts for property-based testing
    testTimeout: 30000,
    env: {
      NODE_ENV: 'test',
    },
  },
});
