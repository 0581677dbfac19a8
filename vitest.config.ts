import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@skypost/bluesky-client': fileURLToPath(
        new URL('./packages/bluesky-client/src/index.ts', import.meta.url)
      ),
    },
  },
});
