import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/shared/src/**/*.test.ts',
      'apps/api/src/**/*.test.ts',
      'apps/api/test/**/*.test.ts',
      'apps/api/test/**/*.integration.ts',
      'apps/api/test/**/*.security.ts',
    ],
    setupFiles: [],
    testTimeout: 15000,
    hookTimeout: 30000,
  },
  resolve: {
    alias: {
      '@chargeflow/shared': fileURLToPath(new URL('./packages/shared/src', import.meta.url)),
    },
  },
});
