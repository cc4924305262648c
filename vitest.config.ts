/**
 * Vitest configuration for jellyseerr-sync
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    exclude: ['**/node_modules/**', '**/dist/**'],

    // Keeps stray env vars (API keys, log level) out of the tests
    setupFiles: ['./tests/setup.ts'],

    testTimeout: 10000,

    globals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
    },

    environment: 'node',

    typecheck: {
      enabled: false, // use tsc --noEmit separately
    },
  },
});
