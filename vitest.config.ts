import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Unit tests live in test/unit, route-level tests in test/integration, and a
 * few module tests sit beside their sources. Everything runs in process:
 * the memory store stands in for Redis and upstream clients are faked.
 */
export default defineConfig({
  test: {
    globals: true,

    environment: 'node',

    include: ['test/**/*.test.ts', 'src/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    // Rendering tests load jimp fonts from disk
    testTimeout: 10000,

    setupFiles: ['./test/setup.ts'],
  },
});
