/**
 * Vitest Configuration
 * @module vitest.config
 *
 * Test configuration for the benchmark campaign orchestrator.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    globals: true,
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 30000,
    hookTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts', 'src/**/types.ts'],
    },

    // Mock configuration
    clearMocks: true,

    sequence: {
      shuffle: false,
      concurrent: false,
    },
  },

  esbuild: {
    target: 'node20',
  },
});
