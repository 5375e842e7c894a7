import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration with workspace projects.
 *
 * Each workspace package has its own vitest.config.ts that extends vitest.shared.ts.
 * This root config aggregates all workspace configs.
 *
 * Run specific project:
 *   npx vitest run --project hierarchy
 *
 * Run all tests:
 *   npm test
 */
export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      include: ['apps/*/src/**', 'packages/*/src/**'],
      exclude: [
        '**/*.test.ts',
        '**/__tests__/**',
        '**/node_modules/**',
        '**/dist/**',
      ],
      reporter: ['text', 'json', 'html'],
    },
    reporters: ['default'],

    projects: [
      'apps/cli/vitest.config.ts',
      'packages/emitter/vitest.config.ts',
      'packages/hierarchy/vitest.config.ts',
      'packages/runtime-shared/vitest.config.ts',
      'packages/shared-types/vitest.config.ts',
    ],
  },
});
