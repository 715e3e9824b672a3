import type { UserConfig } from 'vitest/config'

/**
 * Shared Vitest configuration for every package in the workspace
 *
 * Note: projects cannot use 'extends', so package configs spread these settings directly
 */
export const sharedConfig: UserConfig['test'] = {
  // Test file patterns
  include: ['**/*.{test,spec}.ts'],
  exclude: ['**/node_modules/**', '**/dist/**'],

  // Coverage configuration (target 80%)
  coverage: {
    provider: 'v8',
    reporter: ['text', 'lcov'],
    reportsDirectory: './coverage',
    exclude: ['**/node_modules/**', '**/dist/**', '**/*.config.ts', '**/test-setup.ts', '**/__tests__/**', '**/fixtures/**'],
    thresholds: {
      lines: 80,
      functions: 80,
      branches: 80,
      statements: 80,
    },
  },

  // Test timeout (30 seconds)
  testTimeout: 30000,
  hookTimeout: 30000,

  // Test isolation
  isolate: true,

  // Disable watch mode by default (CI friendly)
  watch: false,

  // Clear mocks between tests
  clearMocks: true,
  restoreMocks: true,
}
