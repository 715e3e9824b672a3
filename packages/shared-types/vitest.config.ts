import {defineConfig} from 'vitest/config'

import {sharedConfig} from '../../vitest.shared'

/**
 * Vitest configuration for @partyset/shared-types
 * Environment: node (schema validation)
 */
export default defineConfig({
  test: {
    ...sharedConfig,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    name: 'shared-types',
  },
})
