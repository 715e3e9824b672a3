import {defineConfig} from 'vitest/config'

import {sharedConfig} from '../../vitest.shared'

/**
 * Vitest configuration for @partyset/curator
 * Environment: node; collaborators are faked in process
 */
export default defineConfig({
  test: {
    ...sharedConfig,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    name: 'curator',
    setupFiles: ['./src/test-setup.ts'],
  },
})
