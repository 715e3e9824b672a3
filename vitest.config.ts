import { defineConfig } from 'vitest/config'

/**
 * Root Vitest configuration for the workspace
 *
 * `npm test` runs every package; `npx vitest run --project curator` targets one
 */
export default defineConfig({
  test: {
    projects: ['packages/*/vitest.config.ts'],
  },
})
