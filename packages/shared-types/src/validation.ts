/**
 * Validation utilities
 * Schemas are applied with zod's own safeParse at each boundary; this formats the failures
 */

import type {z} from 'zod'

/**
 * Format Zod error for logging/display
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map(err => {
      const path = err.path.join('.')
      return `${path ? `${path}: ` : ''}${err.message}`
    })
    .join(', ')
}
