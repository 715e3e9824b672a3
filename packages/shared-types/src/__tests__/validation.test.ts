import {describe, expect, it} from 'vitest'
import {z} from 'zod'

import {formatZodError} from '../validation'

const PointSchema = z.object({
  x: z.number(),
  y: z.number(),
})

describe('formatZodError', () => {
  it('joins paths and messages', () => {
    const result = PointSchema.safeParse({x: 'a', y: 2})
    if (result.success) {
      throw new Error('expected failure')
    }
    expect(formatZodError(result.error)).toBe('x: Expected number, received string')
  })

  it('lists every issue in order', () => {
    const result = PointSchema.safeParse({})
    if (result.success) {
      throw new Error('expected failure')
    }
    expect(formatZodError(result.error)).toBe('x: Required, y: Required')
  })

  it('leaves out the path for a root-level issue', () => {
    const result = z.string().safeParse(5)
    if (result.success) {
      throw new Error('expected failure')
    }
    expect(formatZodError(result.error)).toBe('Expected string, received number')
  })
})
