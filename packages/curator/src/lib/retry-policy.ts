/**
 * Retry policy with exponential backoff
 *
 * Delay before retry n (1-based): min(maxDelayMs, baseDelayMs * 2^(n-1)) + random * jitterMs
 * Only transient errors are retried; anything else propagates on the spot.
 */

import {z} from 'zod'

import {RETRY_DEFAULTS} from '../constants'
import {getLogger} from '../utils/LoggerContext'
import {sleep as defaultSleep, type Sleep} from '../utils/RequestPacer'
import {configurationError, isTransient, toPipelineError} from './errors'
import type {RandomSource} from './seeded-random'

export const RetryPolicySchema = z.object({
  baseDelayMs: z.number().nonnegative(),
  jitterMs: z.number().nonnegative(),
  maxAttempts: z.number().int().positive(),
  maxDelayMs: z.number().nonnegative(),
})

export type RetryPolicy = z.infer<typeof RetryPolicySchema>

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  baseDelayMs: RETRY_DEFAULTS.BASE_DELAY_MS,
  jitterMs: RETRY_DEFAULTS.JITTER_MS,
  maxAttempts: RETRY_DEFAULTS.MAX_ATTEMPTS,
  maxDelayMs: RETRY_DEFAULTS.MAX_DELAY_MS,
}

export interface RetryOptions {
  /** Label used in retry log lines */
  label?: string
  onRetry?: (info: {attempt: number; delayMs: number; error: Error}) => void
  policy?: RetryPolicy
  random?: RandomSource
  sleep?: Sleep
}

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const result = RetryPolicySchema.safeParse({...DEFAULT_RETRY_POLICY, ...overrides})
  if (!result.success) {
    throw configurationError('Invalid retry policy', {issues: result.error.issues.map(i => i.message)})
  }
  return result.data
}

export function computeBackoffDelay(policy: RetryPolicy, retryNumber: number, random: RandomSource = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** (retryNumber - 1)
  return Math.min(policy.maxDelayMs, exponential) + random() * policy.jitterMs
}

/**
 * Run an operation, retrying transient failures up to the policy's attempt ceiling.
 * The last transient error is rethrown once the ceiling is hit.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY
  const random = options.random ?? Math.random
  const sleep = options.sleep ?? defaultSleep

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt)
    } catch (error) {
      const pipelineError = toPipelineError(error)
      if (!isTransient(pipelineError) || attempt >= policy.maxAttempts) {
        throw pipelineError
      }

      const delayMs = computeBackoffDelay(policy, attempt, random)
      getLogger()?.warn(`${options.label ?? 'operation'} failed, retrying`, {
        attempt,
        delayMs: Math.round(delayMs),
        error: pipelineError.message,
      })
      options.onRetry?.({attempt, delayMs, error: pipelineError})
      await sleep(delayMs)
    }
  }
}
