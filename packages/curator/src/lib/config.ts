/**
 * Environment configuration
 *
 * Every setting has a typed default except the Anthropic key. Invalid values are
 * reported together in one configuration error.
 */

import {formatZodError} from '@partyset/shared-types'
import {z} from 'zod'

import {PIPELINE_DEFAULTS, RETRY_DEFAULTS, SCORE_RANGE, SCORING_DEFAULTS} from '../constants'
import {configurationError} from './errors'

const blankToUndefined = (val: unknown) => (typeof val === 'string' && val.trim() === '' ? undefined : val)

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional())

const integer = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback))

const flag = z.preprocess(
  val => (typeof val === 'string' ? ['1', 'true', 'yes'].includes(val.trim().toLowerCase()) : false),
  z.boolean(),
)

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.preprocess(blankToUndefined, z.string()),
  ANTHROPIC_MODEL: z.preprocess(blankToUndefined, z.string().default(SCORING_DEFAULTS.MODEL)),
  CURATOR_AI_TIMEOUT_MS: integer(SCORING_DEFAULTS.TIMEOUT_MS, 1),
  CURATOR_BATCH_SIZE: integer(PIPELINE_DEFAULTS.BATCH_SIZE, 1),
  CURATOR_CLUSTERS: integer(PIPELINE_DEFAULTS.CLUSTERS, 1),
  CURATOR_DEBUG: flag,
  CURATOR_MAX_ATTEMPTS: integer(RETRY_DEFAULTS.MAX_ATTEMPTS, 1),
  CURATOR_MIN_SCORE: z.preprocess(
    blankToUndefined,
    z.coerce.number().finite().min(SCORE_RANGE.MIN).max(SCORE_RANGE.MAX).default(PIPELINE_DEFAULTS.MIN_SCORE),
  ),
  CURATOR_PCA_COMPONENTS: integer(PIPELINE_DEFAULTS.PCA_COMPONENTS, 0),
  CURATOR_REQUEST_INTERVAL_MS: integer(SCORING_DEFAULTS.REQUEST_INTERVAL_MS, 0),
  CURATOR_SEED: integer(PIPELINE_DEFAULTS.SEED, 0),
  CURATOR_SKIP_ENRICHMENT: flag,
  LASTFM_API_KEY: optionalString,
  SPOTIFY_ACCESS_TOKEN: optionalString,
})

export interface CuratorConfig {
  aiTimeoutMs: number
  anthropicApiKey: string
  anthropicModel: string
  batchSize: number
  clusters: number
  debug: boolean
  lastfmApiKey?: string
  maxAttempts: number
  minScore: number
  pcaComponents: number
  requestIntervalMs: number
  seed: number
  skipEnrichment: boolean
  spotifyAccessToken?: string
}

export function loadConfig(env: Record<string, string | undefined> = process.env): CuratorConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    throw configurationError(`Invalid configuration: ${formatZodError(result.error)}`, {
      issues: result.error.errors.map(issue => issue.path.join('.')),
    })
  }

  const parsed = result.data
  return {
    aiTimeoutMs: parsed.CURATOR_AI_TIMEOUT_MS,
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    anthropicModel: parsed.ANTHROPIC_MODEL,
    batchSize: parsed.CURATOR_BATCH_SIZE,
    clusters: parsed.CURATOR_CLUSTERS,
    debug: parsed.CURATOR_DEBUG,
    lastfmApiKey: parsed.LASTFM_API_KEY,
    maxAttempts: parsed.CURATOR_MAX_ATTEMPTS,
    minScore: parsed.CURATOR_MIN_SCORE,
    pcaComponents: parsed.CURATOR_PCA_COMPONENTS,
    requestIntervalMs: parsed.CURATOR_REQUEST_INTERVAL_MS,
    seed: parsed.CURATOR_SEED,
    skipEnrichment: parsed.CURATOR_SKIP_ENRICHMENT,
    spotifyAccessToken: parsed.SPOTIFY_ACCESS_TOKEN,
  }
}
