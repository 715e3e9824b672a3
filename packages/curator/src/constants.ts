/**
 * Curator Constants
 * Centralized magic numbers and default settings for the pipeline and its collaborators
 */

import {ACOUSTIC_FEATURES} from '@partyset/shared-types'

// =============================================================================
// FEATURE SCHEMA
// =============================================================================

/** Acoustic attributes in vector order */
export const FEATURE_SCHEMA = ACOUSTIC_FEATURES

// =============================================================================
// PIPELINE DEFAULTS
// =============================================================================

export const PIPELINE_DEFAULTS = {
  BATCH_SIZE: 10,
  CLUSTERS: 5,
  MIN_SCORE: 6,
  PCA_COMPONENTS: 5,
  SEED: 42,
} as const

/** Valid party-score range, inclusive on both ends */
export const SCORE_RANGE = {
  MAX: 10,
  MIN: 1,
} as const

/** Scores at or above this count as "high" in the run report */
export const HIGH_SCORE_THRESHOLD = 7

// =============================================================================
// CLUSTERING
// =============================================================================

export const KMEANS = {
  /** Restarts with fresh seeding; the lowest-inertia run wins */
  N_INIT: 10,
  MAX_ITERATIONS: 300,
  /** Converged once no centroid moves further than this */
  TOLERANCE: 1e-4,
} as const

export const JACOBI = {
  MAX_SWEEPS: 100,
  EPSILON: 1e-12,
} as const

/** Standardized-centroid thresholds for style descriptors (in standard deviations) */
export const DESCRIPTOR_THRESHOLDS = {
  HIGH: 0.5,
  LOW: -0.5,
} as const

export const EMPTY_CLUSTER_DESCRIPTOR = 'miscellaneous'
export const FALLBACK_DESCRIPTOR = 'Mixed style'

/** Sample tracks listed per cluster in summaries */
export const CLUSTER_SAMPLE_SIZE = 3

// =============================================================================
// AI VALIDATION
// =============================================================================

export const RETRY_DEFAULTS = {
  BASE_DELAY_MS: 1000,
  JITTER_MS: 250,
  MAX_ATTEMPTS: 3,
  MAX_DELAY_MS: 30_000,
} as const

export const SCORING_DEFAULTS = {
  MAX_TOKENS: 1000,
  MODEL: 'claude-sonnet-4-5-20250929',
  /** Minimum interval between scoring requests */
  REQUEST_INTERVAL_MS: 1000,
  TEMPERATURE: 0.1,
  TIMEOUT_MS: 60_000,
} as const

// =============================================================================
// COLLABORATOR APIS
// =============================================================================

export const SPOTIFY_LIMITS = {
  AUDIO_FEATURES_CHUNK: 100,
  MAX_RETRIES: 3,
  PLAYLIST_ADD_CHUNK: 100,
  /** Fallback wait when a 429 carries no Retry-After */
  RETRY_FALLBACK_MS: 1000,
  SAVED_PAGE_SIZE: 50,
  TOP_TRACKS_MAX: 50,
} as const

/** Tracks fetched from each history source never exceed this */
export const HISTORY_PER_SOURCE_MAX = 50

export const LASTFM = {
  /** Last.fm allows 5 requests per second */
  REQUEST_INTERVAL_MS: 200,
  SIMILAR_LIMIT: 5,
} as const

/** Last.fm error codes and how the pipeline treats them */
export const LASTFM_ERROR_CODES = {
  NOT_FOUND: 6,
  /** Invalid or suspended API key */
  PERMANENT: new Set<number>([10, 26]),
  /** 11 offline, 16 temporary failure, 29 rate limited */
  TRANSIENT: new Set<number>([11, 16, 29]),
}

/** Tags counted per track in the genre summary */
export const GENRE_TAGS_PER_TRACK = 3
