/**
 * FeatureExtractor - acoustic attributes to standardized feature vectors
 *
 * 1. Impute: a missing attribute takes the corpus mean over tracks that have it
 *    (zero when no track has it)
 * 2. Standardize each dimension to zero mean, unit (population) variance
 * 3. A zero-variance dimension stays at zero after centering
 *
 * Pure arithmetic over the working set; same input, same vectors.
 */

import type {AcousticAttributes, AcousticFeature, Track} from '@partyset/shared-types'

import {FEATURE_SCHEMA} from '../constants'
import {getLogger} from '../utils/LoggerContext'
import type {TrackWorkingSet} from './TrackWorkingSet'

// ===== Types =====

export interface FeatureStats {
  /** Corpus mean per dimension, over tracks that carry the attribute */
  means: number[]
  presentCounts: number[]
  schema: readonly AcousticFeature[]
  stdDevs: number[]
}

export interface FeatureExtractionResult {
  stats: FeatureStats
  vectors: Map<string, number[]>
}

/** Below this a dimension is treated as constant */
const ZERO_VARIANCE = 1e-12

// ===== Extraction =====

export function extractFeatures(
  workingSet: TrackWorkingSet,
  schema: readonly AcousticFeature[] = FEATURE_SCHEMA,
): FeatureExtractionResult {
  return workingSet.runStage('extract', () => {
    const tracks = workingSet.all()
    const stats = computeFeatureStats(tracks, schema)
    const vectors = new Map<string, number[]>()

    for (const track of tracks) {
      const vector = standardize(imputeRow(track, stats), stats)
      workingSet.setFeatureVector(track.id, vector)
      vectors.set(track.id, vector)
    }

    const missing = schema.filter((_, i) => stats.presentCounts[i] === 0)
    if (missing.length > 0) {
      getLogger()?.warn('No track carries these attributes; imputed as zero', {features: missing})
    }
    getLogger()?.debug(`Extracted ${vectors.size} feature vectors of length ${schema.length}`)

    return {stats, vectors}
  })
}

export function computeFeatureStats(tracks: readonly Track[], schema: readonly AcousticFeature[]): FeatureStats {
  const sums = new Array<number>(schema.length).fill(0)
  const presentCounts = new Array<number>(schema.length).fill(0)

  for (const track of tracks) {
    schema.forEach((feature, j) => {
      const value = readAttribute(track, feature)
      if (value !== null) {
        sums[j] += value
        presentCounts[j]++
      }
    })
  }

  const means = sums.map((sum, j) => (presentCounts[j] > 0 ? sum / presentCounts[j] : 0))

  // Variance over the imputed column: imputed entries sit on the mean and add nothing
  const squares = new Array<number>(schema.length).fill(0)
  for (const track of tracks) {
    schema.forEach((feature, j) => {
      const value = readAttribute(track, feature)
      if (value !== null) {
        squares[j] += (value - means[j]) ** 2
      }
    })
  }
  const stdDevs = squares.map(sq => (tracks.length > 0 ? Math.sqrt(sq / tracks.length) : 0))

  return {means, presentCounts, schema, stdDevs}
}

/**
 * Finite provider value, or null when the attribute is absent
 */
function readAttribute(track: Track, feature: AcousticFeature): null | number {
  const value = track.acoustic[feature]
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

function imputeRow(track: Track, stats: FeatureStats): number[] {
  return stats.schema.map((feature, j) => readAttribute(track, feature) ?? stats.means[j])
}

function standardize(row: number[], stats: FeatureStats): number[] {
  return row.map((value, j) => {
    const std = stats.stdDevs[j]
    return std > ZERO_VARIANCE ? (value - stats.means[j]) / std : 0
  })
}

// ===== Averages =====

/**
 * Mean raw value per attribute over the tracks that carry it, rounded to 3 decimals.
 * Attributes no track carries are left out.
 */
export function averageAcoustic(tracks: readonly Track[], schema: readonly AcousticFeature[] = FEATURE_SCHEMA): AcousticAttributes {
  const averages: AcousticAttributes = {}
  for (const feature of schema) {
    const values = tracks.flatMap(track => {
      const v = track.acoustic[feature]
      return typeof v === 'number' ? [v] : []
    })
    if (values.length > 0) {
      averages[feature] = Math.round((values.reduce((a, b) => a + b, 0) / values.length) * 1000) / 1000
    }
  }
  return averages
}
