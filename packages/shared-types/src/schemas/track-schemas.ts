/**
 * Zod schemas for raw provider records and the canonical Track
 *
 * Provider records arrive as a tagged union (one variant per catalog source)
 * and are validated before the Normalizer merges them into Tracks.
 */

import {z} from 'zod'

// ===== Acoustic Attributes =====

/** Fixed feature schema, in vector order */
export const ACOUSTIC_FEATURES = [
  'danceability',
  'energy',
  'loudness',
  'speechiness',
  'acousticness',
  'instrumentalness',
  'liveness',
  'valence',
  'tempo',
] as const

export const AcousticFeatureSchema = z.enum(ACOUSTIC_FEATURES)

const ratio = z.number().finite().min(0).max(1)

/**
 * Provider values may be null when the catalog has no analysis for a field.
 * Null is treated the same as absent.
 */
export const AudioFeaturesSchema = z.object({
  acousticness: ratio.nullable().optional(),
  danceability: ratio.nullable().optional(),
  energy: ratio.nullable().optional(),
  instrumentalness: ratio.nullable().optional(),
  liveness: ratio.nullable().optional(),
  loudness: z.number().finite().nullable().optional(),
  speechiness: ratio.nullable().optional(),
  tempo: z.number().finite().min(0).nullable().optional(),
  valence: ratio.nullable().optional(),
})

// ===== Raw Provider Records =====

const RawTrackBaseSchema = z.object({
  album: z.string().nullable().optional(),
  artists: z.array(z.string()).optional(),
  audioFeatures: AudioFeaturesSchema.optional(),
  durationMs: z.number().int().nonnegative().nullable().optional(),
  externalUrl: z.string().nullable().optional(),
  id: z.string().nullable().optional(),
  name: z.string().optional(),
  popularity: z.number().min(0).max(100).nullable().optional(),
  previewUrl: z.string().nullable().optional(),
})

export const TimeRangeSchema = z.enum(['short_term', 'medium_term', 'long_term'])

/** A track from the listener's "top tracks" list */
export const TopTrackRecordSchema = RawTrackBaseSchema.extend({
  rank: z.number().int().positive().optional(),
  source: z.literal('top'),
  timeRange: TimeRangeSchema.optional(),
})

/** A track from the listener's saved ("liked") tracks */
export const SavedTrackRecordSchema = RawTrackBaseSchema.extend({
  addedAt: z.string().optional(),
  source: z.literal('saved'),
})

export const RawTrackRecordSchema = z.discriminatedUnion('source', [TopTrackRecordSchema, SavedTrackRecordSchema])

// ===== AI Judgement =====

export const AIRecommendationSchema = z.enum(['yes', 'maybe', 'no'])

// ===== Type Exports =====

export type AcousticFeature = z.infer<typeof AcousticFeatureSchema>
export type AcousticAttributes = Partial<Record<AcousticFeature, number>>
export type AIRecommendation = z.infer<typeof AIRecommendationSchema>
export type AudioFeatures = z.infer<typeof AudioFeaturesSchema>
export type RawTrackRecord = z.infer<typeof RawTrackRecordSchema>
export type RawTrackSource = RawTrackRecord['source']
export type SavedTrackRecord = z.infer<typeof SavedTrackRecordSchema>
export type TimeRange = z.infer<typeof TimeRangeSchema>
export type TopTrackRecord = z.infer<typeof TopTrackRecordSchema>

/**
 * Canonical in-memory record for one song, merged from one or more provider records.
 *
 * Descriptive and acoustic fields are written by the Normalizer only. Enrichment
 * fields come from metadata sources; derived fields are written by pipeline stages.
 */
export interface Track {
  acoustic: AcousticAttributes
  album: null | string
  artists: string[]
  durationMs: null | number
  externalUrl: null | string
  id: string
  name: string
  popularity: null | number
  previewUrl: null | string
  sources: RawTrackSource[]

  // Enrichment
  artistListeners?: number
  artistTags?: string[]
  listenerCount?: number
  playCount?: number
  similarTracks?: string[]
  tags?: string[]

  // Derived
  aiReasoning?: string
  aiRecommendation?: AIRecommendation
  aiScore?: number
  clusterId?: number
  featureVector?: number[]
}
