/**
 * Zod schemas for scoring-service output validation
 *
 * The scoring model answers with a JSON array, one entry per track in the batch.
 * Each entry is validated on its own so one malformed entry does not sink the batch.
 */

import {z} from 'zod'

import {AIRecommendationSchema} from './track-schemas'

const numericString = z.preprocess(val => {
  if (typeof val === 'string' && val.trim() !== '') {
    return Number(val)
  }
  return val
}, z.number().finite())

// ===== Party Score Entry =====

export const PartyScoreSchema = numericString.pipe(z.number().min(1).max(10))

export const PartyRecommendationSchema = z.preprocess(
  val => (typeof val === 'string' ? val.trim().toLowerCase() : val),
  AIRecommendationSchema,
)

/** Judgement fields of one entry; the track keys are resolved separately */
export const ScoredTrackEntrySchema = z.object({
  party_score: PartyScoreSchema,
  reasoning: z.string().trim().min(1),
  recommendation: PartyRecommendationSchema,
})

const TrackPositionSchema = z.preprocess(
  val => (typeof val === 'string' && val.trim() !== '' ? Number(val) : val),
  z.number().int().positive(),
)

/**
 * Keys used to match an entry to a track. A malformed key reads as absent,
 * so a bad track_number cannot hide a valid track_id.
 */
export const ScoredTrackKeySchema = z.object({
  track_id: z.string().optional().catch(undefined),
  track_number: TrackPositionSchema.optional().catch(undefined),
})

// ===== Type Exports =====

export type ScoredTrackEntry = z.infer<typeof ScoredTrackEntrySchema>
export type ScoredTrackKey = z.infer<typeof ScoredTrackKeySchema>
