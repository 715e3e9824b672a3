/**
 * Zod schemas for external metadata APIs
 * Covers the Last.fm endpoints used for enrichment
 */

import {z} from 'zod'

// ===== Last.fm API =====

/**
 * Helper to coerce string numbers to actual numbers
 * Last.fm API returns counts as strings
 */
const numberCoercion = z.preprocess(val => {
  if (typeof val === 'string' && val.trim() !== '') {
    const num = Number(val)
    return isNaN(num) ? val : num
  }
  return val
}, z.number())

/**
 * Helper to handle URLs that might be empty strings
 * Last.fm API returns empty strings instead of null/undefined
 */
const urlOrEmpty = z.preprocess(val => {
  if (typeof val === 'string' && val.trim() === '') {
    return null
  }
  return val
}, z.string().url().nullable())

/**
 * Last.fm collapses single-element lists into a bare object
 */
function oneOrMany<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess(val => {
    if (val === undefined || val === null) return []
    return Array.isArray(val) ? val : [val]
  }, z.array(item))
}

export const LastFmTagSchema = z.object({
  name: z.string(),
  url: urlOrEmpty.optional(),
})

export const LastFmArtistSchema = z.object({
  mbid: z.string().optional(),
  name: z.string(),
  url: urlOrEmpty.optional(),
})

export const LastFmSimilarTrackSchema = z.object({
  artist: LastFmArtistSchema,
  match: numberCoercion.pipe(z.number().min(0).max(1)),
  mbid: z.string().optional(),
  name: z.string(),
  playcount: numberCoercion.optional(),
  url: urlOrEmpty.optional(),
})

export const LastFmTrackInfoSchema = z.object({
  artist: LastFmArtistSchema,
  duration: numberCoercion.optional(),
  listeners: numberCoercion.optional(),
  mbid: z.string().optional(),
  name: z.string(),
  playcount: numberCoercion.optional(),
  toptags: z
    .object({
      tag: oneOrMany(LastFmTagSchema),
    })
    .optional(),
  url: urlOrEmpty.optional(),
})

export const LastFmTrackInfoResponseSchema = z.object({
  track: LastFmTrackInfoSchema,
})

export const LastFmTrackSimilarResponseSchema = z.object({
  similartracks: z.object({
    '@attr': z
      .object({
        artist: z.string(),
      })
      .optional(),
    track: oneOrMany(LastFmSimilarTrackSchema),
  }),
})

export const LastFmArtistInfoResponseSchema = z.object({
  artist: z.object({
    name: z.string(),
    stats: z
      .object({
        listeners: numberCoercion.optional(),
        playcount: numberCoercion.optional(),
      })
      .optional(),
    tags: z
      .object({
        tag: oneOrMany(LastFmTagSchema),
      })
      .optional(),
  }),
})

/**
 * Last.fm reports failures in a 200 or 4xx body: {error: 6, message: "Track not found"}
 */
export const LastFmErrorSchema = z.object({
  error: z.number(),
  message: z.string(),
})

// ===== Type Exports =====

export type LastFmArtistInfo = z.infer<typeof LastFmArtistInfoResponseSchema>['artist']
export type LastFmError = z.infer<typeof LastFmErrorSchema>
export type LastFmSimilarTrack = z.infer<typeof LastFmSimilarTrackSchema>
export type LastFmTag = z.infer<typeof LastFmTagSchema>
export type LastFmTrackInfo = z.infer<typeof LastFmTrackInfoSchema>
