/**
 * Zod schemas for the Spotify Web API responses the catalog client reads
 * Unknown keys are stripped, so only the fields the curator uses are declared
 */

import {z} from 'zod'

// ===== Base Types =====

export const SpotifyExternalUrlsSchema = z.object({
  spotify: z.string().url(),
})

export const SpotifyArtistSimpleSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string(),
})

export const SpotifyAlbumSimpleSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string(),
})

// ===== Track =====

export const SpotifyTrackSchema = z.object({
  album: SpotifyAlbumSimpleSchema,
  artists: z.array(SpotifyArtistSimpleSchema),
  duration_ms: z.number(),
  external_urls: SpotifyExternalUrlsSchema.partial().optional(),
  // Local files have no catalog id
  id: z.string().nullable(),
  is_local: z.boolean().optional(),
  name: z.string(),
  popularity: z.number().min(0).max(100).optional(),
  preview_url: z.string().nullable().optional(),
  uri: z.string(),
})

// ===== Audio Features =====

export const SpotifyAudioFeaturesSchema = z.object({
  acousticness: z.number().min(0).max(1),
  danceability: z.number().min(0).max(1),
  energy: z.number().min(0).max(1),
  id: z.string(),
  instrumentalness: z.number().min(0).max(1),
  liveness: z.number().min(0).max(1),
  loudness: z.number(),
  speechiness: z.number().min(0).max(1),
  tempo: z.number().min(0),
  valence: z.number().min(0).max(1),
})

export const SpotifyAudioFeaturesBatchSchema = z.object({
  audio_features: z.array(SpotifyAudioFeaturesSchema.nullable()),
})

// ===== Paging Objects =====

export const SpotifyPagingSchema = <T extends z.ZodTypeAny>(itemSchema: T) =>
  z.object({
    items: z.array(itemSchema),
    limit: z.number(),
    next: z.string().nullable(),
    offset: z.number(),
    total: z.number(),
  })

export const SpotifyTopTracksResponseSchema = SpotifyPagingSchema(SpotifyTrackSchema)

export const SpotifySavedTrackSchema = z.object({
  added_at: z.string(),
  track: SpotifyTrackSchema,
})

export const SpotifySavedTracksResponseSchema = SpotifyPagingSchema(SpotifySavedTrackSchema)

// ===== User =====

export const SpotifyUserSchema = z.object({
  display_name: z.string().nullable().optional(),
  id: z.string(),
})

// ===== Create Playlist =====

export const SpotifyCreatePlaylistRequestSchema = z.object({
  description: z.string().optional(),
  name: z.string().min(1),
  public: z.boolean().optional(),
})

export const SpotifyCreatePlaylistResponseSchema = z.object({
  external_urls: SpotifyExternalUrlsSchema,
  id: z.string(),
  name: z.string(),
})

// ===== Add Tracks to Playlist =====

export const SpotifyAddTracksResponseSchema = z.object({
  snapshot_id: z.string(),
})

// ===== Error Response =====

export const SpotifyErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    status: z.number(),
  }),
})

// ===== Type Exports =====

export type SpotifyAudioFeatures = z.infer<typeof SpotifyAudioFeaturesSchema>
export type SpotifyCreatePlaylistRequest = z.infer<typeof SpotifyCreatePlaylistRequestSchema>
export type SpotifyCreatePlaylistResponse = z.infer<typeof SpotifyCreatePlaylistResponseSchema>
export type SpotifySavedTrack = z.infer<typeof SpotifySavedTrackSchema>
export type SpotifyTrack = z.infer<typeof SpotifyTrackSchema>
export type SpotifyUser = z.infer<typeof SpotifyUserSchema>
