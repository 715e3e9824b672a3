/**
 * AI Prompts - prompt templates for party scoring
 *
 * The scoring prompt asks for a bare JSON array so the response can be parsed
 * entry by entry. Keep the output format in sync with ScoredTrackEntrySchema.
 */

import type {AcousticAttributes, Track} from '@partyset/shared-types'

// =============================================================================
// TYPES
// =============================================================================

/** One track as the scoring service sees it */
export interface ScoringTrackPayload {
  acoustic: AcousticAttributes
  album: null | string
  /** Artist-level Last.fm data: listeners and top tags ("artist style") */
  artist_listeners?: number
  artist_tags?: string[]
  artists: string[]
  cluster: null | string
  listener_count?: number
  name: string
  popularity: null | number
  tags?: string[]
  track_id: string
  track_number: number
}

export interface ScoringRequest {
  batchSequence: number
  payload: {tracks: ScoringTrackPayload[]}
  system: string
  user: string
}

// =============================================================================
// PARTY SCORING PROMPTS
// =============================================================================

export const PARTY_SCORING_SYSTEM_PROMPT =
  'You are an expert party DJ. You judge how well songs work at a lively party. Return only valid JSON.'

export function buildScoringPayload(
  tracks: readonly Track[],
  clusterDescriptors: ReadonlyMap<number, string>,
): ScoringTrackPayload[] {
  return tracks.map((track, i) => ({
    acoustic: {...track.acoustic},
    album: track.album,
    ...(track.artistListeners !== undefined && {artist_listeners: track.artistListeners}),
    ...(track.artistTags && track.artistTags.length > 0 && {artist_tags: track.artistTags.slice(0, 5)}),
    artists: [...track.artists],
    cluster: track.clusterId === undefined ? null : (clusterDescriptors.get(track.clusterId) ?? null),
    ...(track.listenerCount !== undefined && {listener_count: track.listenerCount}),
    name: track.name,
    popularity: track.popularity,
    ...(track.tags && track.tags.length > 0 && {tags: track.tags.slice(0, 5)}),
    track_id: track.id,
    track_number: i + 1,
  }))
}

/**
 * Prompt for scoring one batch of tracks for party suitability
 */
export function buildPartyScoringPrompt(tracks: ScoringTrackPayload[]): string {
  return `<task>
Rate each track below for how well it would work at a party (1-10 scale).
</task>

<tracks>
${JSON.stringify(tracks, null, 2)}
</tracks>

<criteria>
- Danceability and energy level
- Crowd appeal and recognizability
- Mood and vibe (uplifting, fun, singalong)
- How well it fits its style group ("cluster")
- Crowd tags for the track ("tags") and the artist's style ("artist_tags"), where given
Acoustic attributes follow the catalog's ranges: 0-1 ratios, loudness in dB, tempo in BPM.
</criteria>

<output_format>
Return ONLY a JSON array with one object per track, in any order:
[
  {
    "track_id": "<track_id from input>",
    "track_number": <track_number from input>,
    "party_score": <number from 1 to 10>,
    "recommendation": "yes" | "maybe" | "no",
    "reasoning": "<one or two sentences>"
  }
]
</output_format>`
}

export function buildScoringRequest(
  batchSequence: number,
  tracks: readonly Track[],
  clusterDescriptors: ReadonlyMap<number, string>,
): ScoringRequest {
  const payload = buildScoringPayload(tracks, clusterDescriptors)
  return {
    batchSequence,
    payload: {tracks: payload},
    system: PARTY_SCORING_SYSTEM_PROMPT,
    user: buildPartyScoringPrompt(payload),
  }
}
