/**
 * Spotify Catalog Service
 * Listening history (top + saved tracks, with audio features) and playlist creation
 *
 * Retries 429 (honouring Retry-After) and 5xx inside the client.
 * 401/403 are permanent: a bad or under-scoped token will not fix itself.
 */

import {
  type AudioFeatures,
  formatZodError,
  type RawTrackRecord,
  SpotifyAddTracksResponseSchema,
  type SpotifyAudioFeatures,
  SpotifyAudioFeaturesBatchSchema,
  type SpotifyCreatePlaylistRequest,
  SpotifyCreatePlaylistResponseSchema,
  SpotifyErrorSchema,
  SpotifySavedTracksResponseSchema,
  SpotifyTopTracksResponseSchema,
  type SpotifyTrack,
  SpotifyUserSchema,
  type TimeRange,
} from '@partyset/shared-types'
import type {z} from 'zod'

import {SPOTIFY_LIMITS} from '../constants'
import {PipelineError} from '../lib/errors'
import {getLogger} from '../utils/LoggerContext'
import {sleep as defaultSleep, type Sleep} from '../utils/RequestPacer'
import type {CatalogSource} from './PartyPipeline'
import type {PlaylistReference, PlaylistSink} from './PlaylistAssembler'

export interface SpotifyCatalogOptions {
  apiBaseUrl?: string
  fetch?: typeof fetch
  maxRetries?: number
  sleep?: Sleep
  timeRange?: TimeRange
}

export class SpotifyCatalogService implements CatalogSource, PlaylistSink {
  private accessToken: string
  private apiBaseUrl: string
  private fetchFn: typeof fetch
  private maxRetries: number
  private sleep: Sleep
  private timeRange: TimeRange

  constructor(accessToken: string, options: SpotifyCatalogOptions = {}) {
    this.accessToken = accessToken
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.spotify.com/v1'
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
    this.maxRetries = options.maxRetries ?? SPOTIFY_LIMITS.MAX_RETRIES
    this.sleep = options.sleep ?? defaultSleep
    this.timeRange = options.timeRange ?? 'medium_term'
  }

  // ===== Listening History =====

  async fetchSavedTracks(limit: number): Promise<RawTrackRecord[]> {
    const saved: {addedAt: string; track: SpotifyTrack}[] = []
    let offset = 0

    while (saved.length < limit) {
      const pageSize = Math.min(SPOTIFY_LIMITS.SAVED_PAGE_SIZE, limit - saved.length)
      const page = await this.request(
        `/me/tracks?limit=${pageSize}&offset=${offset}`,
        SpotifySavedTracksResponseSchema,
      )
      saved.push(...page.items.map(item => ({addedAt: item.added_at, track: item.track})))
      offset += page.items.length

      if (page.next === null || page.items.length === 0) break
    }

    const features = await this.fetchAudioFeatures(saved.map(item => item.track.id))
    getLogger()?.info(`[Spotify] Fetched ${saved.length} saved tracks`)

    return saved.map(({addedAt, track}): RawTrackRecord => ({
      ...toRecordFields(track, features),
      addedAt,
      source: 'saved',
    }))
  }

  async fetchTopTracks(limit: number): Promise<RawTrackRecord[]> {
    const size = Math.min(SPOTIFY_LIMITS.TOP_TRACKS_MAX, limit)
    if (size <= 0) return []

    const page = await this.request(
      `/me/top/tracks?limit=${size}&time_range=${this.timeRange}`,
      SpotifyTopTracksResponseSchema,
    )
    const features = await this.fetchAudioFeatures(page.items.map(track => track.id))
    getLogger()?.info(`[Spotify] Fetched ${page.items.length} top tracks`, {timeRange: this.timeRange})

    return page.items.map((track, i): RawTrackRecord => ({
      ...toRecordFields(track, features),
      rank: i + 1,
      source: 'top',
      timeRange: this.timeRange,
    }))
  }

  // ===== Playlist Sink =====

  async createPlaylist(name: string, description: string, trackIds: readonly string[]): Promise<PlaylistReference> {
    const user = await this.request('/me', SpotifyUserSchema)

    const body: SpotifyCreatePlaylistRequest = {description, name, public: false}
    const playlist = await this.request(
      `/users/${encodeURIComponent(user.id)}/playlists`,
      SpotifyCreatePlaylistResponseSchema,
      {body: JSON.stringify(body), method: 'POST'},
    )

    for (let i = 0; i < trackIds.length; i += SPOTIFY_LIMITS.PLAYLIST_ADD_CHUNK) {
      const uris = trackIds.slice(i, i + SPOTIFY_LIMITS.PLAYLIST_ADD_CHUNK).map(id => `spotify:track:${id}`)
      await this.request(`/playlists/${playlist.id}/tracks`, SpotifyAddTracksResponseSchema, {
        body: JSON.stringify({uris}),
        method: 'POST',
      })
    }

    getLogger()?.info(`[Spotify] Created playlist "${playlist.name}" with ${trackIds.length} tracks`)
    return {id: playlist.id, url: playlist.external_urls.spotify}
  }

  // ===== Internals =====

  /**
   * Audio features by track id. A failed chunk is logged and skipped:
   * tracks without features are still usable.
   */
  private async fetchAudioFeatures(ids: readonly (null | string)[]): Promise<Map<string, SpotifyAudioFeatures>> {
    const unique = [...new Set(ids.filter((id): id is string => typeof id === 'string' && id !== ''))]
    const features = new Map<string, SpotifyAudioFeatures>()

    for (let i = 0; i < unique.length; i += SPOTIFY_LIMITS.AUDIO_FEATURES_CHUNK) {
      const chunk = unique.slice(i, i + SPOTIFY_LIMITS.AUDIO_FEATURES_CHUNK)
      try {
        const data = await this.request(`/audio-features?ids=${chunk.join(',')}`, SpotifyAudioFeaturesBatchSchema)
        for (const item of data.audio_features) {
          if (item) features.set(item.id, item)
        }
      } catch (error) {
        getLogger()?.warn('[Spotify] Audio features unavailable for a chunk; continuing without them', {
          chunkSize: chunk.length,
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
    return features
  }

  private async request<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    init: {body?: string; method?: string} = {},
  ): Promise<z.infer<T>> {
    const url = `${this.apiBaseUrl}${path}`

    for (let attempt = 0; ; attempt++) {
      let response: Response
      try {
        response = await this.fetchFn(url, {
          body: init.body,
          headers: {
            Authorization: `Bearer ${this.accessToken}`,
            ...(init.body !== undefined && {'Content-Type': 'application/json'}),
          },
          method: init.method ?? 'GET',
        })
      } catch (error) {
        if (attempt >= this.maxRetries) {
          throw new PipelineError(`Spotify request to ${path} failed`, 'transient', {cause: error})
        }
        await this.sleep(backoffMs(attempt))
        continue
      }

      if (response.status === 401 || response.status === 403) {
        throw new PipelineError(`Spotify rejected the access token (HTTP ${response.status})`, 'permanent', {
          context: {path, status: response.status},
        })
      }

      if (response.status === 429 || response.status >= 500) {
        if (attempt >= this.maxRetries) {
          throw new PipelineError(`Spotify ${path} returned HTTP ${response.status}`, 'transient', {
            context: {path, status: response.status},
          })
        }
        const waitMs = response.status === 429 ? retryAfterMs(response.headers.get('Retry-After')) : backoffMs(attempt)
        getLogger()?.warn(`[Spotify] HTTP ${response.status}, retrying in ${waitMs}ms`, {attempt: attempt + 1, path})
        await this.sleep(waitMs)
        continue
      }

      if (!response.ok) {
        const detail = await readErrorMessage(response)
        throw new PipelineError(
          `Spotify ${path} returned HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
          'permanent',
          {context: {path, status: response.status}},
        )
      }

      const validated = schema.safeParse(await response.json())
      if (!validated.success) {
        throw new PipelineError(`Spotify ${path} response invalid: ${formatZodError(validated.error)}`, 'permanent')
      }
      return validated.data
    }
  }
}

/**
 * Spotify's own error message from a failed response, when the body carries one
 */
async function readErrorMessage(response: Response): Promise<null | string> {
  let body: unknown
  try {
    body = await response.json()
  } catch {
    return null
  }
  const parsed = SpotifyErrorSchema.safeParse(body)
  return parsed.success ? parsed.data.error.message : null
}

// ===== Mapping =====

function toRecordFields(track: SpotifyTrack, features: ReadonlyMap<string, SpotifyAudioFeatures>) {
  const audio = track.id ? features.get(track.id) : undefined
  return {
    album: track.album.name,
    artists: track.artists.map(artist => artist.name),
    ...(audio && {audioFeatures: toAudioFeatures(audio)}),
    durationMs: track.duration_ms,
    externalUrl: track.external_urls?.spotify ?? null,
    id: track.id,
    name: track.name,
    popularity: track.popularity ?? null,
    previewUrl: track.preview_url ?? null,
  }
}

function toAudioFeatures(features: SpotifyAudioFeatures): AudioFeatures {
  return {
    acousticness: features.acousticness,
    danceability: features.danceability,
    energy: features.energy,
    instrumentalness: features.instrumentalness,
    liveness: features.liveness,
    loudness: features.loudness,
    speechiness: features.speechiness,
    tempo: features.tempo,
    valence: features.valence,
  }
}

function backoffMs(attempt: number): number {
  return SPOTIFY_LIMITS.RETRY_FALLBACK_MS * 2 ** attempt
}

function retryAfterMs(header: null | string): number {
  const seconds = header === null ? NaN : Number(header)
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : SPOTIFY_LIMITS.RETRY_FALLBACK_MS
}
