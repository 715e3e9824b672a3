/**
 * Last.fm Service
 * Crowd-sourced taste signals for enrichment: tags, popularity, similar tracks and artist style
 * Every HTTP call waits on the pacer (Last.fm allows 5 requests per second)
 *
 * Error mapping:
 * - error 6 (track not found) -> null
 * - errors 10, 26 (invalid or suspended key) -> permanent
 * - errors 11, 16, 29, HTTP 429 and 5xx, network failures -> transient
 */

import {
  formatZodError,
  type LastFmArtistInfo,
  LastFmArtistInfoResponseSchema,
  LastFmErrorSchema,
  type LastFmSimilarTrack,
  type LastFmTrackInfo,
  LastFmTrackInfoResponseSchema,
  LastFmTrackSimilarResponseSchema,
} from '@partyset/shared-types'
import type {z} from 'zod'

import {LASTFM, LASTFM_ERROR_CODES} from '../constants'
import {PipelineError} from '../lib/errors'
import {getLogger} from '../utils/LoggerContext'
import {RequestPacer} from '../utils/RequestPacer'
import type {EnrichmentData, EnrichmentQuery, EnrichmentSource} from './MetadataEnricher'

export interface LastFmServiceOptions {
  apiBaseUrl?: string
  fetch?: typeof fetch
  pacer?: RequestPacer
}

export class LastFmService implements EnrichmentSource {
  private apiBaseUrl: string
  private apiKey: string
  private fetchFn: typeof fetch
  private pacer: RequestPacer

  constructor(apiKey: string, options: LastFmServiceOptions = {}) {
    this.apiKey = apiKey
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://ws.audioscrobbler.com/2.0/'
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
    this.pacer = options.pacer ?? new RequestPacer({minIntervalMs: LASTFM.REQUEST_INTERVAL_MS})
  }

  /**
   * Tags, listener counts, similar tracks and artist style for one track; null when Last.fm does not know it
   */
  async enrich(query: EnrichmentQuery): Promise<EnrichmentData | null> {
    const info = await this.getTrackInfo(query.artist, query.name)
    if (!info) {
      getLogger()?.debug(`[LastFm] No match for "${query.artist} - ${query.name}"`)
      return null
    }

    const similar = await this.getSimilarTracks(info.artist.name, info.name)
    const artist = await this.getArtistInfo(info.artist.name)
    const artistListeners = artist?.stats?.listeners
    const artistTags = artist?.tags?.tag.map(t => t.name)

    return {
      ...(artistListeners !== undefined && {artistListeners}),
      ...(artistTags !== undefined && {artistTags}),
      listenerCount: info.listeners,
      playCount: info.playcount,
      similarTracks: similar.map(t => `${t.artist.name} - ${t.name}`),
      tags: (info.toptags?.tag ?? []).map(t => t.name),
    }
  }

  /**
   * Call Last.fm API with Zod validation
   * Returns null for "not found"; throws a PipelineError for everything else that went wrong
   */
  private async callApi<T extends z.ZodTypeAny>(
    method: string,
    params: Record<string, string>,
    schema: T,
  ): Promise<null | z.infer<T>> {
    const queryParams = new URLSearchParams({
      api_key: this.apiKey,
      format: 'json',
      method,
      ...params,
    })

    await this.pacer.acquire()

    let response: Response
    try {
      response = await this.fetchFn(`${this.apiBaseUrl}?${queryParams}`)
    } catch (error) {
      throw new PipelineError(`Last.fm ${method} request failed`, 'transient', {cause: error})
    }

    if (response.status === 429 || response.status >= 500) {
      throw new PipelineError(`Last.fm ${method} returned HTTP ${response.status}`, 'transient', {
        context: {status: response.status},
      })
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new PipelineError(`Last.fm ${method} returned a non-JSON body`, response.ok ? 'transient' : 'permanent', {
        cause: error,
        context: {status: response.status},
      })
    }

    const apiError = LastFmErrorSchema.safeParse(body)
    if (apiError.success) {
      return this.handleApiError(method, apiError.data.error, apiError.data.message)
    }

    if (!response.ok) {
      throw new PipelineError(`Last.fm ${method} returned HTTP ${response.status}`, 'permanent', {
        context: {status: response.status},
      })
    }

    const validated = schema.safeParse(body)
    if (!validated.success) {
      throw new PipelineError(`Last.fm ${method} response invalid: ${formatZodError(validated.error)}`, 'transient')
    }
    return validated.data
  }

  private async getArtistInfo(artist: string): Promise<LastFmArtistInfo | null> {
    const data = await this.callApi('artist.getInfo', {artist, autocorrect: '1'}, LastFmArtistInfoResponseSchema)
    return data?.artist ?? null
  }

  private async getSimilarTracks(artist: string, track: string): Promise<LastFmSimilarTrack[]> {
    const data = await this.callApi(
      'track.getSimilar',
      {
        artist,
        autocorrect: '1',
        limit: String(LASTFM.SIMILAR_LIMIT),
        track,
      },
      LastFmTrackSimilarResponseSchema,
    )
    return data?.similartracks.track.slice(0, LASTFM.SIMILAR_LIMIT) ?? []
  }

  private async getTrackInfo(artist: string, track: string): Promise<LastFmTrackInfo | null> {
    const data = await this.callApi(
      'track.getInfo',
      {
        artist,
        autocorrect: '1',
        track,
      },
      LastFmTrackInfoResponseSchema,
    )
    return data?.track ?? null
  }

  private handleApiError(method: string, code: number, message: string): null {
    if (code === LASTFM_ERROR_CODES.NOT_FOUND) {
      return null
    }

    const kind = LASTFM_ERROR_CODES.PERMANENT.has(code) ? 'permanent' : 'transient'
    if (kind === 'transient' && !LASTFM_ERROR_CODES.TRANSIENT.has(code)) {
      getLogger()?.warn(`[LastFm] Unrecognized error ${code} from ${method}`, {message})
    }
    throw new PipelineError(`Last.fm ${method} error ${code}: ${message}`, kind, {context: {code}})
  }
}
