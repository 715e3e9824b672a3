/**
 * MetadataEnricher - optional crowd-sourced metadata (tags, similar tracks, listeners)
 *
 * Runs one lookup per track, sequentially. Sources pace their own HTTP calls; a
 * pacer given here spaces whole lookups on top of that. A lookup that keeps
 * failing transiently is counted and the track stays unenriched; "not found" is
 * counted separately. A permanent failure (e.g. a rejected API key) stops the run.
 */

import type {Track} from '@partyset/shared-types'

import {GENRE_TAGS_PER_TRACK} from '../constants'
import {isTransient, toPipelineError} from '../lib/errors'
import {DEFAULT_RETRY_POLICY, type RetryPolicy, withRetry} from '../lib/retry-policy'
import type {RandomSource} from '../lib/seeded-random'
import {getLogger} from '../utils/LoggerContext'
import type {RequestPacer, Sleep} from '../utils/RequestPacer'
import type {EnrichmentFields, TrackWorkingSet} from './TrackWorkingSet'

// ===== Types =====

export interface EnrichmentQuery {
  artist: string
  id: string
  name: string
}

export type EnrichmentData = EnrichmentFields

/**
 * Metadata enrichment source: data for a track, or null when the source does not know it
 */
export interface EnrichmentSource {
  enrich(query: EnrichmentQuery): Promise<EnrichmentData | null>
}

export interface EnrichmentCounts {
  enriched: number
  failed: number
  notFound: number
  skipped: boolean
}

export interface EnrichmentOptions {
  enabled?: boolean
  pacer?: RequestPacer
  random?: RandomSource
  retryPolicy?: RetryPolicy
  sleep?: Sleep
}

export interface GenreCount {
  count: number
  tag: string
}

// ===== Enrichment =====

export async function enrichTracks(
  workingSet: TrackWorkingSet,
  source: EnrichmentSource | null | undefined,
  options: EnrichmentOptions = {},
): Promise<EnrichmentCounts> {
  const counts: EnrichmentCounts = {enriched: 0, failed: 0, notFound: 0, skipped: false}

  if (!source || options.enabled === false) {
    getLogger()?.info('Metadata enrichment skipped')
    return {...counts, skipped: true}
  }

  return workingSet.runStageAsync('enrich', async () => {
    for (const track of workingSet.all()) {
      const query = toQuery(track)
      if (!query) {
        counts.notFound++
        continue
      }

      let data: EnrichmentData | null
      try {
        data = await withRetry(
          async () => {
            await options.pacer?.acquire()
            return source.enrich(query)
          },
          {
            label: `Enrichment of ${track.id}`,
            policy: options.retryPolicy ?? DEFAULT_RETRY_POLICY,
            random: options.random,
            sleep: options.sleep,
          },
        )
      } catch (error) {
        const pipelineError = toPipelineError(error)
        if (!isTransient(pipelineError)) throw pipelineError

        counts.failed++
        getLogger()?.warn(`Enrichment failed for ${track.id}; continuing without it`, {error: pipelineError.message})
        continue
      }

      if (data === null) {
        counts.notFound++
        continue
      }

      workingSet.setEnrichment(track.id, data)
      counts.enriched++
    }

    getLogger()?.info('Metadata enrichment complete', {...counts})
    return counts
  })
}

function toQuery(track: Track): EnrichmentQuery | null {
  const artist = track.artists[0]?.trim()
  const name = track.name.trim()
  if (!artist || !name) return null
  return {artist, id: track.id, name}
}

/**
 * Count the leading tags of every enriched track, most frequent first
 */
export function summarizeGenres(tracks: readonly Track[], topPerTrack = GENRE_TAGS_PER_TRACK): GenreCount[] {
  const counts = new Map<string, number>()
  for (const track of tracks) {
    for (const tag of (track.tags ?? []).slice(0, topPerTrack)) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1)
    }
  }

  return Array.from(counts.entries())
    .map(([tag, count]) => ({count, tag}))
    .sort((a, b) => b.count - a.count)
}
