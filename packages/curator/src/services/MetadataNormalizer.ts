/**
 * MetadataNormalizer - raw provider records to canonical Tracks
 *
 * Records are validated against the tagged RawTrackRecord union, deduplicated
 * by provider id and merged field by field: a later record overwrites an earlier
 * one only for the fields it actually carries. Output keeps first-seen order.
 * No network calls.
 */

import {
  ACOUSTIC_FEATURES,
  type AcousticAttributes,
  type RawTrackRecord,
  RawTrackRecordSchema,
  type Track,
} from '@partyset/shared-types'

import {getLogger} from '../utils/LoggerContext'

// ===== Types =====

export interface DroppedCounts {
  malformed: number
  missingIdentity: number
}

export interface NormalizationResult {
  dropped: DroppedCounts
  inputCount: number
  tracks: Track[]
}

// ===== Normalization =====

export function normalize(rawRecords: readonly unknown[]): NormalizationResult {
  const byId = new Map<string, Track>()
  const dropped: DroppedCounts = {malformed: 0, missingIdentity: 0}

  for (const raw of rawRecords) {
    const parsed = RawTrackRecordSchema.safeParse(raw)
    if (!parsed.success) {
      dropped.malformed++
      continue
    }

    const record = parsed.data
    const id = record.id?.trim()
    if (!id) {
      dropped.missingIdentity++
      continue
    }

    const existing = byId.get(id)
    if (existing) {
      mergeInto(existing, record)
    } else {
      byId.set(id, createTrack(id, record))
    }
  }

  const tracks = Array.from(byId.values())

  if (dropped.malformed > 0 || dropped.missingIdentity > 0) {
    getLogger()?.warn('Dropped unusable raw records', {...dropped})
  }
  getLogger()?.info(`Normalized ${rawRecords.length} raw records into ${tracks.length} tracks`)

  return {dropped, inputCount: rawRecords.length, tracks}
}

/**
 * Keep the first `limit` tracks (first-seen order)
 */
export function dedupeLimit(tracks: readonly Track[], limit: number): Track[] {
  const seen = new Set<string>()
  const result: Track[] = []
  for (const track of tracks) {
    if (result.length >= limit) break
    if (seen.has(track.id)) continue
    seen.add(track.id)
    result.push(track)
  }
  return result
}

// ===== Helpers =====

function createTrack(id: string, record: RawTrackRecord): Track {
  const track: Track = {
    acoustic: {},
    album: null,
    artists: [],
    durationMs: null,
    externalUrl: null,
    id,
    name: '',
    popularity: null,
    previewUrl: null,
    sources: [],
  }
  mergeInto(track, record)
  return track
}

/**
 * Later-record-wins for present fields. Null counts as absent.
 */
function mergeInto(track: Track, record: RawTrackRecord): void {
  if (record.name !== undefined) track.name = record.name
  if (record.artists !== undefined && record.artists.length > 0) track.artists = [...record.artists]
  if (record.album != null) track.album = record.album
  if (record.durationMs != null) track.durationMs = record.durationMs
  if (record.popularity != null) track.popularity = record.popularity
  if (record.previewUrl != null) track.previewUrl = record.previewUrl
  if (record.externalUrl != null) track.externalUrl = record.externalUrl

  if (record.audioFeatures) {
    track.acoustic = {...track.acoustic, ...presentAttributes(record.audioFeatures)}
  }

  if (!track.sources.includes(record.source)) {
    track.sources.push(record.source)
  }
}

function presentAttributes(features: NonNullable<RawTrackRecord['audioFeatures']>): AcousticAttributes {
  const present: AcousticAttributes = {}
  for (const feature of ACOUSTIC_FEATURES) {
    const value = features[feature]
    if (typeof value === 'number' && Number.isFinite(value)) {
      present[feature] = value
    }
  }
  return present
}
