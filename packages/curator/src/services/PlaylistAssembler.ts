/**
 * PlaylistAssembler - final selection and run statistics
 *
 * Read-only over tracks. A track is selected iff it has an aiScore and
 * aiScore >= minScore; unscored tracks are never defaulted either way.
 * Selection is ordered by descending score, ties in first-seen order.
 */

import type {AcousticAttributes, AIRecommendation, Track} from '@partyset/shared-types'

import {HIGH_SCORE_THRESHOLD, SCORE_RANGE} from '../constants'
import {configurationError, PipelineError} from '../lib/errors'
import {getLogger} from '../utils/LoggerContext'
import {averageAcoustic} from './FeatureExtractor'

// ===== Types =====

export interface PlaylistStats {
  /** Mean raw acoustic attributes of the selection, over tracks that carry each one */
  avgFeatures: AcousticAttributes
  considered: number
  /** Scored tracks (selected or not) at or above the high-score threshold */
  highScoreCount: number
  meanScore: null | number
  /** Selected tracks per cluster id; "unclustered" when a track has none */
  perCluster: Record<string, number>
  recommendations: Record<AIRecommendation, number>
  /** Selected tracks per integer score bucket 1-10 */
  scoreDistribution: Record<number, number>
  selected: number
  totalDurationMin: number
  unscored: number
}

export interface AssembledPlaylist {
  selected: Track[]
  stats: PlaylistStats
}

export interface PlaylistReference {
  id: string
  url: string
}

/**
 * Where a finished selection can be saved; called by the pipeline's caller, never by the pipeline
 */
export interface PlaylistSink {
  createPlaylist(name: string, description: string, trackIds: readonly string[]): Promise<PlaylistReference>
}

export interface PlaylistDetails {
  description: string
  name: string
}

// ===== Assembly =====

export function validateMinScore(minScore: number): void {
  if (!Number.isFinite(minScore) || minScore < SCORE_RANGE.MIN || minScore > SCORE_RANGE.MAX) {
    throw configurationError(`Minimum score must be between ${SCORE_RANGE.MIN} and ${SCORE_RANGE.MAX}, got ${minScore}`, {
      minScore,
    })
  }
}

export function assemblePlaylist(tracks: readonly Track[], minScore: number): AssembledPlaylist {
  validateMinScore(minScore)

  const selected = tracks
    .map((track, index) => ({index, track}))
    .filter(({track}) => track.aiScore !== undefined && track.aiScore >= minScore)
    .sort((a, b) => (b.track.aiScore ?? 0) - (a.track.aiScore ?? 0) || a.index - b.index)
    .map(({track}) => track)

  return {selected, stats: computeStats(tracks, selected)}
}

function computeStats(tracks: readonly Track[], selected: readonly Track[]): PlaylistStats {
  const scored = tracks.filter(track => track.aiScore !== undefined)

  const perCluster: Record<string, number> = {}
  const scoreDistribution: Record<number, number> = {}
  for (let bucket: number = SCORE_RANGE.MIN; bucket <= SCORE_RANGE.MAX; bucket++) {
    scoreDistribution[bucket] = 0
  }

  let scoreSum = 0
  let durationMs = 0
  for (const track of selected) {
    const score = track.aiScore ?? 0
    const key = track.clusterId === undefined ? 'unclustered' : String(track.clusterId)
    perCluster[key] = (perCluster[key] ?? 0) + 1
    scoreDistribution[Math.floor(score)]++
    scoreSum += score
    durationMs += track.durationMs ?? 0
  }

  const recommendations: Record<AIRecommendation, number> = {maybe: 0, no: 0, yes: 0}
  for (const track of scored) {
    if (track.aiRecommendation) recommendations[track.aiRecommendation]++
  }

  return {
    avgFeatures: averageAcoustic(selected),
    considered: tracks.length,
    highScoreCount: scored.filter(track => (track.aiScore ?? 0) >= HIGH_SCORE_THRESHOLD).length,
    meanScore: selected.length > 0 ? scoreSum / selected.length : null,
    perCluster,
    recommendations,
    scoreDistribution,
    selected: selected.length,
    totalDurationMin: Math.round((durationMs / 60_000) * 10) / 10,
    unscored: tracks.length - scored.length,
  }
}

// ===== Publishing =====

export function buildPlaylistDetails(
  selected: readonly Track[],
  stats: PlaylistStats,
  now: Date = new Date(),
): PlaylistDetails {
  const date = formatDate(now)
  const validated = stats.considered - stats.unscored
  return {
    description: `AI-curated party playlist: ${selected.length} tracks picked from ${validated} validated tracks on ${date}.`,
    name: `Party Playlist (${date} ${pad(now.getHours())}:${pad(now.getMinutes())})`,
  }
}

export async function publishPlaylist(
  sink: PlaylistSink,
  selected: readonly Track[],
  stats: PlaylistStats,
  options: Partial<PlaylistDetails> & {now?: Date} = {},
): Promise<PlaylistReference> {
  if (selected.length === 0) {
    throw new PipelineError('Cannot publish an empty playlist', 'input')
  }

  const defaults = buildPlaylistDetails(selected, stats, options.now)
  const reference = await sink.createPlaylist(
    options.name ?? defaults.name,
    options.description ?? defaults.description,
    selected.map(track => track.id),
  )
  getLogger()?.info('Playlist published', {id: reference.id, tracks: selected.length, url: reference.url})
  return reference
}

/** Local calendar date as YYYY-MM-DD */
function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}
