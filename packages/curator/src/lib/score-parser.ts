/**
 * Score Parser - scoring-service text to per-track judgements
 *
 * Pure: no logging, no I/O. The first JSON array found in the text is read
 * (code fences and surrounding prose are tolerated) and every entry is validated
 * on its own, so one malformed entry only costs its own track.
 */

import {formatZodError, ScoredTrackEntrySchema, ScoredTrackKeySchema} from '@partyset/shared-types'

import type {AIJudgement} from '../services/TrackWorkingSet'

export type TrackParseOutcome = {error: string; ok: false} | {judgement: AIJudgement; ok: true}

export type ScoringParseResult =
  | {error: string; kind: 'no-array'}
  | {kind: 'parsed'; outcomes: Map<string, TrackParseOutcome>; unmatchedEntries: number}

/**
 * Parse a response for the given batch. Entries match by track_id first,
 * then by 1-based track_number. The first valid entry per track wins.
 */
export function parseScoringResponse(text: string, trackIds: readonly string[]): ScoringParseResult {
  const entries = extractJsonArray(text)
  if (entries === null) {
    return {error: 'No JSON array found in response', kind: 'no-array'}
  }

  const known = new Set(trackIds)
  const outcomes = new Map<string, TrackParseOutcome>()
  let unmatchedEntries = 0

  for (const entry of entries) {
    const trackId = resolveTrackId(entry, trackIds, known)
    if (trackId === null) {
      unmatchedEntries++
      continue
    }
    if (outcomes.get(trackId)?.ok) continue

    const parsed = ScoredTrackEntrySchema.safeParse(entry)
    if (parsed.success) {
      outcomes.set(trackId, {
        judgement: {
          reasoning: parsed.data.reasoning,
          recommendation: parsed.data.recommendation,
          score: parsed.data.party_score,
        },
        ok: true,
      })
    } else if (!outcomes.has(trackId)) {
      outcomes.set(trackId, {error: formatZodError(parsed.error), ok: false})
    }
  }

  for (const id of trackIds) {
    if (!outcomes.has(id)) {
      outcomes.set(id, {error: 'No entry for track in response', ok: false})
    }
  }

  return {kind: 'parsed', outcomes, unmatchedEntries}
}

function resolveTrackId(entry: unknown, trackIds: readonly string[], known: ReadonlySet<string>): null | string {
  const keys = ScoredTrackKeySchema.safeParse(entry)
  if (!keys.success) return null

  const {track_id: id, track_number: position} = keys.data
  if (id !== undefined && known.has(id)) return id
  if (position !== undefined && position <= trackIds.length) return trackIds[position - 1]
  return null
}

/**
 * First parsable JSON array in the text whose items look like entries
 * (objects), or an empty array. Returns null when there is none.
 */
export function extractJsonArray(text: string): null | unknown[] {
  for (const candidate of bracketedSpans(text)) {
    let value: unknown
    try {
      value = JSON.parse(candidate)
    } catch {
      continue
    }
    if (Array.isArray(value) && (value.length === 0 || value.some(item => typeof item === 'object' && item !== null))) {
      return value
    }
  }
  return null
}

/**
 * Balanced [...] spans in order of their opening bracket, string-aware
 */
function* bracketedSpans(text: string): Generator<string> {
  for (let start = text.indexOf('['); start !== -1; start = text.indexOf('[', start + 1)) {
    let depth = 0
    let inString = false
    let escaped = false

    for (let i = start; i < text.length; i++) {
      const ch = text[i]
      if (inString) {
        if (escaped) escaped = false
        else if (ch === '\\') escaped = true
        else if (ch === '"') inString = false
        continue
      }
      if (ch === '"') inString = true
      else if (ch === '[') depth++
      else if (ch === ']') {
        depth--
        if (depth === 0) {
          yield text.slice(start, i + 1)
          break
        }
      }
    }
  }
}
