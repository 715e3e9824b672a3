/**
 * AIValidator - party scoring in batches, with retries and a full audit trail
 *
 * Batches are contiguous slices of the working set (first-seen order) sent one
 * at a time through a shared pacer. Per batch:
 *
 *   PENDING -> SENT -> SCORED
 *                   -> FAILED -> SENT (transient error or no JSON array; backoff, retry)
 *                   -> FAILED (terminal once the attempt ceiling is reached)
 *
 * A terminal FAILED batch leaves its tracks unscored and the run moves on.
 * A permanent error (bad credentials, rejected request) aborts the run.
 * Every attempt's request and response are kept in the audit log.
 */

import type {Track} from '@partyset/shared-types'

import {buildScoringRequest, type ScoringRequest} from '../lib/ai-prompts'
import type {ScoringService} from '../lib/ai-service'
import {configurationError, isTransient, toPipelineError} from '../lib/errors'
import {computeBackoffDelay, DEFAULT_RETRY_POLICY, type RetryPolicy} from '../lib/retry-policy'
import {parseScoringResponse} from '../lib/score-parser'
import type {RandomSource} from '../lib/seeded-random'
import {getLogger} from '../utils/LoggerContext'
import {RequestPacer, sleep as defaultSleep, type Sleep} from '../utils/RequestPacer'
import type {TrackWorkingSet} from './TrackWorkingSet'

// ===== Types =====

export type BatchState = 'FAILED' | 'PENDING' | 'SCORED' | 'SENT'

export interface AuditAttempt {
  attempt: number
  /** Error message when the request itself failed */
  error?: string
  finishedAt: string
  outcome: 'error' | 'no-array' | 'parsed'
  request: ScoringRequest
  /** Full response text, null when no response arrived */
  response: null | string
  startedAt: string
}

export interface AuditEntry {
  attempts: AuditAttempt[]
  batchSequence: number
  /** Per-track parse errors of the final parsed response */
  parseErrors: Record<string, string>
  state: BatchState
  trackIds: string[]
}

export interface ValidationSummary {
  batches: number
  failedBatches: number
  parseFailedTracks: number
  scoredBatches: number
  scoredTracks: number
  unscoredTracks: number
}

export interface AIValidatorOptions {
  clock?: () => Date
  pacer?: RequestPacer
  random?: RandomSource
  retryPolicy?: RetryPolicy
  sleep?: Sleep
}

// ===== Audit Log =====

export class AuditLog {
  private readonly entries: AuditEntry[] = []

  get size(): number {
    return this.entries.length
  }

  all(): readonly AuditEntry[] {
    return this.entries
  }

  append(entry: AuditEntry): void {
    this.entries.push(entry)
    getLogger()?.audit(entry)
  }

  get(batchSequence: number): AuditEntry | undefined {
    return this.entries.find(entry => entry.batchSequence === batchSequence)
  }
}

// ===== Validator =====

export class AIValidator {
  readonly auditLog = new AuditLog()
  /** Running counts of the current or last validate() call, kept when a batch aborts the run */
  summary: null | ValidationSummary = null

  private readonly clock: () => Date
  private readonly pacer: RequestPacer
  private readonly policy: RetryPolicy
  private readonly random: RandomSource
  private readonly scoringService: ScoringService
  private readonly sleep: Sleep

  constructor(scoringService: ScoringService, options: AIValidatorOptions = {}) {
    this.scoringService = scoringService
    this.policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.sleep = options.sleep ?? defaultSleep
    this.pacer = options.pacer ?? new RequestPacer({sleep: this.sleep})
    this.random = options.random ?? Math.random
    this.clock = options.clock ?? (() => new Date())
  }

  /**
   * Score every track in the working set. Mutates aiScore, aiRecommendation and
   * aiReasoning on tracks that get a valid judgement.
   */
  async validate(
    workingSet: TrackWorkingSet,
    batchSize: number,
    clusterDescriptors: ReadonlyMap<number, string> = new Map(),
  ): Promise<ValidationSummary> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw configurationError(`Batch size must be a positive integer, got ${batchSize}`, {batchSize})
    }

    return workingSet.runStageAsync('validate', async () => {
      const tracks = workingSet.all()
      const summary: ValidationSummary = {
        batches: 0,
        failedBatches: 0,
        parseFailedTracks: 0,
        scoredBatches: 0,
        scoredTracks: 0,
        unscoredTracks: tracks.length,
      }
      this.summary = summary

      try {
        for (let start = 0; start < tracks.length; start += batchSize) {
          summary.batches++
          const batch = tracks.slice(start, start + batchSize)
          let entry: AuditEntry
          try {
            entry = await this.processBatch(workingSet, summary.batches, batch, clusterDescriptors)
          } catch (error) {
            summary.failedBatches++
            throw error
          }

          if (entry.state === 'SCORED') {
            summary.scoredBatches++
            summary.parseFailedTracks += Object.keys(entry.parseErrors).length
          } else {
            summary.failedBatches++
          }
        }
      } finally {
        summary.scoredTracks = tracks.filter(track => track.aiScore !== undefined).length
        summary.unscoredTracks = tracks.length - summary.scoredTracks
      }

      getLogger()?.info('AI validation complete', {...summary})
      return summary
    })
  }

  private async processBatch(
    workingSet: TrackWorkingSet,
    batchSequence: number,
    batch: readonly Track[],
    clusterDescriptors: ReadonlyMap<number, string>,
  ): Promise<AuditEntry> {
    const trackIds = batch.map(track => track.id)
    const request = buildScoringRequest(batchSequence, batch, clusterDescriptors)
    const entry: AuditEntry = {attempts: [], batchSequence, parseErrors: {}, state: 'PENDING', trackIds}
    const logger = getLogger()

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      if (attempt > 1) {
        const delayMs = computeBackoffDelay(this.policy, attempt - 1, this.random)
        logger?.warn(`Batch ${batchSequence} failed, retrying`, {attempt, delayMs: Math.round(delayMs)})
        await this.sleep(delayMs)
      }

      await this.pacer.acquire()
      entry.state = 'SENT'
      const startedAt = this.clock().toISOString()

      let text: string
      try {
        text = await this.scoringService.score(request)
      } catch (error) {
        const pipelineError = toPipelineError(error)
        entry.state = 'FAILED'
        entry.attempts.push({
          attempt,
          error: pipelineError.message,
          finishedAt: this.clock().toISOString(),
          outcome: 'error',
          request,
          response: null,
          startedAt,
        })

        if (!isTransient(pipelineError)) {
          this.auditLog.append(entry)
          logger?.error(`Batch ${batchSequence} hit a permanent error; aborting`, pipelineError)
          throw pipelineError
        }
        continue
      }

      const parsed = parseScoringResponse(text, trackIds)
      entry.attempts.push({
        attempt,
        finishedAt: this.clock().toISOString(),
        outcome: parsed.kind,
        request,
        response: text,
        startedAt,
      })

      if (parsed.kind === 'no-array') {
        entry.state = 'FAILED'
        continue
      }

      for (const [id, outcome] of parsed.outcomes) {
        if (outcome.ok) {
          workingSet.recordJudgement(id, outcome.judgement)
        } else {
          entry.parseErrors[id] = outcome.error
        }
      }
      entry.state = 'SCORED'

      const failed = Object.keys(entry.parseErrors).length
      if (failed > 0) {
        logger?.warn(`Batch ${batchSequence}: ${failed} of ${batch.length} tracks could not be parsed`, {
          trackIds: Object.keys(entry.parseErrors),
        })
      }
      break
    }

    if (entry.state !== 'SCORED') {
      logger?.warn(`Batch ${batchSequence} failed after ${this.policy.maxAttempts} attempts; tracks left unscored`, {
        trackIds,
      })
    }

    this.auditLog.append(entry)
    return entry
  }
}
