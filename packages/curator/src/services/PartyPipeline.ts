/**
 * PartyPipeline - runs the stages in order over one working set
 *
 * normalize -> (enrich) -> extract -> cluster -> validate -> assemble
 *
 * Every setting is checked before the first network call: batch size, min score,
 * a non-empty corpus and the cluster count. Stages run strictly one after another.
 * A PipelineError leaves with the partial report attached.
 */

import type {RawTrackRecord, Track} from '@partyset/shared-types'

import {HISTORY_PER_SOURCE_MAX} from '../constants'
import {AnthropicScoringService, type ScoringService} from '../lib/ai-service'
import type {CuratorConfig} from '../lib/config'
import {configurationError, PipelineError} from '../lib/errors'
import {createReport, type PipelineReport} from '../lib/report'
import {resolveRetryPolicy, type RetryPolicy} from '../lib/retry-policy'
import type {RandomSource} from '../lib/seeded-random'
import {getLogger, runWithLogger} from '../utils/LoggerContext'
import {RequestPacer, type Sleep} from '../utils/RequestPacer'
import {type LogSink, ServiceLogger} from '../utils/ServiceLogger'
import {AIValidator, type AuditEntry} from './AIValidator'
import {extractFeatures} from './FeatureExtractor'
import {LastFmService} from './LastFmService'
import {type EnrichmentSource, enrichTracks, summarizeGenres} from './MetadataEnricher'
import {normalize} from './MetadataNormalizer'
import {assemblePlaylist, validateMinScore} from './PlaylistAssembler'
import {SpotifyCatalogService} from './SpotifyCatalogService'
import {
  type ClusterDescriptor,
  type ClusterSummary,
  clusterTracks,
  summarizeClusters,
  validateClusterCount,
} from './StyleClusterer'
import {TrackWorkingSet} from './TrackWorkingSet'

// ===== Types =====

/**
 * Music catalog source; transient errors are retried inside the implementation
 */
export interface CatalogSource {
  fetchSavedTracks(limit: number): Promise<RawTrackRecord[]>
  fetchTopTracks(limit: number): Promise<RawTrackRecord[]>
}

export interface PipelineInput {
  batchSize: number
  /** Run-level toggle for metadata enrichment (default on when a source is given) */
  enrich?: boolean
  k: number
  minScore: number
  rawRecords: readonly unknown[]
}

export interface PipelineOptions {
  clock?: () => Date
  maxIterations?: number
  nInit?: number
  /** Monotonic clock for request pacing */
  now?: () => number
  pcaComponents?: number
  random?: RandomSource
  /** Minimum interval between scoring requests */
  requestIntervalMs?: number
  retryPolicy?: RetryPolicy
  seed?: number
  sleep?: Sleep
}

export interface PipelineDeps {
  enrichmentSource?: EnrichmentSource | null
  logger?: ServiceLogger
  options?: PipelineOptions
  scoringService: ScoringService
}

export interface ClusterReport {
  assignments: Map<string, number>
  clusters: ClusterDescriptor[]
  summaries: ClusterSummary[]
}

export interface PipelineResult {
  auditLog: readonly AuditEntry[]
  clusterReport: ClusterReport
  report: PipelineReport
  selected: Track[]
}

// ===== Pipeline =====

export async function runPipeline(input: PipelineInput, deps: PipelineDeps): Promise<PipelineResult> {
  const logger = deps.logger ?? getLogger() ?? new ServiceLogger('PartyPipeline')
  return runWithLogger(logger, () => execute(input, deps))
}

async function execute(input: PipelineInput, deps: PipelineDeps): Promise<PipelineResult> {
  const options = deps.options ?? {}
  const report = createReport()
  const logger = getLogger()
  let validator: AIValidator | null = null

  try {
    if (!Number.isInteger(input.batchSize) || input.batchSize < 1) {
      throw configurationError(`Batch size must be a positive integer, got ${input.batchSize}`, {
        batchSize: input.batchSize,
      })
    }
    validateMinScore(input.minScore)

    const normalized = normalize(input.rawRecords)
    report.inputCount = normalized.inputCount
    report.dropped = normalized.dropped
    report.normalizedCount = normalized.tracks.length

    if (normalized.tracks.length === 0) {
      throw configurationError('No usable tracks after normalization (empty corpus)', {...normalized.dropped})
    }
    validateClusterCount(input.k, normalized.tracks.length)

    const workingSet = new TrackWorkingSet(normalized.tracks)
    const retryPolicy = options.retryPolicy ?? resolveRetryPolicy()

    report.stage = 'enrich'
    report.enrichment = await enrichTracks(workingSet, deps.enrichmentSource, {
      enabled: input.enrich ?? true,
      random: options.random,
      retryPolicy,
      sleep: options.sleep,
    })
    report.genres = summarizeGenres(workingSet.all())

    report.stage = 'extract'
    extractFeatures(workingSet)

    report.stage = 'cluster'
    const clustering = clusterTracks(workingSet, input.k, {
      maxIterations: options.maxIterations,
      nInit: options.nInit,
      pcaComponents: options.pcaComponents,
      seed: options.seed,
    })
    const summaries = summarizeClusters(workingSet.all(), clustering.clusters)
    report.clusters = summaries

    report.stage = 'validate'
    validator = new AIValidator(deps.scoringService, {
      clock: options.clock,
      pacer: new RequestPacer({minIntervalMs: options.requestIntervalMs, now: options.now, sleep: options.sleep}),
      random: options.random,
      retryPolicy,
      sleep: options.sleep,
    })
    const descriptors = new Map(clustering.clusters.map((cluster): [number, string] => [cluster.id, cluster.descriptor]))
    const validation = await validator.validate(workingSet, input.batchSize, descriptors)
    report.validation = validation
    report.auditLog = validator.auditLog.all()

    report.stage = 'assemble'
    const {selected, stats} = assemblePlaylist(workingSet.all(), input.minScore)
    report.playlist = stats
    report.stage = 'done'

    logger?.info('Pipeline complete', {
      scored: validation.scoredTracks,
      selected: stats.selected,
      tracks: report.normalizedCount,
      unscored: validation.unscoredTracks,
    })

    return {
      auditLog: validator.auditLog.all(),
      clusterReport: {assignments: clustering.assignments, clusters: clustering.clusters, summaries},
      report,
      selected,
    }
  } catch (error) {
    if (error instanceof PipelineError) {
      if (validator) {
        report.validation = validator.summary
        report.auditLog = validator.auditLog.all()
      }
      error.report = report
      logger?.error(`Pipeline stopped during ${report.stage} (${error.kind})`, error)
    }
    throw error
  }
}

// ===== Collaborator Helpers =====

/**
 * Top tracks first, then saved tracks; each capped at min(50, limit / 2)
 */
export async function collectListeningHistory(catalog: CatalogSource, limit: number): Promise<RawTrackRecord[]> {
  const perSource = Math.min(HISTORY_PER_SOURCE_MAX, Math.floor(limit / 2))
  const top = await catalog.fetchTopTracks(perSource)
  const saved = await catalog.fetchSavedTracks(perSource)

  getLogger()?.info(`Collected ${top.length} top and ${saved.length} saved tracks`)
  return [...top, ...saved]
}

export interface Curator {
  catalog: null | SpotifyCatalogService
  config: CuratorConfig
  deps: PipelineDeps
  run(rawRecords: readonly unknown[], overrides?: Partial<Omit<PipelineInput, 'rawRecords'>>): Promise<PipelineResult>
}

/**
 * Wire collaborators from configuration: Anthropic scoring, optional Last.fm
 * enrichment and an optional Spotify catalog client
 */
export function createCuratorFromConfig(config: CuratorConfig, sink?: LogSink): Curator {
  const logger = new ServiceLogger('PartyPipeline', {debug: config.debug, sink})

  const deps: PipelineDeps = {
    enrichmentSource: config.lastfmApiKey && !config.skipEnrichment ? new LastFmService(config.lastfmApiKey) : null,
    logger,
    options: {
      pcaComponents: config.pcaComponents,
      requestIntervalMs: config.requestIntervalMs,
      retryPolicy: resolveRetryPolicy({maxAttempts: config.maxAttempts}),
      seed: config.seed,
    },
    scoringService: new AnthropicScoringService({
      apiKey: config.anthropicApiKey,
      model: config.anthropicModel,
      timeoutMs: config.aiTimeoutMs,
    }),
  }

  return {
    catalog: config.spotifyAccessToken ? new SpotifyCatalogService(config.spotifyAccessToken) : null,
    config,
    deps,
    run: (rawRecords, overrides = {}) =>
      runPipeline(
        {
          batchSize: overrides.batchSize ?? config.batchSize,
          enrich: overrides.enrich ?? !config.skipEnrichment,
          k: overrides.k ?? config.clusters,
          minScore: overrides.minScore ?? config.minScore,
          rawRecords,
        },
        deps,
      ),
  }
}
