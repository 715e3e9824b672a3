/**
 * PartyPipeline Tests
 * End-to-end runs over in-process collaborators, up-front validation and
 * partial reports on failure
 */

import type { RawTrackRecord } from '@partyset/shared-types'

import { describe, expect, it, vi } from 'vitest'

import { AnthropicScoringService } from '../../lib/ai-service'
import type { CuratorConfig } from '../../lib/config'
import { PipelineError } from '../../lib/errors'
import { LastFmService } from '../../services/LastFmService'
import type { EnrichmentSource } from '../../services/MetadataEnricher'
import {
  type CatalogSource,
  collectListeningHistory,
  createCuratorFromConfig,
  type PipelineDeps,
  runPipeline,
} from '../../services/PartyPipeline'
import { SpotifyCatalogService } from '../../services/SpotifyCatalogService'
import { type LogEvent, ServiceLogger } from '../../utils/ServiceLogger'
import {
  capturePipelineError,
  createSleepRecorder,
  FakeScoringService,
  RawRecordBuilder,
  scoreByTable,
} from '../fixtures/test-builders'

// ===== Test Helpers =====

function danceRecord(id: string, energy: number): RawTrackRecord {
  return new RawRecordBuilder(id)
    .withName(`Dance ${id}`)
    .withAudioFeatures({acousticness: 0.05, danceability: 0.9, energy, tempo: 128, valence: 0.8})
    .build()
}

function balladRecord(id: string, energy: number): RawTrackRecord {
  return new RawRecordBuilder(id)
    .withName(`Ballad ${id}`)
    .withAudioFeatures({acousticness: 0.9, danceability: 0.2, energy, tempo: 70, valence: 0.2})
    .asSaved()
    .build()
}

const CORPUS = [
  danceRecord('d1', 0.92),
  balladRecord('b1', 0.15),
  danceRecord('d2', 0.88),
  balladRecord('b2', 0.2),
  danceRecord('d3', 0.9),
  balladRecord('b3', 0.1),
]

const SCORES = {b1: 5, b2: 6, b3: 3, d1: 9, d2: 8, d3: 7}

function buildDeps(overrides: Partial<PipelineDeps> = {}) {
  const events: LogEvent[] = []
  const scoringService = new FakeScoringService([scoreByTable(SCORES), scoreByTable(SCORES)])
  const enrichmentSource = {
    enrich: vi.fn<EnrichmentSource['enrich']>(async query =>
      query.name.startsWith('Dance') ? {listenerCount: 5000, tags: ['house', 'dance']} : null,
    ),
  }
  const deps: PipelineDeps = {
    enrichmentSource,
    logger: new ServiceLogger('Test', {sink: {write: event => void events.push(event)}}),
    options: {random: () => 0, requestIntervalMs: 0, seed: 42, sleep: createSleepRecorder().sleep},
    scoringService,
    ...overrides,
  }
  return {deps, enrichmentSource, events, scoringService}
}

// ===== Full Run =====

describe('runPipeline', () => {
  it('curates a playlist from raw records', async () => {
    const {deps} = buildDeps()

    const result = await runPipeline({batchSize: 4, k: 2, minScore: 6, rawRecords: CORPUS}, deps)

    expect(result.selected.map(track => track.id)).toEqual(['d1', 'd2', 'd3', 'b2'])
    expect(result.report.stage).toBe('done')
    expect(result.report.inputCount).toBe(6)
    expect(result.report.normalizedCount).toBe(6)
    expect(result.report.enrichment).toEqual({enriched: 3, failed: 0, notFound: 3, skipped: false})
    expect(result.report.genres).toEqual([
      {count: 3, tag: 'house'},
      {count: 3, tag: 'dance'},
    ])
    expect(result.report.validation).toMatchObject({batches: 2, scoredTracks: 6, unscoredTracks: 0})
    expect(result.report.playlist).toMatchObject({considered: 6, highScoreCount: 3, selected: 4, unscored: 0})
    expect(result.auditLog.map(entry => entry.trackIds)).toEqual([
      ['d1', 'b1', 'd2', 'b2'],
      ['d3', 'b3'],
    ])
  })

  it('groups the two styles into separate clusters and reports them', async () => {
    const {deps} = buildDeps()

    const {clusterReport, report} = await runPipeline({batchSize: 10, k: 2, minScore: 6, rawRecords: CORPUS}, deps)

    const {assignments} = clusterReport
    expect(assignments.get('d1')).toBe(assignments.get('d2'))
    expect(assignments.get('d1')).toBe(assignments.get('d3'))
    expect(assignments.get('b1')).toBe(assignments.get('b2'))
    expect(assignments.get('b1')).toBe(assignments.get('b3'))
    expect(assignments.get('d1')).not.toBe(assignments.get('b1'))
    expect(report.clusters.map(summary => summary.size)).toEqual([3, 3])
  })

  it('tells the scoring service which style group each track belongs to', async () => {
    const {deps, scoringService} = buildDeps()

    const {clusterReport} = await runPipeline({batchSize: 10, k: 2, minScore: 6, rawRecords: CORPUS}, deps)

    const descriptors = new Map(clusterReport.clusters.map((cluster): [number, string] => [cluster.id, cluster.descriptor]))
    const payload = scoringService.requests[0].payload.tracks
    expect(payload.map(track => track.cluster)).toEqual(
      payload.map(track => descriptors.get(clusterReport.assignments.get(track.track_id) ?? -1)),
    )
    expect(payload[0].tags).toEqual(['house', 'dance'])
    expect(payload[0].listener_count).toBe(5000)
  })

  it('skips enrichment when turned off for the run', async () => {
    const {deps, enrichmentSource} = buildDeps()

    const result = await runPipeline({batchSize: 10, enrich: false, k: 2, minScore: 6, rawRecords: CORPUS}, deps)

    expect(result.report.enrichment).toEqual({enriched: 0, failed: 0, notFound: 0, skipped: true})
    expect(result.report.genres).toEqual([])
    expect(enrichmentSource.enrich).not.toHaveBeenCalled()
  })

  it('logs completion through the run logger', async () => {
    const {deps, events} = buildDeps()

    await runPipeline({batchSize: 10, k: 2, minScore: 6, rawRecords: CORPUS}, deps)

    expect(events.at(-1)).toEqual({
      data: {
        data: {scored: 6, selected: 4, tracks: 6, unscored: 0},
        level: 'info',
        message: '[Test] Pipeline complete',
      },
      type: 'log',
    })
  })

  // ===== Up-front Validation =====

  it('rejects k above the corpus size before any side effects', async () => {
    const {deps, enrichmentSource, scoringService} = buildDeps()
    const rawRecords = Array.from({length: 10}, (_, i) => danceRecord(`t${i}`, 0.5))

    const error = await capturePipelineError(runPipeline({batchSize: 5, k: 12, minScore: 6, rawRecords}, deps))

    expect(error.kind).toBe('configuration')
    expect(error.message).toBe('Cluster count must be an integer between 1 and 10, got 12')
    expect(error.report?.stage).toBe('normalize')
    expect(error.report?.normalizedCount).toBe(10)
    expect(error.report?.enrichment).toBeNull()
    expect(enrichmentSource.enrich).not.toHaveBeenCalled()
    expect(scoringService.requests).toEqual([])
  })

  it('rejects an empty corpus', async () => {
    const {deps} = buildDeps()

    const error = await capturePipelineError(
      runPipeline({batchSize: 5, k: 1, minScore: 6, rawRecords: [{source: 'top'}, 'junk']}, deps),
    )

    expect(error.kind).toBe('configuration')
    expect(error.message).toBe('No usable tracks after normalization (empty corpus)')
    expect(error.report?.dropped).toEqual({malformed: 1, missingIdentity: 1})
  })

  it.each([
    [{batchSize: 0, minScore: 6}, 'Batch size must be a positive integer, got 0'],
    [{batchSize: 5, minScore: 11}, 'Minimum score must be between 1 and 10, got 11'],
  ])('rejects invalid settings %o', async (settings, message) => {
    const {deps} = buildDeps()

    const error = await capturePipelineError(runPipeline({...settings, k: 2, rawRecords: CORPUS}, deps))

    expect(error.kind).toBe('configuration')
    expect(error.message).toBe(message)
    expect(error.report?.inputCount).toBe(0)
  })

  // ===== Failures =====

  it('attaches the partial report when scoring fails permanently', async () => {
    const {deps} = buildDeps({
      scoringService: new FakeScoringService([new PipelineError('Scoring service error 401: bad key', 'permanent')]),
    })

    const error = await capturePipelineError(runPipeline({batchSize: 10, k: 2, minScore: 6, rawRecords: CORPUS}, deps))

    expect(error.kind).toBe('permanent')
    expect(error.report?.stage).toBe('validate')
    expect(error.report?.clusters).toHaveLength(2)
    expect(error.report?.validation).toEqual({
      batches: 1,
      failedBatches: 1,
      parseFailedTracks: 0,
      scoredBatches: 0,
      scoredTracks: 0,
      unscoredTracks: 6,
    })
    expect(error.report?.auditLog.map(entry => entry.state)).toEqual(['FAILED'])
    expect(error.report?.playlist).toBeNull()
  })

  it('keeps the batches scored before a permanent failure in the partial report', async () => {
    const {deps} = buildDeps({
      scoringService: new FakeScoringService([
        scoreByTable(SCORES),
        new PipelineError('Scoring service error 401: bad key', 'permanent'),
      ]),
    })

    const error = await capturePipelineError(runPipeline({batchSize: 3, k: 2, minScore: 6, rawRecords: CORPUS}, deps))

    expect(error.report?.validation).toEqual({
      batches: 2,
      failedBatches: 1,
      parseFailedTracks: 0,
      scoredBatches: 1,
      scoredTracks: 3,
      unscoredTracks: 3,
    })
    expect(error.report?.auditLog.map(entry => [entry.batchSequence, entry.state, entry.trackIds])).toEqual([
      [1, 'SCORED', ['d1', 'b1', 'd2']],
      [2, 'FAILED', ['b2', 'd3', 'b3']],
    ])
    expect(error.report?.auditLog[1].attempts[0].error).toBe('Scoring service error 401: bad key')
  })

  it('finishes with unscored tracks when a batch keeps failing', async () => {
    const {deps} = buildDeps({
      scoringService: new FakeScoringService(['nope', 'nope', 'nope', scoreByTable(SCORES)]),
    })

    const result = await runPipeline({batchSize: 4, k: 2, minScore: 6, rawRecords: CORPUS}, deps)

    expect(result.report.validation).toMatchObject({failedBatches: 1, scoredTracks: 2, unscoredTracks: 4})
    expect(result.selected.map(track => track.id)).toEqual(['d3'])
    expect(result.report.playlist?.unscored).toBe(4)
  })
})

// ===== Collaborator Helpers =====

describe('collectListeningHistory', () => {
  function buildCatalog() {
    return {
      fetchSavedTracks: vi.fn<CatalogSource['fetchSavedTracks']>(async () => [balladRecord('b1', 0.1)]),
      fetchTopTracks: vi.fn<CatalogSource['fetchTopTracks']>(async () => [danceRecord('d1', 0.9)]),
    }
  }

  it('splits the limit between top and saved tracks', async () => {
    const catalog = buildCatalog()

    const records = await collectListeningHistory(catalog, 30)

    expect(catalog.fetchTopTracks).toHaveBeenCalledWith(15)
    expect(catalog.fetchSavedTracks).toHaveBeenCalledWith(15)
    expect(records.map(record => record.id)).toEqual(['d1', 'b1'])
  })

  it('caps each source at 50', async () => {
    const catalog = buildCatalog()

    await collectListeningHistory(catalog, 500)

    expect(catalog.fetchTopTracks).toHaveBeenCalledWith(50)
    expect(catalog.fetchSavedTracks).toHaveBeenCalledWith(50)
  })
})

describe('createCuratorFromConfig', () => {
  const config: CuratorConfig = {
    aiTimeoutMs: 30_000,
    anthropicApiKey: 'test-secret',
    anthropicModel: 'test-model',
    batchSize: 8,
    clusters: 3,
    debug: false,
    lastfmApiKey: 'test-lastfm-key',
    maxAttempts: 4,
    minScore: 7,
    pcaComponents: 3,
    requestIntervalMs: 500,
    seed: 7,
    skipEnrichment: false,
    spotifyAccessToken: 'test-token',
  }

  it('wires collaborators from configuration', () => {
    const curator = createCuratorFromConfig(config)

    expect(curator.deps.scoringService).toBeInstanceOf(AnthropicScoringService)
    expect(curator.deps.enrichmentSource).toBeInstanceOf(LastFmService)
    expect(curator.catalog).toBeInstanceOf(SpotifyCatalogService)
    expect(curator.deps.options).toMatchObject({pcaComponents: 3, requestIntervalMs: 500, seed: 7})
    expect(curator.deps.options?.retryPolicy?.maxAttempts).toBe(4)
  })

  it('leaves out optional collaborators that are not configured', () => {
    const curator = createCuratorFromConfig({
      ...config,
      lastfmApiKey: undefined,
      spotifyAccessToken: undefined,
    })

    expect(curator.deps.enrichmentSource).toBeNull()
    expect(curator.catalog).toBeNull()
  })

  it('drops enrichment when it is switched off', () => {
    const curator = createCuratorFromConfig({...config, skipEnrichment: true})

    expect(curator.deps.enrichmentSource).toBeNull()
  })
})
