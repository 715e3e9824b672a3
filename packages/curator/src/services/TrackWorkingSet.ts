/**
 * TrackWorkingSet - the one collection of Tracks a pipeline run works on
 *
 * Every stage gets the same Track objects by reference. Writes go through
 * stage-scoped setters so each stage can only touch the fields it owns:
 *
 * - enrich:   tags, similarTracks, listenerCount, playCount
 * - extract:  featureVector
 * - cluster:  clusterId (once per track)
 * - validate: aiScore, aiRecommendation, aiReasoning (once per track)
 *
 * Only one stage may be active at a time.
 */

import type {AIRecommendation, Track} from '@partyset/shared-types'

export type PipelineStage = 'cluster' | 'enrich' | 'extract' | 'validate'

export interface EnrichmentFields {
  artistListeners?: number
  artistTags?: string[]
  listenerCount?: number
  playCount?: number
  similarTracks?: string[]
  tags?: string[]
}

export interface AIJudgement {
  reasoning: string
  recommendation: AIRecommendation
  score: number
}

export class TrackWorkingSet {
  private activeStage: null | PipelineStage = null
  private readonly byId = new Map<string, Track>()
  private readonly tracks: Track[]

  constructor(tracks: Track[]) {
    for (const track of tracks) {
      if (this.byId.has(track.id)) {
        throw new Error(`Duplicate track id in working set: ${track.id}`)
      }
      this.byId.set(track.id, track)
    }
    this.tracks = tracks
  }

  get size(): number {
    return this.tracks.length
  }

  get stage(): null | PipelineStage {
    return this.activeStage
  }

  /** Tracks in first-seen order */
  all(): readonly Track[] {
    return this.tracks
  }

  assignCluster(id: string, clusterId: number): void {
    const track = this.writable(id, 'cluster')
    if (track.clusterId !== undefined) {
      throw new Error(`Track ${id} already has a cluster assignment`)
    }
    track.clusterId = clusterId
  }

  get(id: string): Track | undefined {
    return this.byId.get(id)
  }

  recordJudgement(id: string, judgement: AIJudgement): void {
    const track = this.writable(id, 'validate')
    if (track.aiScore !== undefined) {
      throw new Error(`Track ${id} has already been scored`)
    }
    track.aiScore = judgement.score
    track.aiRecommendation = judgement.recommendation
    track.aiReasoning = judgement.reasoning
  }

  /**
   * Run a synchronous stage with exclusive write access
   */
  runStage<T>(stage: PipelineStage, fn: () => T): T {
    this.enter(stage)
    try {
      return fn()
    } finally {
      this.activeStage = null
    }
  }

  /**
   * Run an asynchronous stage with exclusive write access
   */
  async runStageAsync<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    this.enter(stage)
    try {
      return await fn()
    } finally {
      this.activeStage = null
    }
  }

  setEnrichment(id: string, fields: EnrichmentFields): void {
    const track = this.writable(id, 'enrich')
    if (fields.tags !== undefined) track.tags = [...new Set(fields.tags)]
    if (fields.similarTracks !== undefined) track.similarTracks = [...fields.similarTracks]
    if (fields.listenerCount !== undefined) track.listenerCount = fields.listenerCount
    if (fields.playCount !== undefined) track.playCount = fields.playCount
    if (fields.artistTags !== undefined) track.artistTags = [...new Set(fields.artistTags)]
    if (fields.artistListeners !== undefined) track.artistListeners = fields.artistListeners
  }

  setFeatureVector(id: string, vector: number[]): void {
    this.writable(id, 'extract').featureVector = vector
  }

  private enter(stage: PipelineStage): void {
    if (this.activeStage !== null) {
      throw new Error(`Cannot start stage "${stage}" while "${this.activeStage}" is running`)
    }
    this.activeStage = stage
  }

  private writable(id: string, stage: PipelineStage): Track {
    if (this.activeStage !== stage) {
      throw new Error(`Stage "${stage}" must be active to write this field (active: ${this.activeStage ?? 'none'})`)
    }
    const track = this.byId.get(id)
    if (!track) {
      throw new Error(`Unknown track id: ${id}`)
    }
    return track
  }
}
