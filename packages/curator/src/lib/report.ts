/**
 * Run report: what happened to every track, stage by stage.
 * Built up as the pipeline runs and attached to a failure, so a run always reports.
 */

import type {AuditEntry, ValidationSummary} from '../services/AIValidator'
import type {EnrichmentCounts, GenreCount} from '../services/MetadataEnricher'
import type {DroppedCounts} from '../services/MetadataNormalizer'
import type {PlaylistStats} from '../services/PlaylistAssembler'
import type {ClusterSummary} from '../services/StyleClusterer'

export interface PipelineReport {
  /** Scoring audit entries, including those of a batch that aborted the run */
  auditLog: readonly AuditEntry[]
  clusters: ClusterSummary[]
  dropped: DroppedCounts
  /** Null until the enrichment stage has run */
  enrichment: EnrichmentCounts | null
  genres: GenreCount[]
  inputCount: number
  normalizedCount: number
  playlist: null | PlaylistStats
  /** Last stage that started */
  stage: 'assemble' | 'cluster' | 'done' | 'enrich' | 'extract' | 'normalize' | 'validate'
  validation: null | ValidationSummary
}

export function createReport(): PipelineReport {
  return {
    auditLog: [],
    clusters: [],
    dropped: {malformed: 0, missingIdentity: 0},
    enrichment: null,
    genres: [],
    inputCount: 0,
    normalizedCount: 0,
    playlist: null,
    stage: 'normalize',
    validation: null,
  }
}
