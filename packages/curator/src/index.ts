// ===== Pipeline =====

export {
  type CatalogSource,
  type ClusterReport,
  collectListeningHistory,
  createCuratorFromConfig,
  type Curator,
  type PipelineDeps,
  type PipelineInput,
  type PipelineOptions,
  type PipelineResult,
  runPipeline,
} from './services/PartyPipeline'

// ===== Stages =====

export {normalize, dedupeLimit, type DroppedCounts, type NormalizationResult} from './services/MetadataNormalizer'
export {
  enrichTracks,
  type EnrichmentCounts,
  type EnrichmentData,
  type EnrichmentQuery,
  type EnrichmentSource,
  type GenreCount,
  summarizeGenres,
} from './services/MetadataEnricher'
export {computeFeatureStats, extractFeatures, type FeatureExtractionResult, type FeatureStats} from './services/FeatureExtractor'
export {
  type ClusterDescriptor,
  type ClusteringResult,
  type ClusterOptions,
  type ClusterSummary,
  clusterTracks,
  describeCentroid,
  summarizeClusters,
  validateClusterCount,
} from './services/StyleClusterer'
export {
  AIValidator,
  type AIValidatorOptions,
  type AuditAttempt,
  type AuditEntry,
  AuditLog,
  type BatchState,
  type ValidationSummary,
} from './services/AIValidator'
export {
  type AssembledPlaylist,
  assemblePlaylist,
  buildPlaylistDetails,
  type PlaylistReference,
  type PlaylistSink,
  type PlaylistStats,
  publishPlaylist,
} from './services/PlaylistAssembler'
export {type AIJudgement, type PipelineStage, TrackWorkingSet} from './services/TrackWorkingSet'

// ===== Collaborators =====

export {LastFmService, type LastFmServiceOptions} from './services/LastFmService'
export {SpotifyCatalogService, type SpotifyCatalogOptions} from './services/SpotifyCatalogService'
export {AnthropicScoringService, type AnthropicScoringConfig, mapAnthropicError, type ScoringService} from './lib/ai-service'
export {buildScoringRequest, type ScoringRequest, type ScoringTrackPayload} from './lib/ai-prompts'
export {parseScoringResponse, type ScoringParseResult, type TrackParseOutcome} from './lib/score-parser'

// ===== Ambient =====

export {type CuratorConfig, loadConfig} from './lib/config'
export {isPermanent, isTransient, PipelineError, type PipelineErrorKind, toPipelineError} from './lib/errors'
export {type PipelineReport} from './lib/report'
export {computeBackoffDelay, DEFAULT_RETRY_POLICY, resolveRetryPolicy, type RetryPolicy, withRetry} from './lib/retry-policy'
export {getChildLogger, getLogger, runWithLogger} from './utils/LoggerContext'
export {RequestPacer} from './utils/RequestPacer'
export {type LogEvent, type LogSink, ServiceLogger} from './utils/ServiceLogger'
