/**
 * AI Service - Claude/Anthropic integration for party scoring
 *
 * The pipeline only sees the ScoringService contract (request in, text out).
 * SDK failures are mapped onto the pipeline error taxonomy here so the
 * validator can tell a retryable hiccup from a dead credential.
 */

import Anthropic from '@anthropic-ai/sdk'

import {SCORING_DEFAULTS} from '../constants'
import {getLogger} from '../utils/LoggerContext'
import type {ScoringRequest} from './ai-prompts'
import {PipelineError} from './errors'

// =============================================================================
// TYPES
// =============================================================================

/**
 * External scoring service: takes one batch request, returns the raw response text
 */
export interface ScoringService {
  score(request: ScoringRequest): Promise<string>
}

/** The slice of the Anthropic client this service calls */
export interface MessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming,
      options?: {timeout?: number},
    ): PromiseLike<{content: readonly {text?: string; type: string}[]}>
  }
}

export interface AnthropicScoringConfig {
  apiKey: string
  /** Injected client, mainly for tests */
  client?: MessagesClient
  maxTokens?: number
  model?: string
  temperature?: number
  timeoutMs?: number
}

// =============================================================================
// ANTHROPIC SCORING SERVICE
// =============================================================================

export class AnthropicScoringService implements ScoringService {
  private client: MessagesClient
  private maxTokens: number
  private model: string
  private temperature: number
  private timeoutMs: number

  constructor(config: AnthropicScoringConfig) {
    this.timeoutMs = config.timeoutMs ?? SCORING_DEFAULTS.TIMEOUT_MS
    // Retries are owned by the validator's policy, not the SDK
    this.client = config.client ?? new Anthropic({apiKey: config.apiKey, maxRetries: 0, timeout: this.timeoutMs})
    this.model = config.model ?? SCORING_DEFAULTS.MODEL
    this.maxTokens = config.maxTokens ?? SCORING_DEFAULTS.MAX_TOKENS
    this.temperature = config.temperature ?? SCORING_DEFAULTS.TEMPERATURE
  }

  async score(request: ScoringRequest): Promise<string> {
    try {
      const response = await this.client.messages.create(
        {
          max_tokens: this.maxTokens,
          messages: [{content: request.user, role: 'user'}],
          model: this.model,
          system: request.system,
          temperature: this.temperature,
        },
        {timeout: this.timeoutMs},
      )

      return response.content
        .map(block => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
        .join('')
    } catch (error) {
      const mapped = mapAnthropicError(error)
      getLogger()?.error('[AnthropicScoringService] API call failed', error, {kind: mapped.kind})
      throw mapped
    }
  }
}

/**
 * SDK error to pipeline error kind:
 * connection problems, timeouts, 408/409/429 and 5xx are transient; other API errors are permanent
 */
export function mapAnthropicError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error

  if (error instanceof Anthropic.APIConnectionError) {
    return new PipelineError(`Scoring service unreachable: ${error.message}`, 'transient', {cause: error})
  }

  if (error instanceof Anthropic.APIError) {
    const status = error.status
    const transient = status === undefined || status === 408 || status === 409 || status === 429 || status >= 500
    return new PipelineError(`Scoring service error ${status ?? 'unknown'}: ${error.message}`, transient ? 'transient' : 'permanent', {
      cause: error,
      context: {status},
    })
  }

  const message = error instanceof Error ? error.message : String(error)
  return new PipelineError(`Scoring request failed: ${message}`, 'transient', {cause: error})
}
