/**
 * Pipeline error taxonomy
 *
 * input          one record is unusable; counted and dropped, never fatal
 * configuration  bad caller settings; raised before any network call
 * transient      a collaborator may succeed on retry (rate limit, timeout, 5xx)
 * permanent      retrying cannot help (bad credentials, rejected request)
 * partial        some tracks could not be judged; counted, never fatal
 */

import type {PipelineReport} from './report'

export type PipelineErrorKind = 'configuration' | 'input' | 'partial' | 'permanent' | 'transient'

export type PipelineErrorContext = Record<string, unknown>

export class PipelineError extends Error {
  readonly context?: PipelineErrorContext

  /** Partial run report, attached by the orchestrator when a stage fails */
  report?: PipelineReport

  constructor(
    message: string,
    public readonly kind: PipelineErrorKind,
    options: {cause?: unknown; context?: PipelineErrorContext} = {},
  ) {
    super(message, {cause: options.cause})
    this.name = 'PipelineError'
    this.context = options.context
  }
}

export function configurationError(message: string, context?: PipelineErrorContext): PipelineError {
  return new PipelineError(message, 'configuration', {context})
}

export function isPermanent(error: unknown): boolean {
  return error instanceof PipelineError && error.kind === 'permanent'
}

export function isTransient(error: unknown): boolean {
  return error instanceof PipelineError && error.kind === 'transient'
}

/**
 * Wrap anything thrown by a collaborator.
 * Errors of unknown origin are treated as transient so the retry ceiling still bounds them.
 */
export function toPipelineError(error: unknown, fallbackKind: PipelineErrorKind = 'transient'): PipelineError {
  if (error instanceof PipelineError) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new PipelineError(message, fallbackKind, {cause: error})
}
