/**
 * AI Service Tests
 * Request shape sent to the Messages API and SDK error classification
 */

import Anthropic from '@anthropic-ai/sdk'
import { describe, expect, it, vi } from 'vitest'

import type { ScoringRequest } from '../../lib/ai-prompts'
import { AnthropicScoringService, mapAnthropicError, type MessagesClient } from '../../lib/ai-service'
import { PipelineError } from '../../lib/errors'
import { capturePipelineError } from '../fixtures/test-builders'

const REQUEST: ScoringRequest = {
  batchSequence: 1,
  payload: {tracks: []},
  system: 'Judge party tracks.',
  user: 'Rate these tracks.',
}

function buildClient(create: MessagesClient['messages']['create']): MessagesClient {
  return {messages: {create}}
}

describe('AnthropicScoringService', () => {
  it('sends one user message with the system prompt and joins text blocks', async () => {
    const create = vi.fn<MessagesClient['messages']['create']>(async () => ({
      content: [
        {text: '[{"track_id":', type: 'text'},
        {type: 'tool_use'},
        {text: '"a"}]', type: 'text'},
      ],
    }))
    const service = new AnthropicScoringService({
      apiKey: 'test-api-key',
      client: buildClient(create),
      maxTokens: 500,
      model: 'test-model',
      temperature: 0,
      timeoutMs: 5000,
    })

    await expect(service.score(REQUEST)).resolves.toBe('[{"track_id":"a"}]')
    expect(create).toHaveBeenCalledWith(
      {
        max_tokens: 500,
        messages: [{content: 'Rate these tracks.', role: 'user'}],
        model: 'test-model',
        system: 'Judge party tracks.',
        temperature: 0,
      },
      {timeout: 5000},
    )
  })

  it('falls back to default model settings', async () => {
    const create = vi.fn<MessagesClient['messages']['create']>(async () => ({content: []}))
    const service = new AnthropicScoringService({apiKey: 'test-api-key', client: buildClient(create)})

    await expect(service.score(REQUEST)).resolves.toBe('')
    expect(create.mock.calls[0][0]).toMatchObject({
      max_tokens: 1000,
      model: 'claude-sonnet-4-5-20250929',
      temperature: 0.1,
    })
    expect(create.mock.calls[0][1]).toEqual({timeout: 60_000})
  })

  it('maps SDK failures onto pipeline errors', async () => {
    const create = vi.fn<MessagesClient['messages']['create']>(async () => {
      throw new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined)
    })
    const service = new AnthropicScoringService({apiKey: 'test-api-key', client: buildClient(create)})

    const error = await capturePipelineError(service.score(REQUEST))

    expect(error.kind).toBe('permanent')
    expect(error.context).toEqual({status: 401})
  })
})

describe('mapAnthropicError', () => {
  it.each([
    [408, 'transient'],
    [409, 'transient'],
    [429, 'transient'],
    [500, 'transient'],
    [529, 'transient'],
    [400, 'permanent'],
    [401, 'permanent'],
    [403, 'permanent'],
    [404, 'permanent'],
  ])('classifies HTTP %i as %s', (status, kind) => {
    const error = mapAnthropicError(new Anthropic.APIError(status, undefined, 'request failed', undefined))

    expect(error.kind).toBe(kind)
    expect(error.message).toBe(`Scoring service error ${status}: ${status} request failed`)
  })

  it('treats connection failures as transient', () => {
    const error = mapAnthropicError(new Anthropic.APIConnectionError({message: 'socket hang up'}))

    expect(error.kind).toBe('transient')
    expect(error.message).toBe('Scoring service unreachable: socket hang up')
  })

  it('passes pipeline errors through unchanged', () => {
    const original = new PipelineError('already mapped', 'permanent')

    expect(mapAnthropicError(original)).toBe(original)
  })

  it('treats anything else as a transient request failure', () => {
    const error = mapAnthropicError(new Error('boom'))

    expect(error.kind).toBe('transient')
    expect(error.message).toBe('Scoring request failed: boom')
    expect(mapAnthropicError('text').message).toBe('Scoring request failed: text')
  })
})
