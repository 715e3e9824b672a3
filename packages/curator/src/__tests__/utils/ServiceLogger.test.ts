/**
 * ServiceLogger Tests
 * Console formatting, sink forwarding and debug gating
 */

import { describe, expect, it, vi } from 'vitest'

import { type LogEvent, ServiceLogger } from '../../utils/ServiceLogger'

function collectingSink() {
  const events: LogEvent[] = []
  return {events, sink: {write: (event: LogEvent) => void events.push(event)}}
}

describe('ServiceLogger', () => {
  it('prefixes console output with the service name', () => {
    const logger = new ServiceLogger('Normalizer')

    logger.info('Normalized records', {kept: 4})
    logger.warn('Dropped record')

    expect(console.log).toHaveBeenCalledWith('[Normalizer] Normalized records', {kept: 4})
    expect(console.warn).toHaveBeenCalledWith('[Normalizer] Dropped record')
  })

  it('forwards log lines and audit entries to the sink', () => {
    const {events, sink} = collectingSink()
    const logger = new ServiceLogger('Validator', {sink})

    logger.info('Batch scored', {batch: 1})
    logger.audit({batchSequence: 1, trackIds: ['a']})

    expect(events).toEqual([
      {data: {data: {batch: 1}, level: 'info', message: '[Validator] Batch scored'}, type: 'log'},
      {data: {batchSequence: 1, trackIds: ['a']}, type: 'audit'},
    ])
  })

  it('leaves out empty data', () => {
    const {events, sink} = collectingSink()

    new ServiceLogger('Clusterer', {sink}).info('Done', {})

    expect(events).toEqual([{data: {level: 'info', message: '[Clusterer] Done'}, type: 'log'}])
    expect(console.log).toHaveBeenCalledWith('[Clusterer] Done')
  })

  it('adds the error message to error data', () => {
    const {events, sink} = collectingSink()
    const logger = new ServiceLogger('Spotify', {sink})

    logger.error('Request failed', 'timeout', {path: '/me/tracks'})

    expect(events[0]).toEqual({
      data: {data: {error: 'timeout', path: '/me/tracks'}, level: 'error', message: '[Spotify] Request failed'},
      type: 'log',
    })
    expect(console.error).toHaveBeenCalledWith('[Spotify] Request failed', {error: 'timeout', path: '/me/tracks'})
  })

  it('includes the stack for Error instances', () => {
    const {events, sink} = collectingSink()
    const failure = new Error('boom')

    new ServiceLogger('Spotify', {sink}).error('Request failed', failure)

    expect(events[0]).toEqual({
      data: {data: {error: 'boom', stack: failure.stack}, level: 'error', message: '[Spotify] Request failed'},
      type: 'log',
    })
  })

  it('only emits debug lines when debug is enabled', () => {
    const {events, sink} = collectingSink()

    new ServiceLogger('Quiet', {sink}).debug('hidden')
    new ServiceLogger('Loud', {debug: true, sink}).debug('shown')

    expect(events).toEqual([{data: {level: 'debug', message: '[Loud] shown'}, type: 'log'}])
  })

  it('names child loggers after their parent and shares the sink', () => {
    const {events, sink} = collectingSink()

    new ServiceLogger('Pipeline', {sink}).child('Validator').info('Started')

    expect(events).toEqual([{data: {level: 'info', message: '[Pipeline:Validator] Started'}, type: 'log'}])
  })

  it('keeps logging when the sink throws or rejects', async () => {
    const thrown = new Error('disk full')
    const throwing = new ServiceLogger('A', {
      sink: {
        write: () => {
          throw thrown
        },
      },
    })
    const rejected = new Error('closed')
    const rejecting = new ServiceLogger('B', {sink: {write: () => Promise.reject(rejected)}})

    throwing.info('one')
    rejecting.info('two')
    await vi.waitFor(() => expect(console.error).toHaveBeenCalledTimes(2))

    expect(console.error).toHaveBeenCalledWith('[ServiceLogger] Failed to write to log sink:', thrown)
    expect(console.error).toHaveBeenCalledWith('[ServiceLogger] Failed to write to log sink:', rejected)
  })
})
