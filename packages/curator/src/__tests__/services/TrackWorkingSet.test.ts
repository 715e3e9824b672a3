/**
 * TrackWorkingSet Tests
 * Stage-scoped writes over the shared track collection
 */

import { describe, expect, it } from 'vitest'

import { TrackWorkingSet } from '../../services/TrackWorkingSet'
import { buildTrack } from '../fixtures/test-builders'

const judgement = {reasoning: 'Great chorus', recommendation: 'yes', score: 8} as const

describe('TrackWorkingSet', () => {
  it('shares track objects by reference in first-seen order', () => {
    const a = buildTrack('a')
    const b = buildTrack('b')
    const workingSet = new TrackWorkingSet([a, b])

    expect(workingSet.all()).toEqual([a, b])
    expect(workingSet.get('b')).toBe(b)
    expect(workingSet.get('zzz')).toBeUndefined()
    expect(workingSet.size).toBe(2)
  })

  it('rejects duplicate ids', () => {
    expect(() => new TrackWorkingSet([buildTrack('a'), buildTrack('a')])).toThrow(
      'Duplicate track id in working set: a',
    )
  })

  it('rejects writes outside the owning stage', () => {
    const workingSet = new TrackWorkingSet([buildTrack('a')])

    expect(() => workingSet.setFeatureVector('a', [1])).toThrow(
      'Stage "extract" must be active to write this field (active: none)',
    )
    workingSet.runStage('cluster', () => {
      expect(() => workingSet.recordJudgement('a', judgement)).toThrow(
        'Stage "validate" must be active to write this field (active: cluster)',
      )
    })
  })

  it('clears the active stage even when the stage throws', () => {
    const workingSet = new TrackWorkingSet([buildTrack('a')])

    expect(() =>
      workingSet.runStage('extract', () => {
        throw new Error('boom')
      }),
    ).toThrow('boom')
    expect(workingSet.stage).toBeNull()
  })

  it('runs one stage at a time', async () => {
    const workingSet = new TrackWorkingSet([buildTrack('a')])

    await workingSet.runStageAsync('enrich', async () => {
      expect(workingSet.stage).toBe('enrich')
      expect(() => workingSet.runStage('extract', () => undefined)).toThrow(
        'Cannot start stage "extract" while "enrich" is running',
      )
    })
    expect(workingSet.stage).toBeNull()
  })

  it('assigns a cluster only once', () => {
    const workingSet = new TrackWorkingSet([buildTrack('a')])

    workingSet.runStage('cluster', () => {
      workingSet.assignCluster('a', 2)
      expect(() => workingSet.assignCluster('a', 3)).toThrow('Track a already has a cluster assignment')
    })
    expect(workingSet.get('a')?.clusterId).toBe(2)
  })

  it('records a judgement only once', async () => {
    const workingSet = new TrackWorkingSet([buildTrack('a')])

    await workingSet.runStageAsync('validate', async () => {
      workingSet.recordJudgement('a', judgement)
      expect(() => workingSet.recordJudgement('a', {...judgement, score: 2})).toThrow('Track a has already been scored')
    })

    expect(workingSet.get('a')).toMatchObject({aiReasoning: 'Great chorus', aiRecommendation: 'yes', aiScore: 8})
  })

  it('de-duplicates enrichment tags', async () => {
    const workingSet = new TrackWorkingSet([buildTrack('a')])

    await workingSet.runStageAsync('enrich', async () => {
      workingSet.setEnrichment('a', {listenerCount: 1200, tags: ['house', 'dance', 'house']})
    })

    expect(workingSet.get('a')).toMatchObject({listenerCount: 1200, tags: ['house', 'dance']})
    expect(workingSet.get('a')?.playCount).toBeUndefined()
  })

  it('records artist listeners and de-duplicated artist tags', async () => {
    const workingSet = new TrackWorkingSet([buildTrack('a')])

    await workingSet.runStageAsync('enrich', async () => {
      workingSet.setEnrichment('a', {artistListeners: 48000, artistTags: ['synthwave', 'synthwave', 'electronic']})
    })

    expect(workingSet.get('a')).toMatchObject({artistListeners: 48000, artistTags: ['synthwave', 'electronic']})
  })

  it('rejects unknown ids', () => {
    const workingSet = new TrackWorkingSet([buildTrack('a')])

    workingSet.runStage('extract', () => {
      expect(() => workingSet.setFeatureVector('nope', [0])).toThrow('Unknown track id: nope')
    })
  })
})
