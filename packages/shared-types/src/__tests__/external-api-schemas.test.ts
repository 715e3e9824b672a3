import {describe, expect, it} from 'vitest'

import {
  LastFmErrorSchema,
  LastFmSimilarTrackSchema,
  LastFmTrackInfoResponseSchema,
  LastFmTrackSimilarResponseSchema,
} from '../schemas/external-api-schemas'

describe('Last.fm Schemas', () => {
  it('coerces string counts on track info', () => {
    const result = LastFmTrackInfoResponseSchema.parse({
      track: {
        artist: {name: 'Artist A', url: 'https://www.last.fm/music/Artist+A'},
        listeners: '1200',
        name: 'Song',
        playcount: '45000',
        toptags: {tag: [{name: 'dance'}, {name: 'pop'}]},
        url: '',
      },
    })

    expect(result.track.listeners).toBe(1200)
    expect(result.track.playcount).toBe(45000)
    expect(result.track.url).toBeNull()
    expect(result.track.toptags?.tag.map(t => t.name)).toEqual(['dance', 'pop'])
  })

  it('wraps a single tag object into a list', () => {
    const result = LastFmTrackInfoResponseSchema.parse({
      track: {
        artist: {name: 'Artist A'},
        name: 'Song',
        toptags: {tag: {name: 'house'}},
      },
    })

    expect(result.track.toptags?.tag).toEqual([{name: 'house'}])
  })

  it('treats a missing tag list as empty', () => {
    const result = LastFmTrackInfoResponseSchema.parse({
      track: {artist: {name: 'Artist A'}, name: 'Song', toptags: {}},
    })

    expect(result.track.toptags?.tag).toEqual([])
  })

  it('coerces the similarity match', () => {
    const result = LastFmSimilarTrackSchema.parse({
      artist: {name: 'Artist B'},
      match: '0.85',
      name: 'Other Song',
    })

    expect(result.match).toBe(0.85)
  })

  it('rejects a match above 1', () => {
    expect(LastFmSimilarTrackSchema.safeParse({artist: {name: 'B'}, match: '1.5', name: 'X'}).success).toBe(false)
  })

  it('parses an empty similar list', () => {
    const result = LastFmTrackSimilarResponseSchema.parse({similartracks: {track: []}})
    expect(result.similartracks.track).toEqual([])
  })

  it('parses an error body', () => {
    expect(LastFmErrorSchema.parse({error: 6, message: 'Track not found'})).toEqual({
      error: 6,
      message: 'Track not found',
    })
  })
})
