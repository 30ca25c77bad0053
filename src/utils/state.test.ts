import { describe, it, expect } from 'vitest'
import LZString from 'lz-string'
import { decodeState, encodeState } from './state'

describe('shareable state', () => {
  it('restores an encoded run', () => {
    const state = { s: 2, E: 4, b: 3, policy: 'approx-lru' as const, trace: ' L 10,1\n M 20,4\n' }
    expect(decodeState(encodeState(state))).toEqual(state)
  })

  it('produces URI-safe tokens', () => {
    expect(encodeState({ s: 1, E: 1, b: 1, trace: ' S 0,1' })).toMatch(/^[A-Za-z0-9+\-$]+$/)
  })

  it('returns null for an empty token', () => {
    expect(decodeState('')).toBeNull()
  })

  it('returns null when the payload is not a run', () => {
    const token = LZString.compressToEncodedURIComponent(JSON.stringify({ s: 'x', trace: 1 }))
    expect(decodeState(token)).toBeNull()
  })

  it('returns null when the payload is not JSON', () => {
    expect(decodeState(LZString.compressToEncodedURIComponent('{not json'))).toBeNull()
  })
})
