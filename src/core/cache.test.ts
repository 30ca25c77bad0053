import { describe, it, expect } from 'vitest'
import { createCache, fill, firstFree, lookup, selectVictim, snapshotCache } from './cache'
import { AllocationError } from './errors'

describe('createCache', () => {
  it('builds 2^s sets of E invalid lines', () => {
    const cache = createCache(2, 3, 4)

    expect(cache.geometry).toEqual({ s: 2, b: 3, E: 4, S: 4, B: 8 })
    expect(cache.sets).toHaveLength(4)
    for (const set of cache.sets) {
      expect(set).toHaveLength(4)
      expect(set.every(line => !line.valid && line.tag === 0n && line.recency === 0)).toBe(true)
    }
  })

  it('does not share line objects between sets', () => {
    const cache = createCache(1, 1, 1)
    fill(cache, 0, 0, 3n, 1)
    expect(cache.sets[1][0].valid).toBe(false)
  })

  it('rejects non-positive associativity', () => {
    expect(() => createCache(1, 1, 0)).toThrow(AllocationError)
    expect(() => createCache(1, 1, -2)).toThrow(AllocationError)
  })

  it('rejects negative bit widths', () => {
    expect(() => createCache(-1, 1, 1)).toThrow(AllocationError)
  })

  it('rejects geometries over the line budget', () => {
    expect(() => createCache(24, 1, 2)).toThrow(/exceeds the limit/)
  })
})

describe('set operations', () => {
  it('never matches invalid lines, even on tag 0', () => {
    const cache = createCache(1, 1, 2)
    expect(lookup(cache, 0, 0n)).toBeNull()
  })

  it('finds a filled line by tag', () => {
    const cache = createCache(1, 1, 2)
    fill(cache, 0, 1, 5n, 3)

    expect(lookup(cache, 0, 5n)).toBe(1)
    expect(lookup(cache, 1, 5n)).toBeNull()
    expect(cache.sets[0][1]).toEqual({ valid: true, tag: 5n, recency: 3 })
  })

  it('reports the lowest free line and null once the set is full', () => {
    const cache = createCache(0, 1, 2)
    expect(firstFree(cache, 0)).toBe(0)

    fill(cache, 0, 0, 1n, 0)
    expect(firstFree(cache, 0)).toBe(1)

    fill(cache, 0, 1, 2n, 1)
    expect(firstFree(cache, 0)).toBeNull()
  })

  it('selects the least recent line, breaking ties by index', () => {
    const cache = createCache(0, 1, 4)
    ;[5, 2, 2, 9].forEach((recency, i) => fill(cache, 0, i, BigInt(i), recency))

    expect(selectVictim(cache, 0)).toBe(1)
  })

  it('throws on a set index outside the cache', () => {
    const cache = createCache(1, 1, 1)
    expect(() => lookup(cache, 2, 0n)).toThrow(RangeError)
  })
})

describe('snapshotCache', () => {
  it('lists every way with hex tags for valid lines', () => {
    const cache = createCache(1, 1, 1)
    fill(cache, 1, 0, 0xabn, 0)

    expect(snapshotCache(cache)).toEqual([
      { s: 0, w: 0, v: 0 },
      { s: 1, w: 0, v: 1, t: 'ab' },
    ])
  })
})
