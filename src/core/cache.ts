import type { Cache, CacheLine, CacheLineState, CacheSet } from '../types'
import { AllocationError } from './errors'

/** Upper bound on S * E; larger geometries are refused before allocating. */
export const MAX_CACHE_LINES = 1 << 24

function emptyLine(): CacheLine {
  return { valid: false, tag: 0n, recency: 0 }
}

/**
 * Build a cache of 2^s sets with E invalid lines each.
 * Throws AllocationError instead of returning a partial cache.
 */
export function createCache(s: number, b: number, E: number): Cache {
  if (!Number.isInteger(E) || E <= 0) {
    throw new AllocationError(`Cannot build cache: associativity must be a positive integer (E=${E})`)
  }
  if (!Number.isInteger(s) || s < 0 || !Number.isInteger(b) || b < 0) {
    throw new AllocationError(`Cannot build cache: bit widths must be non-negative integers (s=${s}, b=${b})`)
  }
  if (s >= 31 || 2 ** s * E > MAX_CACHE_LINES) {
    throw new AllocationError(
      `Cannot build cache: 2^${s} sets x ${E} lines exceeds the limit of ${MAX_CACHE_LINES} lines`
    )
  }

  const S = 2 ** s
  const sets: CacheSet[] = []
  for (let setIndex = 0; setIndex < S; setIndex++) {
    const set: CacheSet = []
    for (let lineIndex = 0; lineIndex < E; lineIndex++) {
      set.push(emptyLine())
    }
    sets.push(set)
  }

  return { geometry: { s, b, E, S, B: 2 ** b }, sets }
}

function setAt(cache: Cache, setIndex: number): CacheSet {
  const set = cache.sets[setIndex]
  if (!set) {
    throw new RangeError(`Set index ${setIndex} out of range (S=${cache.geometry.S})`)
  }
  return set
}

function lineAt(cache: Cache, setIndex: number, lineIndex: number): CacheLine {
  const line = setAt(cache, setIndex)[lineIndex]
  if (!line) {
    throw new RangeError(`Line index ${lineIndex} out of range (E=${cache.geometry.E})`)
  }
  return line
}

/** Index of the valid line holding `tag`, or null on a miss. */
export function lookup(cache: Cache, setIndex: number, tag: bigint): number | null {
  const set = setAt(cache, setIndex)
  for (let i = 0; i < set.length; i++) {
    if (set[i].valid && set[i].tag === tag) return i
  }
  return null
}

export function firstFree(cache: Cache, setIndex: number): number | null {
  const set = setAt(cache, setIndex)
  const index = set.findIndex(line => !line.valid)
  return index === -1 ? null : index
}

/**
 * Line with the smallest recency; ties go to the lowest index.
 * Only meaningful on a full set.
 */
export function selectVictim(cache: Cache, setIndex: number): number {
  const set = setAt(cache, setIndex)
  let victim = 0
  for (let i = 1; i < set.length; i++) {
    if (set[i].recency < set[victim].recency) victim = i
  }
  return victim
}

export function fill(cache: Cache, setIndex: number, lineIndex: number, tag: bigint, recency: number): void {
  const line = lineAt(cache, setIndex, lineIndex)
  line.valid = true
  line.tag = tag
  line.recency = recency
}

export function touch(cache: Cache, setIndex: number, lineIndex: number, recency: number): void {
  lineAt(cache, setIndex, lineIndex).recency = recency
}

export function maxRecency(cache: Cache, setIndex: number): number {
  return setAt(cache, setIndex).reduce((max, line) => Math.max(max, line.recency), 0)
}

export function snapshotCache(cache: Cache): CacheLineState[] {
  const lines: CacheLineState[] = []
  cache.sets.forEach((set, s) => {
    set.forEach((line, w) => {
      lines.push(line.valid ? { s, w, v: 1, t: line.tag.toString(16) } : { s, w, v: 0 })
    })
  })
  return lines
}
