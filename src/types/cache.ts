// Shared type definitions for the cache model and simulation results

export interface CacheLine {
  valid: boolean
  tag: bigint
  recency: number
}

export type CacheSet = CacheLine[]

export interface CacheGeometry {
  s: number      // set index bits
  b: number      // block offset bits
  E: number      // lines per set
  S: number      // number of sets, 2^s
  B: number      // block size in bytes, 2^b
}

export interface Cache {
  geometry: CacheGeometry
  sets: CacheSet[]
}

export interface AddressParts {
  tag: bigint
  setIndex: number
  blockOffset: bigint
}

export interface AccessCounters {
  hits: number
  misses: number
  evictions: number
}

export type AccessOutcome = 'hit' | 'miss' | 'miss-eviction'

export type ReplacementPolicy = 'lru' | 'approx-lru'

export interface CacheLineState {
  s: number      // set
  w: number      // way
  v: number      // valid (0 or 1)
  t?: string     // tag (hex string)
}
