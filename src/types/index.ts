// cachesim type definitions
// Single source of truth for all TypeScript interfaces

export type {
  AccessCounters,
  AccessOutcome,
  AddressParts,
  Cache,
  CacheGeometry,
  CacheLine,
  CacheLineState,
  CacheSet,
  ReplacementPolicy,
} from './cache'

export type { EventTally, TraceEvent } from './trace'

import type { AccessCounters, CacheLineState, ReplacementPolicy } from './cache'
import type { EventTally } from './trace'

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface SimConfig {
  s: number
  E: number
  b: number
  policy: ReplacementPolicy
}

// =============================================================================
// REPORTS
// =============================================================================

export interface CacheReport {
  config: SimConfig & { S: number; B: number }
  trace: string
  counters: AccessCounters
  hitRate: number
  events: EventTally
  cacheState: CacheLineState[]
}

// =============================================================================
// SHARING
// =============================================================================

export interface ShareableState {
  s: number
  E: number
  b: number
  policy?: ReplacementPolicy
  trace: string
}
