import type {
  AccessCounters,
  AccessOutcome,
  Cache,
  EventTally,
  ReplacementPolicy,
  SimConfig,
  TraceEvent,
} from '../types'
import { getLogger } from '../logger'
import { decomposeAddress } from './address'
import { createCache, fill, firstFree, lookup, maxRecency, selectVictim, touch } from './cache'
import { LogicalClock } from './clock'

const log = getLogger('simulator')

export interface SimulationSession {
  cache: Cache
  counters: AccessCounters
  clock: LogicalClock
  policy: ReplacementPolicy
}

export interface SimulationResult {
  counters: AccessCounters
  events: EventTally
  cache: Cache
}

export interface ReplayHooks {
  onEvent?: (event: TraceEvent, outcomes: AccessOutcome[]) => void
}

export function createCounters(): AccessCounters {
  return { hits: 0, misses: 0, evictions: 0 }
}

export function createSimulation(config: SimConfig): SimulationSession {
  return {
    cache: createCache(config.s, config.b, config.E),
    counters: createCounters(),
    clock: new LogicalClock(),
    policy: config.policy,
  }
}

/**
 * Simulate one access to `address`, mutating line state and `counters`.
 *
 * With the exact 'lru' policy every touched line is stamped from the shared
 * logical clock. 'approx-lru' keeps per-set counters instead: a hit bumps the
 * line's own counter and a fill takes the set's maximum plus one.
 */
export function simulateAccess(
  cache: Cache,
  counters: AccessCounters,
  clock: LogicalClock,
  address: bigint,
  policy: ReplacementPolicy = 'lru'
): AccessOutcome {
  const { s, b } = cache.geometry
  const { tag, setIndex } = decomposeAddress(address, s, b)

  const hitIndex = lookup(cache, setIndex, tag)
  if (hitIndex !== null) {
    counters.hits++
    const recency = policy === 'lru' ? clock.tick() : cache.sets[setIndex][hitIndex].recency + 1
    touch(cache, setIndex, hitIndex, recency)
    return 'hit'
  }

  counters.misses++
  const recency = policy === 'lru' ? clock.tick() : maxRecency(cache, setIndex) + 1

  const freeIndex = firstFree(cache, setIndex)
  if (freeIndex !== null) {
    fill(cache, setIndex, freeIndex, tag, recency)
    return 'miss'
  }

  counters.evictions++
  fill(cache, setIndex, selectVictim(cache, setIndex), tag, recency)
  return 'miss-eviction'
}

function access(session: SimulationSession, address: bigint): AccessOutcome {
  return simulateAccess(session.cache, session.counters, session.clock, address, session.policy)
}

/**
 * Replay one trace record. Loads and stores are one access, a modify is a
 * load followed by a store to the same address, everything else is a no-op.
 */
export function replayEvent(session: SimulationSession, event: TraceEvent): AccessOutcome[] {
  switch (event.op) {
    case 'L':
    case 'S':
      return [access(session, event.address)]
    case 'M':
      return [access(session, event.address), access(session, event.address)]
    default:
      return []
  }
}

export async function replayTrace(
  config: SimConfig,
  events: AsyncIterable<TraceEvent> | Iterable<TraceEvent>,
  hooks: ReplayHooks = {}
): Promise<SimulationResult> {
  const session = createSimulation(config)
  const tally: EventTally = { total: 0, simulated: 0, ignored: 0 }

  log.debug({ s: config.s, E: config.E, b: config.b, policy: config.policy }, 'replay started')

  for await (const event of events) {
    tally.total++
    const outcomes = replayEvent(session, event)
    if (outcomes.length === 0) {
      tally.ignored++
    } else {
      tally.simulated++
    }
    hooks.onEvent?.(event, outcomes)
  }

  log.debug({ ...session.counters, events: tally.total }, 'replay finished')

  return { counters: session.counters, events: tally, cache: session.cache }
}
