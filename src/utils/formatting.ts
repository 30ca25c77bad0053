import type { AccessCounters, AccessOutcome, TraceEvent } from '../types'
import { formatAddress } from '../core/address'

export function formatPercent(rate: number): string {
  return (rate * 100).toFixed(1) + '%'
}

export function hitRate(counters: AccessCounters): number {
  const accesses = counters.hits + counters.misses
  return accesses === 0 ? 0 : counters.hits / accesses
}

// Line the reference driver parses; must not change
export function formatSummary(counters: AccessCounters): string {
  return `hits:${counters.hits} misses:${counters.misses} evictions:${counters.evictions}`
}

export function formatResultsFile(counters: AccessCounters): string {
  return `${counters.hits} ${counters.misses} ${counters.evictions}\n`
}

const OUTCOME_TEXT: Record<AccessOutcome, string> = {
  'hit': 'hit',
  'miss': 'miss',
  'miss-eviction': 'miss eviction',
}

export function formatVerboseLine(event: TraceEvent, outcomes: AccessOutcome[]): string {
  const words = outcomes.map(outcome => OUTCOME_TEXT[outcome])
  return [`${event.op} ${formatAddress(event.address)},${event.size}`, ...words].join(' ')
}
