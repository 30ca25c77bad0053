export * from './types'
export { decomposeAddress, formatAddress } from './core/address'
export {
  MAX_CACHE_LINES,
  createCache,
  fill,
  firstFree,
  lookup,
  selectVictim,
  snapshotCache,
} from './core/cache'
export { LogicalClock } from './core/clock'
export {
  AllocationError,
  CacheSimError,
  ConfigError,
  ShareStateError,
  TraceFileError,
  isCacheSimError,
} from './core/errors'
export type { CacheSimErrorCode } from './core/errors'
export {
  createCounters,
  createSimulation,
  replayEvent,
  replayTrace,
  simulateAccess,
} from './core/simulator'
export type { ReplayHooks, SimulationResult, SimulationSession } from './core/simulator'
export { resolveConfig } from './config'
export type { RawOptions, ResolvedConfig } from './config'
export { parseTraceLine, parseTraceText, readTraceFile, readTraceText } from './trace'
export { buildReport, exportAsCSV, exportAsJSON } from './utils/export'
export { formatPercent, formatSummary, formatVerboseLine, hitRate } from './utils/formatting'
export { decodeState, encodeState } from './utils/state'
export { runCLI } from './cli'
export type { CLIOptions, CLIResult } from './cli'
