/**
 * Command-line front end: parses options, replays the trace and prints the
 * summary line the reference driver expects.
 *
 * @example
 * const result = await runCLI(['-s', '4', '-E', '1', '-b', '4', '-t', 'app.trace'])
 * // stdout: hits:<h> misses:<m> evictions:<e>
 */

import { writeFile } from 'fs/promises'
import { resolve } from 'path'
import type { ShareableState, TraceEvent } from '../types'
import { MISSING_ARGUMENT, resolveConfig } from '../config'
import { ConfigError, ShareStateError, isCacheSimError } from '../core/errors'
import { replayTrace } from '../core/simulator'
import { getLogger } from '../logger'
import { parseTraceText, readTraceFile, readTraceText } from '../trace'
import { RESULTS_FILE, buildReport, exportAsCSV, exportAsJSON, writeExport } from '../utils/export'
import { formatResultsFile, formatSummary, formatVerboseLine } from '../utils/formatting'
import { decodeState, encodeState } from '../utils/state'
import { PROGRAM, getUsage, parseArgs } from './args'

export { PROGRAM, getUsage, parseArgs } from './args'
export type { ParsedOptions } from './args'

const log = getLogger('cli')

export interface CLIOptions {
  /** Directory relative paths and the results file resolve against */
  cwd?: string
  /** Program name shown in usage and error messages */
  program?: string
  stdout?: (msg: string) => void
  stderr?: (msg: string) => void
}

export interface CLIResult {
  exitCode: number
  error?: Error
}

interface TraceSource {
  label: string
  events: AsyncIterable<TraceEvent> | Iterable<TraceEvent>
  text?: string
}

async function loadTrace(cwd: string, tracePath: string | undefined, shared: ShareableState | null, needText: boolean): Promise<TraceSource> {
  if (tracePath === undefined) {
    if (!shared) {
      throw new ConfigError(MISSING_ARGUMENT, ['-t: required'])
    }
    return { label: '<replay>', events: parseTraceText(shared.trace), text: shared.trace }
  }

  const path = resolve(cwd, tracePath)
  if (needText) {
    const text = await readTraceText(path)
    return { label: tracePath, events: parseTraceText(text), text }
  }
  return { label: tracePath, events: readTraceFile(path) }
}

export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  const cwd = options.cwd ?? process.cwd()
  const program = options.program ?? PROGRAM
  const stdout = options.stdout ?? console.log
  const stderr = options.stderr ?? console.error

  const parsed = parseArgs(args)

  if (parsed.unknown.length > 0) {
    const flag = parsed.unknown[0]
    stderr(`${program}: unknown option -- '${flag}'`)
    stdout(getUsage(program))
    return { exitCode: 1, error: new ConfigError(`Unknown option: ${flag}`) }
  }

  if (parsed.help) {
    stdout(getUsage(program))
    return { exitCode: 0 }
  }

  try {
    let shared: ShareableState | null = null
    if (parsed.replay !== undefined) {
      shared = decodeState(parsed.replay)
      if (!shared) {
        throw new ShareStateError('Replay token is not valid')
      }
    }

    const { sim, tracePath } = resolveConfig(parsed, shared ?? undefined)
    const trace = await loadTrace(cwd, tracePath, shared, parsed.share)

    const result = await replayTrace(sim, trace.events, {
      onEvent: (event, outcomes) => {
        if (parsed.verbose && outcomes.length > 0) {
          stdout(formatVerboseLine(event, outcomes))
        }
      },
    })

    stdout(formatSummary(result.counters))

    if (parsed.share) {
      stdout(encodeState({ s: sim.s, E: sim.E, b: sim.b, policy: sim.policy, trace: trace.text ?? '' }))
    }

    const report = buildReport(sim, trace.label, result)
    if (parsed.json !== undefined) {
      const target = await writeExport(cwd, parsed.json, exportAsJSON(report))
      log.info({ path: target }, 'wrote JSON report')
    }
    if (parsed.csv !== undefined) {
      const target = await writeExport(cwd, parsed.csv, exportAsCSV(report))
      log.info({ path: target }, 'wrote CSV report')
    }
    if (parsed.resultsFile) {
      await writeFile(resolve(cwd, RESULTS_FILE), formatResultsFile(result.counters), 'utf8')
    }

    return { exitCode: 0 }
  } catch (err) {
    if (!isCacheSimError(err)) {
      log.error({ err }, 'simulation failed')
      throw err
    }

    if (err instanceof ConfigError && err.message === MISSING_ARGUMENT) {
      stderr(`${program}: ${MISSING_ARGUMENT}`)
      stdout(getUsage(program))
    } else {
      stderr(`Error: ${err.message}`)
    }
    return { exitCode: err.exitCode, error: err }
  }
}
