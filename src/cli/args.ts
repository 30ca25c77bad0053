import { cac } from 'cac'
import type { RawOptions } from '../config'

export const PROGRAM = 'cachesim'

export interface ParsedOptions extends RawOptions {
  verbose: boolean
  help: boolean
  json?: string
  csv?: string
  share: boolean
  replay?: string
  resultsFile: boolean
  unknown: string[]
}

const KNOWN_FLAGS = new Set([
  's', 'E', 'b', 't', 'v', 'verbose', 'h', 'help',
  'policy', 'json', 'csv', 'share', 'replay', 'resultsFile', '--',
])

/**
 * Text that followed the last `flag` on the command line. The parser turns
 * numeric-looking values into numbers (`0010` becomes 10), which is wrong
 * for a file name, so the trace path is read from the raw arguments.
 */
function rawValue(args: string[], flag: string): string | undefined {
  let value: string | undefined
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--') break
    if (args[i] === flag && i + 1 < args.length && !args[i + 1].startsWith('-')) {
      value = args[i + 1]
    } else if (args[i].startsWith(`${flag}=`)) {
      value = args[i].slice(flag.length + 1)
    }
  }
  return value
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

/**
 * Parse command-line arguments (without 'node' and the script name).
 * Values are left unvalidated; see resolveConfig.
 */
export function parseArgs(args: string[]): ParsedOptions {
  const cli = cac(PROGRAM)

  cli.option('-s <num>', 'Number of set index bits')
  cli.option('-E <num>', 'Number of lines per set')
  cli.option('-b <num>', 'Number of block offset bits')
  cli.option('-t <file>', 'Trace file')
  cli.option('-v, --verbose', 'Optional verbose flag')
  cli.option('-h, --help', 'Print this help message')
  cli.option('--policy <policy>', 'Replacement policy: lru or approx-lru')
  cli.option('--json <file>', 'Write a JSON report')
  cli.option('--csv <file>', 'Write a CSV report')
  cli.option('--share', 'Print a replay token for this run')
  cli.option('--replay <token>', 'Replay the configuration and trace stored in a token')
  cli.option('--no-results-file', 'Do not write .csim_results')

  const parsed = cli.parse(['node', PROGRAM, ...args], { run: false })
  const options: Record<string, unknown> = parsed.options

  return {
    s: options.s,
    E: options.E,
    b: options.b,
    t: rawValue(args, '-t') ?? options.t,
    policy: options.policy,
    verbose: options.verbose === true || options.v === true,
    help: options.help === true || options.h === true,
    json: optionalString(options.json),
    csv: optionalString(options.csv),
    share: options.share === true,
    replay: optionalString(options.replay),
    resultsFile: options.resultsFile !== false,
    unknown: Object.keys(options).filter(key => !KNOWN_FLAGS.has(key)),
  }
}

export function getUsage(program: string = PROGRAM): string {
  return `Usage: ${program} [-hv] -s <num> -E <num> -b <num> -t <file>
Options:
  -h                Print this help message.
  -v                Optional verbose flag.
  -s <num>          Number of set index bits.
  -E <num>          Number of lines per set.
  -b <num>          Number of block offset bits.
  -t <file>         Trace file.
  --policy <name>   Replacement policy: lru (default) or approx-lru.
  --json <file>     Write a JSON report.
  --csv <file>      Write a CSV report.
  --share           Print a replay token for this run.
  --replay <token>  Replay the configuration and trace stored in a token.
  --no-results-file Do not write .csim_results.

Examples:
  ${program} -s 4 -E 1 -b 4 -t traces/yi.trace
  ${program} -v -s 8 -E 2 -b 4 -t traces/yi.trace`
}
