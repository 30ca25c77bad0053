import type { ZodError } from 'zod'
import type { ShareableState, SimConfig } from '../types'
import { ConfigError } from '../core/errors'
import { SimConfigSchema, TracePathSchema } from './schema'

export const MISSING_ARGUMENT = 'Missing required command line argument'

/** Raw option values as they come out of the argument parser. */
export interface RawOptions {
  s?: unknown
  E?: unknown
  b?: unknown
  t?: unknown
  policy?: unknown
}

export interface ResolvedConfig {
  sim: SimConfig
  tracePath?: string
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const field = issue.path.length > 0 ? `-${issue.path.join('.')}` : 'config'
    return `${field}: ${issue.message}`
  })
}

/**
 * Validate the simulator configuration. Values from a replay token fill in
 * whatever the command line leaves out; a trace path is required unless the
 * token carries the trace.
 */
export function resolveConfig(raw: RawOptions, shared?: ShareableState): ResolvedConfig {
  const input = {
    s: raw.s ?? shared?.s,
    E: raw.E ?? shared?.E,
    b: raw.b ?? shared?.b,
    policy: raw.policy ?? shared?.policy,
  }

  const missing: string[] = (['s', 'E', 'b'] as const).filter(key => input[key] === undefined)
  if (!shared && raw.t === undefined) missing.push('t')
  if (missing.length > 0) {
    throw new ConfigError(
      MISSING_ARGUMENT,
      missing.map(key => `-${key}: required`)
    )
  }

  const parsed = SimConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issues = describeIssues(parsed.error)
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues)
  }

  if (raw.t === undefined) {
    return { sim: parsed.data }
  }

  const tracePath = TracePathSchema.safeParse(raw.t)
  if (!tracePath.success) {
    throw new ConfigError('Invalid configuration: -t: expected a file path')
  }
  return { sim: parsed.data, tracePath: tracePath.data }
}
