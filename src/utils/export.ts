import { writeFile } from 'fs/promises'
import { resolve } from 'path'
import type { CacheReport, SimConfig } from '../types'
import type { SimulationResult } from '../core/simulator'
import { snapshotCache } from '../core/cache'
import { hitRate } from './formatting'

export const RESULTS_FILE = '.csim_results'

export function buildReport(config: SimConfig, trace: string, result: SimulationResult): CacheReport {
  const { S, B } = result.cache.geometry
  return {
    config: { ...config, S, B },
    trace,
    counters: { ...result.counters },
    hitRate: hitRate(result.counters),
    events: { ...result.events },
    cacheState: snapshotCache(result.cache),
  }
}

export function exportAsJSON(report: CacheReport): string {
  return JSON.stringify(report, null, 2) + '\n'
}

export function exportAsCSV(report: CacheReport): string {
  const { config, counters, events } = report
  const lines: string[] = ['Metric,Value']
  lines.push(`Set Bits,${config.s}`)
  lines.push(`Lines Per Set,${config.E}`)
  lines.push(`Block Bits,${config.b}`)
  lines.push(`Policy,${config.policy}`)
  lines.push(`Hits,${counters.hits}`)
  lines.push(`Misses,${counters.misses}`)
  lines.push(`Evictions,${counters.evictions}`)
  lines.push(`Hit Rate,${(report.hitRate * 100).toFixed(2)}%`)
  lines.push(`Total Events,${events.total}`)
  lines.push(`Simulated Events,${events.simulated}`)
  lines.push(`Ignored Events,${events.ignored}`)
  return lines.join('\n') + '\n'
}

export async function writeExport(cwd: string, file: string, content: string): Promise<string> {
  const target = resolve(cwd, file)
  await writeFile(target, content, 'utf8')
  return target
}
