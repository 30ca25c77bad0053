import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import * as trace from '../trace'
import { runCLI } from './index'

vi.mock('../trace', async importOriginal => {
  const actual = await importOriginal<typeof import('../trace')>()
  return {
    ...actual,
    readTraceFile: vi.fn(actual.readTraceFile),
    readTraceText: vi.fn(actual.readTraceText),
  }
})

describe('trace loading', () => {
  let dir: string
  const quiet = { stdout: () => undefined, stderr: () => undefined }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cachesim-load-'))
    await writeFile(join(dir, 'small.trace'), ' L 0,1\n L 0,1\n')
    vi.mocked(trace.readTraceFile).mockClear()
    vi.mocked(trace.readTraceText).mockClear()
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('streams the trace when writing a JSON report', async () => {
    const args = ['-s', '1', '-E', '1', '-b', '1', '-t', 'small.trace', '--json', 'out.json', '--no-results-file']
    const result = await runCLI(args, { cwd: dir, ...quiet })

    expect(result.exitCode).toBe(0)
    expect(trace.readTraceFile).toHaveBeenCalledTimes(1)
    expect(trace.readTraceText).not.toHaveBeenCalled()
    expect(JSON.parse(await readFile(join(dir, 'out.json'), 'utf8')).counters).toEqual({ hits: 1, misses: 1, evictions: 0 })
  })

  it('reads the whole trace only to build a share token', async () => {
    const args = ['-s', '1', '-E', '1', '-b', '1', '-t', 'small.trace', '--share', '--no-results-file']
    await runCLI(args, { cwd: dir, ...quiet })

    expect(trace.readTraceText).toHaveBeenCalledTimes(1)
    expect(trace.readTraceFile).not.toHaveBeenCalled()
  })
})
