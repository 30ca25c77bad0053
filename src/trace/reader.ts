import { constants, createReadStream } from 'fs'
import { access, readFile } from 'fs/promises'
import { createInterface } from 'readline'
import type { TraceEvent } from '../types'
import { TraceFileError } from '../core/errors'
import { getLogger } from '../logger'
import { parseTraceLine } from './parser'

const log = getLogger('trace')

async function assertReadable(path: string): Promise<void> {
  try {
    await access(path, constants.R_OK)
  } catch (error) {
    throw new TraceFileError(path, error)
  }
}

/**
 * Lazily yield the records of a trace file, one line at a time.
 * Lines that are not records are skipped.
 */
export async function* readTraceFile(path: string): AsyncGenerator<TraceEvent> {
  await assertReadable(path)

  const lines = createInterface({
    input: createReadStream(path, { encoding: 'utf8' }),
    crlfDelay: Infinity,
  })

  let lineNumber = 0
  try {
    for await (const text of lines) {
      lineNumber++
      const event = parseTraceLine(text, lineNumber)
      if (event) {
        yield event
      } else if (text.trim() !== '') {
        log.debug({ path, line: lineNumber }, 'skipping malformed trace line')
      }
    }
  } catch (error) {
    throw new TraceFileError(path, error)
  } finally {
    lines.close()
  }
}

export async function readTraceText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    throw new TraceFileError(path, error)
  }
}
