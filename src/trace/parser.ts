import type { TraceEvent } from '../types'

// " %c %llx,%d": operation, hex address, decimal size; trailing text ignored
const RECORD = /^\s*(\S)\s*(?:0[xX])?([0-9a-fA-F]+),\s*([+-]?\d+)/

const MAX_ADDRESS = (1n << 64n) - 1n

/** Parse one trace line. Returns null for anything that is not a record. */
export function parseTraceLine(text: string, line = 0): TraceEvent | null {
  const match = RECORD.exec(text)
  if (!match) return null

  const [, op, hex, size] = match
  const address = BigInt(`0x${hex}`)
  if (address > MAX_ADDRESS) return null

  return { op, address, size: Number.parseInt(size, 10), line }
}

export function parseTraceText(text: string): TraceEvent[] {
  const events: TraceEvent[] = []
  text.split(/\r?\n/).forEach((raw, i) => {
    const event = parseTraceLine(raw, i + 1)
    if (event) events.push(event)
  })
  return events
}
