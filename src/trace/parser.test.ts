import { describe, it, expect } from 'vitest'
import { parseTraceLine, parseTraceText } from './parser'

describe('parseTraceLine', () => {
  it('parses a data access with leading space', () => {
    expect(parseTraceLine(' L 10,1')).toEqual({ op: 'L', address: 0x10n, size: 1, line: 0 })
  })

  it('parses instruction fetches and modifies', () => {
    expect(parseTraceLine('I  0400d7d4,8', 3)).toEqual({ op: 'I', address: 0x400d7d4n, size: 8, line: 3 })
    expect(parseTraceLine(' M 7ff0005c8,4')).toEqual({ op: 'M', address: 0x7ff0005c8n, size: 4, line: 0 })
  })

  it('accepts an optional 0x prefix and trailing text', () => {
    expect(parseTraceLine(' S 0x1F,4 extra')).toEqual({ op: 'S', address: 0x1fn, size: 4, line: 0 })
  })

  it('allows the address to follow the operation directly', () => {
    expect(parseTraceLine('L10,1')).toEqual({ op: 'L', address: 0x10n, size: 1, line: 0 })
  })

  it('requires the comma right after the address', () => {
    expect(parseTraceLine(' L 10 ,1')).toBeNull()
    expect(parseTraceLine(' L 10, 1')?.size).toBe(1)
  })

  it('keeps unknown operations for the replay to ignore', () => {
    expect(parseTraceLine('X 20,1')?.op).toBe('X')
  })

  it('accepts the largest 64-bit address', () => {
    expect(parseTraceLine(' S ffffffffffffffff,8')?.address).toBe(0xffffffffffffffffn)
  })

  it('rejects lines that are not records', () => {
    expect(parseTraceLine('')).toBeNull()
    expect(parseTraceLine('==12345== Memcheck')).toBeNull()
    expect(parseTraceLine(' L zz,1')).toBeNull()
    expect(parseTraceLine(' L 10')).toBeNull()
  })

  it('rejects addresses wider than 64 bits', () => {
    expect(parseTraceLine(' L 1ffffffffffffffff,1')).toBeNull()
  })
})

describe('parseTraceText', () => {
  it('skips malformed lines and keeps line numbers', () => {
    const events = parseTraceText(' L 0,1\nnot a record\r\n S 4,1\n')

    expect(events).toEqual([
      { op: 'L', address: 0n, size: 1, line: 1 },
      { op: 'S', address: 4n, size: 1, line: 3 },
    ])
  })
})
