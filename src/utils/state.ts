import LZString from 'lz-string'
import type { ShareableState } from '../types'
import { ShareableStateSchema } from '../config/schema'

export function encodeState(state: ShareableState): string {
  return LZString.compressToEncodedURIComponent(JSON.stringify(state))
}

export function decodeState(encoded: string): ShareableState | null {
  let value: unknown
  try {
    const json = LZString.decompressFromEncodedURIComponent(encoded.trim())
    if (!json) return null
    value = JSON.parse(json)
  } catch {
    return null
  }

  const parsed = ShareableStateSchema.safeParse(value)
  return parsed.success ? parsed.data : null
}
