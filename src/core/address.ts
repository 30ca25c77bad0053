import type { AddressParts } from '../types'

export const ADDRESS_BITS = 64

function lowMask(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n
}

/**
 * Split a 64-bit address into tag, set index and block offset.
 *
 * bigint shifts never sign-extend, so tags taken from addresses with the
 * top bit set stay positive. Callers guarantee `s + b < 64`.
 */
export function decomposeAddress(address: bigint, s: number, b: number): AddressParts {
  const a = BigInt.asUintN(ADDRESS_BITS, address)
  const blockOffset = a & lowMask(b)
  const setIndex = Number((a >> BigInt(b)) & lowMask(s))
  const tag = a >> BigInt(s + b)
  return { tag, setIndex, blockOffset }
}

export function formatAddress(address: bigint): string {
  return BigInt.asUintN(ADDRESS_BITS, address).toString(16)
}
