import type { Hash } from '../domain/identity.js'

const HEX_32 = /^[0-9a-f]{64}$/

export function isHex32(value: string): boolean {
  return HEX_32.test(value)
}

export const ZERO_HASH: Hash = '0'.repeat(64)

