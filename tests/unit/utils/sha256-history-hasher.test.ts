import { createHash } from 'node:crypto'
import { describe, it, expect } from 'vitest'
import { Sha256HistoryHasher } from '../../../src/core/utils/sha256-history-hasher.js'

describe('Sha256HistoryHasher', () => {
  const hasher = new Sha256HistoryHasher()
  const a = 'a'.repeat(64)
  const b = 'b'.repeat(64)

  it('should hash the raw bytes of both inputs', () => {
    const expected = createHash('sha256')
      .update(Buffer.from(a + b, 'hex'))
      .digest('hex')

    expect(hasher.next(a, b)).toBe(expected)
    expect(hasher.genesis(a, b)).toBe(expected)
  })

  it('should depend on input order', () => {
    expect(hasher.next(a, b)).not.toBe(hasher.next(b, a))
  })

  it('should produce 32-byte hex digests', () => {
    expect(hasher.next(a, b)).toMatch(/^[0-9a-f]{64}$/)
  })
})
