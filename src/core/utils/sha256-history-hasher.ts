import { createHash } from 'node:crypto'
import type { Hash, PublicKey } from '../domain/identity.js'
import type { HistoryHasher } from '../ports/history-hasher.js'

/**
 * SHA-256 over the raw bytes of the previous digest followed by the cause
 * hash. Genesis hashes the account key with its creating transaction.
 */
export class Sha256HistoryHasher implements HistoryHasher {
  genesis(accountId: PublicKey, causeHash: Hash): Hash {
    return this.digest(accountId, causeHash)
  }

  next(previous: Hash, causeHash: Hash): Hash {
    return this.digest(previous, causeHash)
  }

  private digest(left: string, right: string): Hash {
    return createHash('sha256')
      .update(Buffer.from(left, 'hex'))
      .update(Buffer.from(right, 'hex'))
      .digest('hex')
  }
}
