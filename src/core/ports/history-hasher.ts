import type { Hash, PublicKey } from '../domain/identity.js'

/**
 * Rolling digest over an account's mutation history. Supplied by the
 * crypto collaborator; every replica must use the same implementation.
 */
export interface HistoryHasher {
  /**
   * Digest of a freshly created account, anchored to its creating transaction
   */
  genesis(accountId: PublicKey, causeHash: Hash): Hash

  /**
   * Digest after appending `causeHash` to a history whose digest is `previous`
   */
  next(previous: Hash, causeHash: Hash): Hash
}
