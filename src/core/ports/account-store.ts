import type { Account } from '../domain/account.js'
import type { Hash, PublicKey } from '../domain/identity.js'

export interface HistoryEntry {
  accountId: PublicKey
  causeHash: Hash
}

/**
 * Everything one transaction changed: the final record of each touched
 * account, in first-touch order, and the history entries in the order the
 * primitives ran.
 */
export interface ChangeSet {
  accounts: Account[]
  history: HistoryEntry[]
}

/**
 * Synchronous view of ledger state used while a transaction executes.
 * Execution never waits on I/O; the storage collaborator loads the
 * accounts a transaction touches before handing over a store.
 */
export interface AccountStore {
  get(id: PublicKey): Account | null

  /**
   * Replace the stored record for `account.id`
   */
  put(account: Account): void

  /**
   * Record that `causeHash` mutated the account
   */
  appendHistory(id: PublicKey, causeHash: Hash): void
}
