import type { Account } from '../domain/account.js'
import type { Hash, PublicKey } from '../domain/identity.js'
import type { ExecutionReceipt } from '../domain/receipt.js'
import type { ChangeSet } from './account-store.js'

export interface HeadInfo {
  version: string
  lastModified?: Date
}

export interface Commit {
  changes: ChangeSet
  receipt: ExecutionReceipt
}

export interface LedgerRepository {
  /**
   * Get current head/version information
   */
  getHead(): Promise<HeadInfo>

  /**
   * Get a single account by its public key
   */
  getAccount(id: PublicKey): Promise<Account | null>

  /**
   * Get every existing account among `ids`; missing ones are left out
   */
  getAccounts(ids: PublicKey[]): Promise<Account[]>

  /**
   * List all accounts ordered by id
   */
  listAccounts(): Promise<Account[]>

  /**
   * Cause hashes of every mutation applied to the account, oldest first
   */
  getHistory(id: PublicKey): Promise<Hash[]>

  /**
   * Receipt of an already executed transaction
   */
  getReceipt(transactionHash: Hash): Promise<ExecutionReceipt | null>

  /**
   * Persist one transaction's changes and receipt atomically
   */
  commit(commit: Commit): Promise<void>
}
