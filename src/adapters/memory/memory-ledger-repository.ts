import type { Account } from '../../core/domain/account.js'
import type { Hash, PublicKey } from '../../core/domain/identity.js'
import type { ExecutionReceipt } from '../../core/domain/receipt.js'
import type { Commit, HeadInfo, LedgerRepository } from '../../core/ports/ledger-repository.js'
import { MemoryAccountStore } from '../../core/services/memory-account-store.js'

/**
 * Process-local repository. Suitable for tests and single-node tools;
 * state is lost with the process.
 */
export class MemoryLedgerRepository implements LedgerRepository {
  private readonly store: MemoryAccountStore
  private readonly receipts = new Map<Hash, ExecutionReceipt>()
  private version = 0
  private lastModified?: Date

  constructor(accounts: Iterable<Account> = []) {
    this.store = new MemoryAccountStore(accounts)
  }

  async getHead(): Promise<HeadInfo> {
    return {
      version: this.version.toString(),
      lastModified: this.lastModified
    }
  }

  async getAccount(id: PublicKey): Promise<Account | null> {
    return this.store.get(id)
  }

  async getAccounts(ids: PublicKey[]): Promise<Account[]> {
    const accounts: Account[] = []
    for (const id of ids) {
      const account = this.store.get(id)
      if (account) {
        accounts.push(account)
      }
    }
    return accounts
  }

  async listAccounts(): Promise<Account[]> {
    return this.store.list()
  }

  async getHistory(id: PublicKey): Promise<Hash[]> {
    return this.store.history(id)
  }

  async getReceipt(transactionHash: Hash): Promise<ExecutionReceipt | null> {
    return this.receipts.get(transactionHash) ?? null
  }

  async commit(commit: Commit): Promise<void> {
    if (this.receipts.has(commit.receipt.transactionHash)) {
      throw new Error(`Transaction ${commit.receipt.transactionHash} is already committed`)
    }

    // Nothing below can fail, so the commit lands whole
    for (const account of commit.changes.accounts) {
      this.store.put(account)
    }
    for (const entry of commit.changes.history) {
      this.store.appendHistory(entry.accountId, entry.causeHash)
    }
    this.receipts.set(commit.receipt.transactionHash, commit.receipt)
    this.version++
    this.lastModified = new Date()
  }
}
