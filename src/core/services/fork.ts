import type { Account } from '../domain/account.js'
import type { Hash, PublicKey } from '../domain/identity.js'
import type { AccountStore, ChangeSet, HistoryEntry } from '../ports/account-store.js'

/**
 * Copy-on-write overlay over another store. Writes stay in the fork, and
 * are visible to its own reads, until `merge()` hands them to the base in
 * one go or `discard()` drops them.
 */
export class Fork implements AccountStore {
  private readonly written = new Map<PublicKey, Account>()
  private readonly history: HistoryEntry[] = []
  private closed = false

  constructor(private readonly base: AccountStore) {}

  get(id: PublicKey): Account | null {
    return this.written.get(id) ?? this.base.get(id)
  }

  put(account: Account): void {
    this.ensureOpen()
    this.written.set(account.id, account)
  }

  appendHistory(id: PublicKey, causeHash: Hash): void {
    this.ensureOpen()
    this.history.push({ accountId: id, causeHash })
  }

  changes(): ChangeSet {
    return {
      accounts: Array.from(this.written.values()),
      history: [...this.history]
    }
  }

  get isDirty(): boolean {
    return this.written.size > 0 || this.history.length > 0
  }

  merge(): ChangeSet {
    this.ensureOpen()
    const changes = this.changes()
    for (const account of changes.accounts) {
      this.base.put(account)
    }
    for (const entry of changes.history) {
      this.base.appendHistory(entry.accountId, entry.causeHash)
    }
    this.closed = true
    return changes
  }

  discard(): void {
    this.written.clear()
    this.history.length = 0
    this.closed = true
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error('Fork has already been merged or discarded')
    }
  }
}
