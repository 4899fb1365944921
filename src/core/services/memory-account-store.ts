import type { Account } from '../domain/account.js'
import type { Hash, PublicKey } from '../domain/identity.js'
import type { AccountStore } from '../ports/account-store.js'

/**
 * Map-backed account store. Holds either the whole ledger (tests, the
 * memory adapter) or just the accounts one transaction touches.
 */
export class MemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<PublicKey, Account>()
  private readonly histories = new Map<PublicKey, Hash[]>()

  constructor(accounts: Iterable<Account> = []) {
    for (const account of accounts) {
      this.accounts.set(account.id, account)
    }
  }

  get(id: PublicKey): Account | null {
    return this.accounts.get(id) ?? null
  }

  put(account: Account): void {
    this.accounts.set(account.id, account)
  }

  appendHistory(id: PublicKey, causeHash: Hash): void {
    const history = this.histories.get(id) ?? []
    history.push(causeHash)
    this.histories.set(id, history)
  }

  history(id: PublicKey): Hash[] {
    return [...(this.histories.get(id) ?? [])]
  }

  list(): Account[] {
    return Array.from(this.accounts.values())
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
  }

  get size(): number {
    return this.accounts.size
  }
}
