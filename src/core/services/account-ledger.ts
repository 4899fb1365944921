import { Account } from '../domain/account.js'
import { Amount } from '../domain/amount.js'
import { PendingTransfer } from '../domain/pending-transfer.js'
import type { Hash, PublicKey } from '../domain/identity.js'
import type { AccountStore } from '../ports/account-store.js'
import type { HistoryHasher } from '../ports/history-hasher.js'
import { LedgerStateError } from '../errors/ledger-state-error.js'
import { Sha256HistoryHasher } from '../utils/sha256-history-hasher.js'

export interface AccountLedgerOptions {
  store: AccountStore
  hasher?: HistoryHasher
}

export interface ReleaseOptions {
  /**
   * Leave the proposal's amount in `pendingBalance`
   */
  keepEarmark?: boolean
}

/**
 * Owns account records and the primitive mutations on them. Applies no
 * business rules: the executor decides whether a mutation may happen, the
 * ledger only refuses requests that would corrupt a record.
 */
export class AccountLedger {
  private readonly store: AccountStore
  private readonly hasher: HistoryHasher

  constructor(options: AccountLedgerOptions) {
    this.store = options.store
    this.hasher = options.hasher ?? new Sha256HistoryHasher()
  }

  lookup(id: PublicKey): Account | null {
    return this.store.get(id)
  }

  create(id: PublicKey, name: string, causeHash: Hash): Account {
    if (this.store.get(id)) {
      throw new LedgerStateError('Account already exists', id)
    }

    const account = new Account({
      id,
      name,
      historyDigest: this.hasher.genesis(id, causeHash)
    })
    this.store.put(account)
    return account
  }

  credit(id: PublicKey, amount: Amount, causeHash: Hash): Account {
    const account = this.require(id)
    if (account.balance.wouldOverflow(amount)) {
      throw new LedgerStateError(`Credit of ${amount.toString()} overflows balance`, id)
    }
    return this.record(account.withBalance(account.balance.plus(amount), this.advance(account, causeHash)), causeHash)
  }

  debit(id: PublicKey, amount: Amount, causeHash: Hash): Account {
    const account = this.require(id)
    if (amount.greaterThan(account.availableBalance)) {
      throw new LedgerStateError(`Debit of ${amount.toString()} exceeds available balance`, id)
    }
    return this.record(account.withBalance(account.balance.minus(amount), this.advance(account, causeHash)), causeHash)
  }

  reserve(id: PublicKey, transfer: PendingTransfer, causeHash: Hash): Account {
    const account = this.require(id)
    if (account.hasPendingTransfer(transfer.hash)) {
      throw new LedgerStateError(`Proposal ${transfer.hash} is already pending`, id)
    }
    if (transfer.amount.greaterThan(account.availableBalance)) {
      throw new LedgerStateError(`Reserve of ${transfer.amount.toString()} exceeds available balance`, id)
    }
    return this.record(account.withPendingTransfer(transfer, this.advance(account, causeHash)), causeHash)
  }

  /**
   * Remove an outstanding proposal from the account.
   * @returns the removed proposal
   */
  release(
    id: PublicKey,
    proposalHash: Hash,
    causeHash: Hash,
    options: ReleaseOptions = {}
  ): PendingTransfer {
    const account = this.require(id)
    const transfer = account.findPendingTransfer(proposalHash)
    if (!transfer) {
      throw new LedgerStateError(`Proposal ${proposalHash} is not pending`, id)
    }

    this.record(
      account.withoutPendingTransfer(
        proposalHash,
        options.keepEarmark ?? false,
        this.advance(account, causeHash)
      ),
      causeHash
    )
    return transfer
  }

  private require(id: PublicKey): Account {
    const account = this.store.get(id)
    if (!account) {
      throw new LedgerStateError('Account does not exist', id)
    }
    return account
  }

  private advance(account: Account, causeHash: Hash): Hash {
    return this.hasher.next(account.historyDigest, causeHash)
  }

  private record(account: Account, causeHash: Hash): Account {
    this.store.put(account)
    this.store.appendHistory(account.id, causeHash)
    return account
  }
}
