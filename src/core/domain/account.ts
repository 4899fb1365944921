import { Amount } from './amount.js'
import { PendingTransfer } from './pending-transfer.js'
import type { Hash, PublicKey } from './identity.js'
import { ValidationError } from '../errors/validation-error.js'

export interface AccountProps {
  id: PublicKey
  name: string
  balance?: Amount
  pendingBalance?: Amount
  pendingTransfers?: readonly PendingTransfer[]
  historyLength?: number
  historyDigest: Hash
}

/**
 * Wallet record keyed by its owner's public key.
 *
 * Records are immutable. Every change goes through one of the `with*`
 * methods, which return a new record with the history counter and digest
 * advanced; the ledger then replaces the stored record wholesale.
 */
export class Account {
  readonly id: PublicKey
  readonly name: string
  readonly balance: Amount
  readonly pendingBalance: Amount
  readonly pendingTransfers: readonly PendingTransfer[]
  readonly historyLength: number
  readonly historyDigest: Hash

  constructor(props: AccountProps) {
    if (!props.name || props.name.trim() === '') {
      throw new ValidationError('Account name cannot be empty', 'name', props.name)
    }

    this.id = props.id
    this.name = props.name
    this.balance = props.balance ?? Amount.zero()
    this.pendingBalance = props.pendingBalance ?? Amount.zero()
    this.pendingTransfers = Object.freeze([...(props.pendingTransfers ?? [])])
    this.historyLength = props.historyLength ?? 0
    this.historyDigest = props.historyDigest

    this.validate()
  }

  private validate(): void {
    if (this.pendingBalance.greaterThan(this.balance)) {
      throw new ValidationError(
        `Pending balance ${this.pendingBalance.toString()} exceeds balance ${this.balance.toString()}`,
        'pendingBalance',
        this.pendingBalance.toString()
      )
    }

    const hashes = new Set(this.pendingTransfers.map(p => p.hash))
    if (hashes.size !== this.pendingTransfers.length) {
      throw new ValidationError('Duplicate pending transfer', 'pendingTransfers')
    }

    if (!Number.isSafeInteger(this.historyLength) || this.historyLength < 0) {
      throw new ValidationError('Invalid history length', 'historyLength', this.historyLength)
    }
  }

  /**
   * Funds not earmarked by an outstanding proposal.
   */
  get availableBalance(): Amount {
    return this.balance.minus(this.pendingBalance)
  }

  get pendingTransferHashes(): Hash[] {
    return this.pendingTransfers.map(p => p.hash)
  }

  findPendingTransfer(hash: Hash): PendingTransfer | undefined {
    return this.pendingTransfers.find(p => p.hash === hash)
  }

  hasPendingTransfer(hash: Hash): boolean {
    return this.findPendingTransfer(hash) !== undefined
  }

  withBalance(balance: Amount, historyDigest: Hash): Account {
    return this.copy({ balance }, historyDigest)
  }

  withPendingTransfer(transfer: PendingTransfer, historyDigest: Hash): Account {
    return this.copy({
      pendingBalance: this.pendingBalance.plus(transfer.amount),
      pendingTransfers: [...this.pendingTransfers, transfer]
    }, historyDigest)
  }

  withoutPendingTransfer(hash: Hash, keepEarmark: boolean, historyDigest: Hash): Account {
    const transfer = this.findPendingTransfer(hash)
    if (!transfer) {
      return this
    }

    return this.copy({
      pendingBalance: keepEarmark
        ? this.pendingBalance
        : this.pendingBalance.minus(transfer.amount),
      pendingTransfers: this.pendingTransfers.filter(p => p.hash !== hash)
    }, historyDigest)
  }

  private copy(
    changes: Partial<Pick<AccountProps, 'balance' | 'pendingBalance' | 'pendingTransfers'>>,
    historyDigest: Hash
  ): Account {
    return new Account({
      id: this.id,
      name: this.name,
      balance: changes.balance ?? this.balance,
      pendingBalance: changes.pendingBalance ?? this.pendingBalance,
      pendingTransfers: changes.pendingTransfers ?? this.pendingTransfers,
      historyLength: this.historyLength + 1,
      historyDigest
    })
  }

  equals(other: Account): boolean {
    return this.id === other.id
  }

  toString(): string {
    return `${this.name} (${this.id}) ${this.balance.toString()}`
  }
}
