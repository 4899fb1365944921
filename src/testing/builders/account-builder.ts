import { Account } from '../../core/domain/account.js'
import { Amount, type AmountLike } from '../../core/domain/amount.js'
import { PendingTransfer } from '../../core/domain/pending-transfer.js'
import type { Hash, PublicKey } from '../../core/domain/identity.js'
import { ZERO_HASH } from '../../core/utils/hex.js'
import { testKey } from '../keys.js'

export class AccountBuilder {
  private id: PublicKey
  private name: string
  private balance: Amount = Amount.zero()
  private pendingTransfers: PendingTransfer[] = []
  private historyLength = 0
  private historyDigest: Hash = ZERO_HASH

  constructor(name: string) {
    this.name = name
    this.id = testKey(name)
  }

  withId(id: PublicKey): this {
    this.id = id
    return this
  }

  withBalance(balance: AmountLike): this {
    this.balance = Amount.of(balance)
    return this
  }

  withPendingTransfer(props: {
    hash: Hash
    to: PublicKey
    amount: AmountLike
    approvers: PublicKey[]
  }): this {
    this.pendingTransfers.push(new PendingTransfer({ ...props, amount: Amount.of(props.amount) }))
    return this
  }

  withHistory(length: number, digest: Hash): this {
    this.historyLength = length
    this.historyDigest = digest
    return this
  }

  build(): Account {
    const pendingBalance = this.pendingTransfers
      .reduce((total, p) => total.plus(p.amount), Amount.zero())

    return new Account({
      id: this.id,
      name: this.name,
      balance: this.balance,
      pendingBalance,
      pendingTransfers: this.pendingTransfers,
      historyLength: this.historyLength,
      historyDigest: this.historyDigest
    })
  }
}
