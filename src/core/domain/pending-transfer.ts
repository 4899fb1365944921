import { Amount } from './amount.js'
import type { Hash, PublicKey } from './identity.js'

export interface PendingTransferProps {
  hash: Hash
  to: PublicKey
  amount: Amount
  approvers: readonly PublicKey[]
}

/**
 * An outstanding multisig transfer proposal, held by the proposing account
 * until an approver accepts or rejects it.
 */
export class PendingTransfer {
  readonly hash: Hash
  readonly to: PublicKey
  readonly amount: Amount
  readonly approvers: readonly PublicKey[]

  constructor(props: PendingTransferProps) {
    this.hash = props.hash
    this.to = props.to
    this.amount = props.amount
    this.approvers = Object.freeze([...props.approvers])
  }

  isApprover(key: PublicKey): boolean {
    return this.approvers.includes(key)
  }

  equals(other: PendingTransfer): boolean {
    return this.hash === other.hash
  }

  toString(): string {
    return `${this.hash} -> ${this.to} ${this.amount.toString()}`
  }
}
