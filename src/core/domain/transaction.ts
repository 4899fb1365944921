import { Amount } from './amount.js'
import type { Hash, PublicKey } from './identity.js'

/**
 * Identifies this family of transaction kinds to the routing layer.
 */
export const TRANSACTION_FAMILY = 'cosign-ledger/wallet'

export interface CreateAccount {
  type: 'create-account'
  name: string
}

export interface Issue {
  type: 'issue'
  amount: Amount
  seed: string
}

export interface Transfer {
  type: 'transfer'
  to: PublicKey
  amount: Amount
  seed: string
}

export interface ProposeMultisigTransfer {
  type: 'propose-multisig-transfer'
  from: PublicKey
  to: PublicKey
  approvers: readonly PublicKey[]
  amount: Amount
  seed: string
}

export interface AcceptMultisigTransfer {
  type: 'accept-multisig-transfer'
  proposalHash: Hash
  from: PublicKey
  to: PublicKey
  approvers: readonly PublicKey[]
  seed: string
}

export interface RejectMultisigTransfer {
  type: 'reject-multisig-transfer'
  proposalHash: Hash
  from: PublicKey
  approvers: readonly PublicKey[]
  seed: string
}

export type Transaction =
  | CreateAccount
  | Issue
  | Transfer
  | ProposeMultisigTransfer
  | AcceptMultisigTransfer
  | RejectMultisigTransfer

export type TransactionType = Transaction['type']

export const TRANSACTION_TYPES: readonly TransactionType[] = [
  'create-account',
  'issue',
  'transfer',
  'propose-multisig-transfer',
  'accept-multisig-transfer',
  'reject-multisig-transfer'
]

/**
 * A transaction as delivered by the consensus layer: the author has already
 * been authenticated from the signature and `hash` uniquely identifies it.
 */
export interface SignedTransaction<T extends Transaction = Transaction> {
  hash: Hash
  author: PublicKey
  payload: T
}

/**
 * Every account the transaction may read, author first, without duplicates.
 * Storage collaborators load exactly these before execution.
 */
export function affectedAccounts(signed: SignedTransaction): PublicKey[] {
  const { author, payload } = signed
  const keys: PublicKey[] = [author]

  switch (payload.type) {
    case 'create-account':
    case 'issue':
      break
    case 'transfer':
      keys.push(payload.to)
      break
    case 'propose-multisig-transfer':
    case 'accept-multisig-transfer':
      keys.push(payload.from, payload.to)
      break
    case 'reject-multisig-transfer':
      keys.push(payload.from)
      break
  }

  return Array.from(new Set(keys))
}
