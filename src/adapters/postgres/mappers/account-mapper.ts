import { Account } from '../../../core/domain/account.js'
import { Amount } from '../../../core/domain/amount.js'
import { PendingTransfer } from '../../../core/domain/pending-transfer.js'
import { ValidationError } from '../../../core/errors/validation-error.js'

export interface AccountRow {
  id: string
  name: string
  balance: string
  pending_balance: string
  history_length: string
  history_digest: string
}

export interface PendingTransferRow {
  proposal_hash: string
  account_id: string
  to_account: string
  amount: string
  approvers: unknown
  position: number
}

export function mapRowToAccount(row: AccountRow, pendingRows: PendingTransferRow[]): Account {
  const pendingTransfers = [...pendingRows]
    .sort((a, b) => a.position - b.position)
    .map(mapRowToPendingTransfer)

  return new Account({
    id: row.id,
    name: row.name,
    balance: Amount.of(row.balance, 'balance'),
    pendingBalance: Amount.of(row.pending_balance, 'pending_balance'),
    pendingTransfers,
    historyLength: Number(row.history_length),
    historyDigest: row.history_digest
  })
}

export function mapRowToPendingTransfer(row: PendingTransferRow): PendingTransfer {
  return new PendingTransfer({
    hash: row.proposal_hash,
    to: row.to_account,
    amount: Amount.of(row.amount),
    approvers: parseApprovers(row.approvers)
  })
}

export function mapAccountToParams(account: Account): {
  id: string
  name: string
  balance: string
  pending_balance: string
  history_length: number
  history_digest: string
} {
  return {
    id: account.id,
    name: account.name,
    balance: account.balance.toString(),
    pending_balance: account.pendingBalance.toString(),
    history_length: account.historyLength,
    history_digest: account.historyDigest
  }
}

export function mapPendingTransferToParams(
  transfer: PendingTransfer,
  accountId: string,
  position: number
): {
  proposal_hash: string
  account_id: string
  to_account: string
  amount: string
  approvers: string
  position: number
} {
  return {
    proposal_hash: transfer.hash,
    account_id: accountId,
    to_account: transfer.to,
    amount: transfer.amount.toString(),
    approvers: JSON.stringify(transfer.approvers),
    position
  }
}

function parseApprovers(value: unknown): string[] {
  const approvers = Array.isArray(value)
    ? value.filter((v): v is string => typeof v === 'string')
    : []
  if (!Array.isArray(value) || approvers.length !== value.length) {
    throw new ValidationError('Stored approvers must be a list of keys', 'approvers', value)
  }
  return approvers
}
