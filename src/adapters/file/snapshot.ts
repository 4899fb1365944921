import { z } from 'zod'
import { Account } from '../../core/domain/account.js'
import { Amount } from '../../core/domain/amount.js'
import { PendingTransfer } from '../../core/domain/pending-transfer.js'
import type { Hash } from '../../core/domain/identity.js'
import type { ExecutionReceipt } from '../../core/domain/receipt.js'
import { TRANSACTION_TYPES, type TransactionType } from '../../core/domain/transaction.js'
import { EXECUTION_ERROR_KINDS, type ExecutionErrorKind } from '../../core/errors/execution-error.js'
import { ValidationError } from '../../core/errors/validation-error.js'
import { isHex32 } from '../../core/utils/hex.js'

export const SNAPSHOT_FORMAT = 1

const hex32 = z.string().refine(isHex32)
const amount = z.string().regex(/^\d+$/)

const pendingTransferRecord = z.object({
  hash: hex32,
  to: hex32,
  amount,
  approvers: z.array(hex32)
})

const accountRecord = z.object({
  id: hex32,
  name: z.string(),
  balance: amount,
  pendingBalance: amount,
  pendingTransfers: z.array(pendingTransferRecord),
  historyLength: z.number().int().nonnegative(),
  historyDigest: hex32
})

const transactionType = z.custom<TransactionType>(
  value => typeof value === 'string' && TRANSACTION_TYPES.some(type => type === value)
)
const errorKind = z.custom<ExecutionErrorKind>(
  value => typeof value === 'string' && EXECUTION_ERROR_KINDS.some(kind => kind === value)
)

const receiptRecord = z.discriminatedUnion('status', [
  z.object({
    transactionHash: hex32,
    author: hex32,
    type: transactionType,
    status: z.literal('success')
  }),
  z.object({
    transactionHash: hex32,
    author: hex32,
    type: transactionType,
    status: z.literal('failure'),
    error: z.object({
      kind: errorKind,
      code: z.number().int(),
      description: z.string()
    })
  })
])

const snapshotSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  commits: z.number().int().nonnegative(),
  accounts: z.array(accountRecord),
  history: z.record(hex32, z.array(hex32)),
  receipts: z.array(receiptRecord)
})

export type AccountRecord = z.infer<typeof accountRecord>
export type SnapshotRecord = z.infer<typeof snapshotSchema>

export interface Snapshot {
  commits: number
  accounts: Map<string, Account>
  history: Map<string, Hash[]>
  receipts: Map<Hash, ExecutionReceipt>
}

export function emptySnapshot(): Snapshot {
  return {
    commits: 0,
    accounts: new Map(),
    history: new Map(),
    receipts: new Map()
  }
}

export function parseSnapshot(content: string): Snapshot {
  let json: unknown
  try {
    json = JSON.parse(content)
  } catch (e) {
    throw new ValidationError(`Snapshot is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, 'snapshot')
  }

  const result = snapshotSchema.safeParse(json)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue.path.join('.')
    throw new ValidationError(`Invalid snapshot ${field}: ${issue.message}`, field)
  }

  const record = result.data
  return {
    commits: record.commits,
    accounts: new Map(record.accounts.map((a): [string, Account] => [a.id, mapRecordToAccount(a)])),
    history: new Map(Object.entries(record.history)),
    receipts: new Map(record.receipts.map((r): [Hash, ExecutionReceipt] => [r.transactionHash, r]))
  }
}

export function serializeSnapshot(snapshot: Snapshot): string {
  const accounts = Array.from(snapshot.accounts.values())
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))

  const record: SnapshotRecord = {
    format: SNAPSHOT_FORMAT,
    commits: snapshot.commits,
    accounts: accounts.map(mapAccountToRecord),
    history: Object.fromEntries(snapshot.history),
    receipts: Array.from(snapshot.receipts.values())
  }
  return JSON.stringify(record, null, 2) + '\n'
}

export function mapRecordToAccount(record: AccountRecord): Account {
  return new Account({
    id: record.id,
    name: record.name,
    balance: Amount.of(record.balance),
    pendingBalance: Amount.of(record.pendingBalance),
    pendingTransfers: record.pendingTransfers.map(p => new PendingTransfer({
      hash: p.hash,
      to: p.to,
      amount: Amount.of(p.amount),
      approvers: p.approvers
    })),
    historyLength: record.historyLength,
    historyDigest: record.historyDigest
  })
}

export function mapAccountToRecord(account: Account): AccountRecord {
  return {
    id: account.id,
    name: account.name,
    balance: account.balance.toString(),
    pendingBalance: account.pendingBalance.toString(),
    pendingTransfers: account.pendingTransfers.map(p => ({
      hash: p.hash,
      to: p.to,
      amount: p.amount.toString(),
      approvers: [...p.approvers]
    })),
    historyLength: account.historyLength,
    historyDigest: account.historyDigest
  }
}
