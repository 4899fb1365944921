import type { ExecutionReceipt } from '../../../core/domain/receipt.js'
import { TRANSACTION_TYPES, type TransactionType } from '../../../core/domain/transaction.js'
import { EXECUTION_ERROR_CODES, EXECUTION_ERROR_KINDS, type ExecutionErrorKind } from '../../../core/errors/execution-error.js'
import { ValidationError } from '../../../core/errors/validation-error.js'

export interface ReceiptRow {
  transaction_hash: string
  author: string
  type: string
  status: string
  error_kind: string | null
  error_code: number | null
  error_description: string | null
}

export function mapRowToReceipt(row: ReceiptRow): ExecutionReceipt {
  const base = {
    transactionHash: row.transaction_hash,
    author: row.author,
    type: parseType(row.type)
  }

  if (row.status === 'success') {
    return { ...base, status: 'success' }
  }

  if (row.status !== 'failure' || row.error_kind === null) {
    throw new ValidationError(`Malformed receipt ${row.transaction_hash}`, 'status', row.status)
  }

  const kind = parseKind(row.error_kind)
  return {
    ...base,
    status: 'failure',
    error: {
      kind,
      code: row.error_code ?? EXECUTION_ERROR_CODES[kind],
      description: row.error_description ?? ''
    }
  }
}

export function mapReceiptToParams(receipt: ExecutionReceipt): ReceiptRow {
  return {
    transaction_hash: receipt.transactionHash,
    author: receipt.author,
    type: receipt.type,
    status: receipt.status,
    error_kind: receipt.status === 'failure' ? receipt.error.kind : null,
    error_code: receipt.status === 'failure' ? receipt.error.code : null,
    error_description: receipt.status === 'failure' ? receipt.error.description : null
  }
}

function parseType(value: string): TransactionType {
  const type = TRANSACTION_TYPES.find(t => t === value)
  if (!type) {
    throw new ValidationError(`Unknown transaction type ${value}`, 'type', value)
  }
  return type
}

function parseKind(value: string): ExecutionErrorKind {
  const kind = EXECUTION_ERROR_KINDS.find(k => k === value)
  if (!kind) {
    throw new ValidationError(`Unknown error kind ${value}`, 'error_kind', value)
  }
  return kind
}
