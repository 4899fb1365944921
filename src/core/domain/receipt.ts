import type { Hash, PublicKey } from './identity.js'
import type { TransactionType } from './transaction.js'
import type { ExecutionError, ExecutionErrorKind } from '../errors/execution-error.js'

export interface ReceiptError {
  kind: ExecutionErrorKind
  code: number
  description: string
}

interface ReceiptBase {
  transactionHash: Hash
  author: PublicKey
  type: TransactionType
}

export interface SuccessReceipt extends ReceiptBase {
  status: 'success'
}

export interface FailureReceipt extends ReceiptBase {
  status: 'failure'
  error: ReceiptError
}

/**
 * Outcome of executing one transaction. Consensus proceeds either way;
 * only the ledger state differs.
 */
export type ExecutionReceipt = SuccessReceipt | FailureReceipt

export function successReceipt(base: ReceiptBase): SuccessReceipt {
  return { ...base, status: 'success' }
}

export function failureReceipt(base: ReceiptBase, error: ExecutionError): FailureReceipt {
  return {
    ...base,
    status: 'failure',
    error: {
      kind: error.kind,
      code: error.code,
      description: error.message
    }
  }
}

export function isSuccess(receipt: ExecutionReceipt): receipt is SuccessReceipt {
  return receipt.status === 'success'
}
