export type ExecutionErrorKind =
  | 'AccountAlreadyExists'
  | 'SenderNotFound'
  | 'ReceiverNotFound'
  | 'InsufficientFunds'
  | 'SameSenderAndReceiver'
  | 'AmountOverflow'

export const EXECUTION_ERROR_KINDS: readonly ExecutionErrorKind[] = [
  'AccountAlreadyExists',
  'SenderNotFound',
  'ReceiverNotFound',
  'InsufficientFunds',
  'SameSenderAndReceiver',
  'AmountOverflow'
]

/**
 * Stable numeric codes reported in receipts. Replicas compare receipts,
 * so these never change once assigned.
 */
export const EXECUTION_ERROR_CODES: Record<ExecutionErrorKind, number> = {
  AccountAlreadyExists: 0,
  SenderNotFound: 1,
  ReceiverNotFound: 2,
  InsufficientFunds: 3,
  SameSenderAndReceiver: 4,
  AmountOverflow: 5
}

const DESCRIPTIONS: Record<ExecutionErrorKind, string> = {
  AccountAlreadyExists: 'Account already exists',
  SenderNotFound: "Sender doesn't exist",
  ReceiverNotFound: "Receiver doesn't exist",
  InsufficientFunds: 'Insufficient currency amount',
  SameSenderAndReceiver: 'Sender and receiver are the same account',
  AmountOverflow: 'Resulting balance exceeds the maximum amount'
}

/**
 * A transaction failed one of its preconditions. Raised before any ledger
 * primitive runs and turned into a failure receipt by the executor.
 */
export class ExecutionError extends Error {
  readonly code: number

  constructor(
    public readonly kind: ExecutionErrorKind,
    detail?: string
  ) {
    super(detail ? `${DESCRIPTIONS[kind]}: ${detail}` : DESCRIPTIONS[kind])
    this.name = 'ExecutionError'
    this.code = EXECUTION_ERROR_CODES[kind]
  }
}
