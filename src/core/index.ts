// Domain
export { Account, type AccountProps } from './domain/account.js'
export { Amount, type AmountLike } from './domain/amount.js'
export { PendingTransfer, type PendingTransferProps } from './domain/pending-transfer.js'
export type { Hash, PublicKey } from './domain/identity.js'
export {
  TRANSACTION_FAMILY,
  TRANSACTION_TYPES,
  affectedAccounts,
  type Transaction,
  type TransactionType,
  type SignedTransaction,
  type CreateAccount,
  type Issue,
  type Transfer,
  type ProposeMultisigTransfer,
  type AcceptMultisigTransfer,
  type RejectMultisigTransfer
} from './domain/transaction.js'
export {
  decodeSignedTransaction,
  encodeSignedTransaction,
  canonicalTransactionJson,
  type EncodedSignedTransaction
} from './domain/transaction-schema.js'
export {
  isSuccess,
  type ExecutionReceipt,
  type SuccessReceipt,
  type FailureReceipt,
  type ReceiptError
} from './domain/receipt.js'

// Ports
export type { AccountStore, ChangeSet, HistoryEntry } from './ports/account-store.js'
export type { LedgerRepository, Commit, HeadInfo } from './ports/ledger-repository.js'
export type { HistoryHasher } from './ports/history-hasher.js'

// Services
export { AccountLedger, type AccountLedgerOptions, type ReleaseOptions } from './services/account-ledger.js'
export { Fork } from './services/fork.js'
export { MemoryAccountStore } from './services/memory-account-store.js'
export {
  TransactionExecutor,
  type TransactionExecutorOptions,
  type SettlementPolicy
} from './services/transaction-executor.js'
export { LedgerService, type LedgerServiceOptions } from './services/ledger-service.js'

// Errors
export { ValidationError } from './errors/validation-error.js'
export {
  ExecutionError,
  EXECUTION_ERROR_CODES,
  EXECUTION_ERROR_KINDS,
  type ExecutionErrorKind
} from './errors/execution-error.js'
export { LedgerStateError } from './errors/ledger-state-error.js'

// Config
export { loadConfig, type LedgerConfig } from './config.js'

// Utils
export { Decimal, U64_MAX } from './utils/decimal.js'
export { isHex32, ZERO_HASH } from './utils/hex.js'
export { Sha256HistoryHasher } from './utils/sha256-history-hasher.js'
export { createLogger, logger, type Logger } from './utils/logger.js'
