import type { Account } from '../domain/account.js'
import type { Amount } from '../domain/amount.js'
import { PendingTransfer } from '../domain/pending-transfer.js'
import type { PublicKey } from '../domain/identity.js'
import type {
  AcceptMultisigTransfer,
  CreateAccount,
  Issue,
  ProposeMultisigTransfer,
  RejectMultisigTransfer,
  SignedTransaction,
  Transfer
} from '../domain/transaction.js'
import {
  type ExecutionReceipt,
  failureReceipt,
  successReceipt
} from '../domain/receipt.js'
import type { AccountStore } from '../ports/account-store.js'
import type { HistoryHasher } from '../ports/history-hasher.js'
import { ExecutionError } from '../errors/execution-error.js'
import { AccountLedger } from './account-ledger.js'
import { Fork } from './fork.js'
import { logger as rootLogger, type Logger } from '../utils/logger.js'

/**
 * How an accepted multisig proposal is settled.
 *
 * - `exact`: move the proposed amount and drop its earmark.
 * - `residual`: move `balance - pendingBalance` and keep the earmark, the
 *   behaviour of the first deployed version of this ledger.
 */
export type SettlementPolicy = 'exact' | 'residual'

export interface TransactionExecutorOptions {
  settlementPolicy?: SettlementPolicy
  hasher?: HistoryHasher
  logger?: Logger
}

export class TransactionExecutor {
  readonly settlementPolicy: SettlementPolicy
  private readonly hasher?: HistoryHasher
  private readonly log: Logger

  constructor(options: TransactionExecutorOptions = {}) {
    this.settlementPolicy = options.settlementPolicy ?? 'exact'
    this.hasher = options.hasher
    this.log = (options.logger ?? rootLogger).child({ module: 'transaction-executor' })
  }

  /**
   * Run one transaction against `store`. Either every mutation lands in
   * `store` and a success receipt comes back, or none does and the receipt
   * names the failed precondition. Anything other than a precondition
   * failure is a bug and is rethrown.
   */
  execute(store: AccountStore, signed: SignedTransaction): ExecutionReceipt {
    const fork = new Fork(store)
    const ledger = new AccountLedger({ store: fork, hasher: this.hasher })
    const base = {
      transactionHash: signed.hash,
      author: signed.author,
      type: signed.payload.type
    }

    try {
      this.apply(ledger, signed)
    } catch (e) {
      fork.discard()
      if (e instanceof ExecutionError) {
        this.log.debug(
          { transactionHash: signed.hash, type: signed.payload.type, kind: e.kind },
          'Transaction rejected'
        )
        return failureReceipt(base, e)
      }
      throw e
    }

    fork.merge()
    return successReceipt(base)
  }

  private apply(ledger: AccountLedger, signed: SignedTransaction): void {
    const { payload } = signed

    switch (payload.type) {
      case 'create-account':
        return this.createAccount(ledger, signed, payload)
      case 'issue':
        return this.issue(ledger, signed, payload)
      case 'transfer':
        return this.transfer(ledger, signed, payload)
      case 'propose-multisig-transfer':
        return this.proposeMultisigTransfer(ledger, signed, payload)
      case 'accept-multisig-transfer':
        return this.acceptMultisigTransfer(ledger, signed, payload)
      case 'reject-multisig-transfer':
        return this.rejectMultisigTransfer(ledger, signed, payload)
      default:
        return assertNever(payload)
    }
  }

  private createAccount(ledger: AccountLedger, signed: SignedTransaction, tx: CreateAccount): void {
    if (ledger.lookup(signed.author)) {
      throw new ExecutionError('AccountAlreadyExists')
    }

    ledger.create(signed.author, tx.name, signed.hash)
  }

  private issue(ledger: AccountLedger, signed: SignedTransaction, tx: Issue): void {
    const wallet = requireAccount(ledger, signed.author, 'ReceiverNotFound')
    ensureCanCredit(wallet, tx.amount)

    ledger.credit(wallet.id, tx.amount, signed.hash)
  }

  private transfer(ledger: AccountLedger, signed: SignedTransaction, tx: Transfer): void {
    if (signed.author === tx.to) {
      throw new ExecutionError('SameSenderAndReceiver')
    }

    const sender = requireAccount(ledger, signed.author, 'SenderNotFound')
    const receiver = requireAccount(ledger, tx.to, 'ReceiverNotFound')
    ensureFunds(sender, tx.amount)
    ensureCanCredit(receiver, tx.amount)

    ledger.debit(sender.id, tx.amount, signed.hash)
    ledger.credit(receiver.id, tx.amount, signed.hash)
  }

  private proposeMultisigTransfer(
    ledger: AccountLedger,
    signed: SignedTransaction,
    tx: ProposeMultisigTransfer
  ): void {
    if (tx.from === tx.to) {
      throw new ExecutionError('SameSenderAndReceiver')
    }

    const sender = requireAccount(ledger, tx.from, 'SenderNotFound')
    requireAccount(ledger, tx.to, 'ReceiverNotFound')
    ensureApprover(tx.approvers, signed.author)
    ensureFunds(sender, tx.amount)

    const proposal = new PendingTransfer({
      hash: signed.hash,
      to: tx.to,
      amount: tx.amount,
      approvers: tx.approvers
    })
    ledger.reserve(sender.id, proposal, signed.hash)
  }

  private acceptMultisigTransfer(
    ledger: AccountLedger,
    signed: SignedTransaction,
    tx: AcceptMultisigTransfer
  ): void {
    if (tx.from === tx.to) {
      throw new ExecutionError('SameSenderAndReceiver')
    }

    const sender = requireAccount(ledger, tx.from, 'SenderNotFound')
    const receiver = requireAccount(ledger, tx.to, 'ReceiverNotFound')

    const proposal = sender.findPendingTransfer(tx.proposalHash)
    if (!proposal || proposal.to !== tx.to) {
      throw new ExecutionError('SenderNotFound', `no pending proposal ${tx.proposalHash}`)
    }
    ensureApprover(tx.approvers, signed.author)
    ensureProposalApprover(proposal, signed.author)

    const settled = this.settlementPolicy === 'exact'
      ? proposal.amount
      : sender.availableBalance
    ensureCanCredit(receiver, settled)

    ledger.release(sender.id, proposal.hash, signed.hash, {
      keepEarmark: this.settlementPolicy === 'residual'
    })
    ledger.debit(sender.id, settled, signed.hash)
    ledger.credit(receiver.id, settled, signed.hash)
  }

  private rejectMultisigTransfer(
    ledger: AccountLedger,
    signed: SignedTransaction,
    tx: RejectMultisigTransfer
  ): void {
    const sender = requireAccount(ledger, tx.from, 'SenderNotFound')

    const proposal = sender.findPendingTransfer(tx.proposalHash)
    if (!proposal) {
      throw new ExecutionError('SenderNotFound', `no pending proposal ${tx.proposalHash}`)
    }
    ensureApprover(tx.approvers, signed.author)
    ensureProposalApprover(proposal, signed.author)

    ledger.release(sender.id, proposal.hash, signed.hash)
  }
}

function requireAccount(
  ledger: AccountLedger,
  id: PublicKey,
  kind: 'SenderNotFound' | 'ReceiverNotFound'
): Account {
  const account = ledger.lookup(id)
  if (!account) {
    throw new ExecutionError(kind)
  }
  return account
}

function ensureApprover(approvers: readonly PublicKey[], author: PublicKey): void {
  if (!approvers.includes(author)) {
    throw new ExecutionError('SenderNotFound', 'author is not an approver')
  }
}

function ensureProposalApprover(proposal: PendingTransfer, author: PublicKey): void {
  if (!proposal.isApprover(author)) {
    throw new ExecutionError('SenderNotFound', 'author is not an approver of the proposal')
  }
}

function ensureFunds(sender: Account, amount: Amount): void {
  if (sender.availableBalance.lessThan(amount)) {
    throw new ExecutionError('InsufficientFunds')
  }
}

function ensureCanCredit(receiver: Account, amount: Amount): void {
  if (receiver.balance.wouldOverflow(amount)) {
    throw new ExecutionError('AmountOverflow')
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled transaction type: ${JSON.stringify(value)}`)
}
