import type { Account } from '../domain/account.js'
import type { Hash, PublicKey } from '../domain/identity.js'
import type { ExecutionReceipt } from '../domain/receipt.js'
import { affectedAccounts, type SignedTransaction } from '../domain/transaction.js'
import type { LedgerRepository, HeadInfo } from '../ports/ledger-repository.js'
import type { HistoryHasher } from '../ports/history-hasher.js'
import { Decimal, sum } from '../utils/decimal.js'
import { logger as rootLogger, type Logger } from '../utils/logger.js'
import { Fork } from './fork.js'
import { MemoryAccountStore } from './memory-account-store.js'
import { TransactionExecutor, type SettlementPolicy } from './transaction-executor.js'

export interface LedgerServiceOptions {
  ledgerRepository: LedgerRepository
  settlementPolicy?: SettlementPolicy
  hasher?: HistoryHasher
  logger?: Logger
}

/**
 * Entry point for the replication layer. Transactions are executed strictly
 * one at a time in submission order, each against a snapshot of the
 * accounts it touches, and committed to the repository as a single unit.
 */
export class LedgerService {
  private readonly ledgerRepo: LedgerRepository
  private readonly executor: TransactionExecutor
  private readonly log: Logger
  private queue: Promise<unknown> = Promise.resolve()

  constructor(options: LedgerServiceOptions) {
    const logger = options.logger ?? rootLogger
    this.ledgerRepo = options.ledgerRepository
    this.executor = new TransactionExecutor({
      settlementPolicy: options.settlementPolicy,
      hasher: options.hasher,
      logger
    })
    this.log = logger.child({ module: 'ledger-service' })
  }

  get settlementPolicy(): SettlementPolicy {
    return this.executor.settlementPolicy
  }

  // === Execution ===

  async submit(signed: SignedTransaction): Promise<ExecutionReceipt> {
    const run = this.queue.then(() => this.executeAndCommit(signed))
    // Keep the queue alive after a failed commit; the caller still sees the error
    this.queue = run.catch(() => undefined)
    return run
  }

  async submitAll(transactions: SignedTransaction[]): Promise<ExecutionReceipt[]> {
    const receipts: ExecutionReceipt[] = []
    for (const signed of transactions) {
      receipts.push(await this.submit(signed))
    }
    return receipts
  }

  private async executeAndCommit(signed: SignedTransaction): Promise<ExecutionReceipt> {
    const existing = await this.ledgerRepo.getReceipt(signed.hash)
    if (existing) {
      this.log.warn({ transactionHash: signed.hash }, 'Transaction already executed')
      return existing
    }

    const snapshot = new MemoryAccountStore(
      await this.ledgerRepo.getAccounts(affectedAccounts(signed))
    )
    const fork = new Fork(snapshot)
    const receipt = this.executor.execute(fork, signed)
    const changes = fork.changes()

    await this.ledgerRepo.commit({ changes, receipt })

    this.log.debug({
      transactionHash: signed.hash,
      type: signed.payload.type,
      status: receipt.status,
      accounts: changes.accounts.length
    }, 'Transaction committed')

    return receipt
  }

  // === Queries ===

  async getHead(): Promise<HeadInfo> {
    return this.ledgerRepo.getHead()
  }

  async getAccount(id: PublicKey): Promise<Account | null> {
    return this.ledgerRepo.getAccount(id)
  }

  async listAccounts(): Promise<Account[]> {
    return this.ledgerRepo.listAccounts()
  }

  async getHistory(id: PublicKey): Promise<Hash[]> {
    return this.ledgerRepo.getHistory(id)
  }

  async getReceipt(transactionHash: Hash): Promise<ExecutionReceipt | null> {
    return this.ledgerRepo.getReceipt(transactionHash)
  }

  /**
   * Sum of every account's balance. May exceed a single account's maximum.
   */
  async totalSupply(): Promise<Decimal> {
    const accounts = await this.ledgerRepo.listAccounts()
    return sum(accounts.map(account => account.balance.value))
  }
}
