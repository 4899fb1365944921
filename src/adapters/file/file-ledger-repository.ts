import type { Account } from '../../core/domain/account.js'
import type { Hash, PublicKey } from '../../core/domain/identity.js'
import type { ExecutionReceipt } from '../../core/domain/receipt.js'
import type { Commit, HeadInfo, LedgerRepository } from '../../core/ports/ledger-repository.js'
import { type FileProvider, NodeFileProvider } from './file-provider.js'
import { type Snapshot, emptySnapshot, parseSnapshot, serializeSnapshot } from './snapshot.js'

export interface FileLedgerRepositoryOptions {
  /**
   * Path to the JSON snapshot file
   */
  snapshotPath: string

  /**
   * File provider implementation.
   * Defaults to NodeFileProvider for Node.js environments.
   * Pass InMemoryFileProvider for testing.
   */
  fileProvider?: FileProvider
}

/**
 * Keeps the whole ledger in one JSON file, rewritten on every commit.
 * Fits small single-node deployments and audits; use the postgres adapter
 * for anything larger.
 */
export class FileLedgerRepository implements LedgerRepository {
  private readonly snapshotPath: string
  private readonly fileProvider: FileProvider

  private cachedSnapshot: Snapshot | null = null
  private cacheVersion: string | null = null

  constructor(options: FileLedgerRepositoryOptions) {
    this.snapshotPath = options.snapshotPath
    this.fileProvider = options.fileProvider ?? new NodeFileProvider()
  }

  async getHead(): Promise<HeadInfo> {
    const snapshot = await this.loadSnapshot()
    const stat = await this.fileProvider.stat(this.snapshotPath)

    return {
      version: snapshot.commits.toString(),
      lastModified: stat?.lastModified
    }
  }

  async getAccount(id: PublicKey): Promise<Account | null> {
    const snapshot = await this.loadSnapshot()
    return snapshot.accounts.get(id) ?? null
  }

  async getAccounts(ids: PublicKey[]): Promise<Account[]> {
    const snapshot = await this.loadSnapshot()
    const accounts: Account[] = []
    for (const id of ids) {
      const account = snapshot.accounts.get(id)
      if (account) {
        accounts.push(account)
      }
    }
    return accounts
  }

  async listAccounts(): Promise<Account[]> {
    const snapshot = await this.loadSnapshot()
    return Array.from(snapshot.accounts.values())
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
  }

  async getHistory(id: PublicKey): Promise<Hash[]> {
    const snapshot = await this.loadSnapshot()
    return [...(snapshot.history.get(id) ?? [])]
  }

  async getReceipt(transactionHash: Hash): Promise<ExecutionReceipt | null> {
    const snapshot = await this.loadSnapshot()
    return snapshot.receipts.get(transactionHash) ?? null
  }

  async commit(commit: Commit): Promise<void> {
    const current = await this.loadSnapshot()

    if (current.receipts.has(commit.receipt.transactionHash)) {
      throw new Error(`Transaction ${commit.receipt.transactionHash} is already committed`)
    }

    // Build the next snapshot on copies; the cached one stays valid if the write fails
    const next: Snapshot = {
      commits: current.commits + 1,
      accounts: new Map(current.accounts),
      history: new Map(current.history),
      receipts: new Map(current.receipts)
    }

    for (const account of commit.changes.accounts) {
      next.accounts.set(account.id, account)
    }
    for (const entry of commit.changes.history) {
      next.history.set(entry.accountId, [...(next.history.get(entry.accountId) ?? []), entry.causeHash])
    }
    next.receipts.set(commit.receipt.transactionHash, commit.receipt)

    await this.fileProvider.write(this.snapshotPath, serializeSnapshot(next))

    this.cachedSnapshot = null
  }

  private async loadSnapshot(): Promise<Snapshot> {
    const stat = await this.fileProvider.stat(this.snapshotPath)
    const version = stat?.lastModified.toISOString() ?? 'empty'

    if (this.cachedSnapshot && this.cacheVersion === version) {
      return this.cachedSnapshot
    }

    const content = await this.fileProvider.read(this.snapshotPath)
    const snapshot = content === null || content.trim() === ''
      ? emptySnapshot()
      : parseSnapshot(content)

    this.cachedSnapshot = snapshot
    this.cacheVersion = version

    return snapshot
  }
}
