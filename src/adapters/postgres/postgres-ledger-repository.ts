import type { Pool, PoolClient } from 'pg'
import type { Account } from '../../core/domain/account.js'
import type { Hash, PublicKey } from '../../core/domain/identity.js'
import type { ExecutionReceipt } from '../../core/domain/receipt.js'
import type { HistoryEntry } from '../../core/ports/account-store.js'
import type { Commit, HeadInfo, LedgerRepository } from '../../core/ports/ledger-repository.js'
import {
  mapRowToAccount,
  mapAccountToParams,
  mapPendingTransferToParams,
  type AccountRow,
  type PendingTransferRow
} from './mappers/account-mapper.js'
import { mapRowToReceipt, mapReceiptToParams, type ReceiptRow } from './mappers/receipt-mapper.js'
import { type TableNames, createTableNames, type TableConfigOptions } from './table-config.js'

export interface PostgresLedgerRepositoryOptions {
  pool: Pool
  /**
   * Table configuration - use prefix or custom table names
   */
  tables?: TableConfigOptions
}

export class PostgresLedgerRepository implements LedgerRepository {
  private readonly pool: Pool
  private readonly tables: TableNames

  constructor(options: PostgresLedgerRepositoryOptions) {
    this.pool = options.pool
    this.tables = createTableNames(options.tables)
  }

  async getHead(): Promise<HeadInfo> {
    const result = await this.pool.query<{ version: string; last_modified: Date | null }>(`
      SELECT COUNT(*) as version, MAX(created_at) as last_modified
      FROM ${this.tables.receipts}
    `)

    return {
      version: result.rows[0]?.version?.toString() ?? '0',
      lastModified: result.rows[0]?.last_modified ?? undefined
    }
  }

  async getAccount(id: PublicKey): Promise<Account | null> {
    const [account] = await this.getAccounts([id])
    return account ?? null
  }

  async getAccounts(ids: PublicKey[]): Promise<Account[]> {
    if (ids.length === 0) {
      return []
    }

    const result = await this.pool.query<AccountRow>(`
      SELECT id, name, balance, pending_balance, history_length, history_digest
      FROM ${this.tables.accounts}
      WHERE id = ANY($1)
      ORDER BY id
    `, [ids])

    return this.withPendingTransfers(result.rows)
  }

  async listAccounts(): Promise<Account[]> {
    const result = await this.pool.query<AccountRow>(`
      SELECT id, name, balance, pending_balance, history_length, history_digest
      FROM ${this.tables.accounts}
      ORDER BY id
    `)

    return this.withPendingTransfers(result.rows)
  }

  async getHistory(id: PublicKey): Promise<Hash[]> {
    const result = await this.pool.query<{ cause_hash: string }>(`
      SELECT cause_hash FROM ${this.tables.accountHistory}
      WHERE account_id = $1
      ORDER BY seq
    `, [id])

    return result.rows.map(row => row.cause_hash)
  }

  async getReceipt(transactionHash: Hash): Promise<ExecutionReceipt | null> {
    const result = await this.pool.query<ReceiptRow>(`
      SELECT transaction_hash, author, type, status, error_kind, error_code, error_description
      FROM ${this.tables.receipts}
      WHERE transaction_hash = $1
    `, [transactionHash])

    if (result.rows.length === 0) {
      return null
    }

    return mapRowToReceipt(result.rows[0])
  }

  async commit(commit: Commit): Promise<void> {
    const client = await this.pool.connect()

    try {
      await client.query('BEGIN')

      for (const account of commit.changes.accounts) {
        await this.upsertAccount(client, account)
      }

      await this.insertHistory(client, commit.changes.accounts, commit.changes.history)
      await this.insertReceipt(client, commit.receipt)

      await client.query('COMMIT')
    } catch (e) {
      await client.query('ROLLBACK')
      throw e
    } finally {
      client.release()
    }
  }

  private async upsertAccount(client: PoolClient, account: Account): Promise<void> {
    const params = mapAccountToParams(account)

    await client.query(`
      INSERT INTO ${this.tables.accounts} (id, name, balance, pending_balance, history_length, history_digest)
      VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT (id) DO UPDATE SET
        balance = EXCLUDED.balance,
        pending_balance = EXCLUDED.pending_balance,
        history_length = EXCLUDED.history_length,
        history_digest = EXCLUDED.history_digest
    `, [params.id, params.name, params.balance, params.pending_balance, params.history_length, params.history_digest])

    await client.query(`
      DELETE FROM ${this.tables.pendingTransfers} WHERE account_id = $1
    `, [account.id])

    for (const [position, transfer] of account.pendingTransfers.entries()) {
      const row = mapPendingTransferToParams(transfer, account.id, position)
      await client.query(`
        INSERT INTO ${this.tables.pendingTransfers} (proposal_hash, account_id, to_account, amount, approvers, position)
        VALUES ($1, $2, $3, $4, $5, $6)
      `, [row.proposal_hash, row.account_id, row.to_account, row.amount, row.approvers, row.position])
    }
  }

  /**
   * History rows are numbered from 1; an account's final history length in
   * this commit is the sequence number of its last new entry.
   */
  private async insertHistory(
    client: PoolClient,
    accounts: Account[],
    history: HistoryEntry[]
  ): Promise<void> {
    const finalLength = new Map(accounts.map((a): [string, number] => [a.id, a.historyLength]))
    const remaining = new Map<string, number>()
    for (const entry of history) {
      remaining.set(entry.accountId, (remaining.get(entry.accountId) ?? 0) + 1)
    }

    for (const entry of history) {
      const left = remaining.get(entry.accountId) ?? 0
      const seq = (finalLength.get(entry.accountId) ?? 0) - left + 1
      remaining.set(entry.accountId, left - 1)

      await client.query(`
        INSERT INTO ${this.tables.accountHistory} (account_id, seq, cause_hash)
        VALUES ($1, $2, $3)
      `, [entry.accountId, seq, entry.causeHash])
    }
  }

  private async insertReceipt(client: PoolClient, receipt: ExecutionReceipt): Promise<void> {
    const row = mapReceiptToParams(receipt)

    await client.query(`
      INSERT INTO ${this.tables.receipts}
        (transaction_hash, author, type, status, error_kind, error_code, error_description)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
    `, [
      row.transaction_hash,
      row.author,
      row.type,
      row.status,
      row.error_kind,
      row.error_code,
      row.error_description
    ])
  }

  private async withPendingTransfers(rows: AccountRow[]): Promise<Account[]> {
    if (rows.length === 0) {
      return []
    }

    const result = await this.pool.query<PendingTransferRow>(`
      SELECT proposal_hash, account_id, to_account, amount, approvers, position
      FROM ${this.tables.pendingTransfers}
      WHERE account_id = ANY($1)
      ORDER BY account_id, position
    `, [rows.map(row => row.id)])

    return rows.map(row => mapRowToAccount(
      row,
      result.rows.filter(p => p.account_id === row.id)
    ))
  }
}
