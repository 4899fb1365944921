export interface TableNames {
  accounts: string
  pendingTransfers: string
  accountHistory: string
  receipts: string
  schemaMigrations: string
}

export interface TableConfigOptions {
  /**
   * Prefix for all table names (e.g., 'ledger_' -> 'ledger_accounts')
   */
  prefix?: string

  /**
   * Custom table names (overrides prefix for specific tables)
   */
  tables?: Partial<TableNames>
}

const DEFAULT_TABLES: TableNames = {
  accounts: 'accounts',
  pendingTransfers: 'pending_transfers',
  accountHistory: 'account_history',
  receipts: 'receipts',
  schemaMigrations: 'schema_migrations'
}

export function createTableNames(options: TableConfigOptions = {}): TableNames {
  const prefix = options.prefix ?? ''

  return {
    accounts: options.tables?.accounts ?? `${prefix}${DEFAULT_TABLES.accounts}`,
    pendingTransfers: options.tables?.pendingTransfers ?? `${prefix}${DEFAULT_TABLES.pendingTransfers}`,
    accountHistory: options.tables?.accountHistory ?? `${prefix}${DEFAULT_TABLES.accountHistory}`,
    receipts: options.tables?.receipts ?? `${prefix}${DEFAULT_TABLES.receipts}`,
    schemaMigrations: options.tables?.schemaMigrations ?? `${prefix}${DEFAULT_TABLES.schemaMigrations}`
  }
}

/**
 * Generate the SQL schema for the ledger tables.
 * Use this to integrate into your own migration system.
 */
export function generateSchema(tables: TableNames): string {
  return `
-- Ledger schema
-- Amounts are unsigned 64-bit integers stored as NUMERIC(20, 0)

CREATE TABLE IF NOT EXISTS ${tables.accounts} (
    id CHAR(64) PRIMARY KEY,
    name VARCHAR(255) NOT NULL,
    balance NUMERIC(20, 0) NOT NULL DEFAULT 0 CHECK (balance >= 0),
    pending_balance NUMERIC(20, 0) NOT NULL DEFAULT 0 CHECK (pending_balance >= 0),
    history_length BIGINT NOT NULL DEFAULT 0,
    history_digest CHAR(64) NOT NULL,
    created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP,
    CHECK (pending_balance <= balance)
);

CREATE TABLE IF NOT EXISTS ${tables.pendingTransfers} (
    proposal_hash CHAR(64) PRIMARY KEY,
    account_id CHAR(64) NOT NULL REFERENCES ${tables.accounts}(id),
    to_account CHAR(64) NOT NULL,
    amount NUMERIC(20, 0) NOT NULL,
    approvers JSONB NOT NULL,
    position INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_${tables.pendingTransfers}_account_id ON ${tables.pendingTransfers}(account_id);

CREATE TABLE IF NOT EXISTS ${tables.accountHistory} (
    account_id CHAR(64) NOT NULL REFERENCES ${tables.accounts}(id),
    seq BIGINT NOT NULL,
    cause_hash CHAR(64) NOT NULL,
    PRIMARY KEY (account_id, seq)
);

CREATE TABLE IF NOT EXISTS ${tables.receipts} (
    transaction_hash CHAR(64) PRIMARY KEY,
    author CHAR(64) NOT NULL,
    type VARCHAR(32) NOT NULL,
    status VARCHAR(16) NOT NULL CHECK (status IN ('success', 'failure')),
    error_kind VARCHAR(32),
    error_code INTEGER,
    error_description TEXT,
    created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
);
`.trim()
}
