import pg, { type Pool } from 'pg'
import { loadConfig, type LedgerConfig } from '../../core/config.js'
import { ValidationError } from '../../core/errors/validation-error.js'
import { LedgerService } from '../../core/services/ledger-service.js'
import { createLogger } from '../../core/utils/logger.js'
import { PostgresLedgerRepository } from './postgres-ledger-repository.js'
import { createTableNames, generateSchema, type TableConfigOptions } from './table-config.js'

export { PostgresLedgerRepository, type PostgresLedgerRepositoryOptions } from './postgres-ledger-repository.js'
export {
  createTableNames,
  generateSchema,
  type TableNames,
  type TableConfigOptions
} from './table-config.js'
export * from './mappers/account-mapper.js'
export * from './mappers/receipt-mapper.js'

export interface CreatePostgresLedgerServiceOptions {
  /**
   * Connection pool; one is opened from DATABASE_URL when omitted
   */
  pool?: Pool

  /**
   * Table names; defaults to LEDGER_TABLE_PREFIX from the config
   */
  tables?: TableConfigOptions

  /**
   * Settlement policy, log level and table prefix; read from the environment when omitted
   */
  config?: LedgerConfig
}

export function createPostgresLedgerService(options: CreatePostgresLedgerServiceOptions = {}): LedgerService {
  const config = options.config ?? loadConfig()

  const ledgerRepository = new PostgresLedgerRepository({
    pool: options.pool ?? createPool(config),
    tables: options.tables ?? { prefix: config.tablePrefix }
  })

  return new LedgerService({
    ledgerRepository,
    settlementPolicy: config.settlementPolicy,
    logger: createLogger({ level: config.logLevel })
  })
}

function createPool(config: LedgerConfig): Pool {
  if (!config.databaseUrl) {
    throw new ValidationError('A pool or DATABASE_URL is required', 'databaseUrl')
  }
  return new pg.Pool({ connectionString: config.databaseUrl })
}

const CURRENT_SCHEMA_VERSION = 1

export async function runMigrations(pool: Pool, tableOptions?: TableConfigOptions): Promise<void> {
  const tables = createTableNames(tableOptions)
  const client = await pool.connect()

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${tables.schemaMigrations} (
        version INTEGER PRIMARY KEY,
        applied_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
      )
    `)

    const result = await client.query<{ version: number }>(`
      SELECT COALESCE(MAX(version), 0) as version FROM ${tables.schemaMigrations}
    `)

    const currentVersion = result.rows[0]?.version ?? 0

    if (currentVersion < CURRENT_SCHEMA_VERSION) {
      await client.query('BEGIN')
      try {
        await client.query(generateSchema(tables))
        await client.query(
          `INSERT INTO ${tables.schemaMigrations} (version) VALUES ($1) ON CONFLICT DO NOTHING`,
          [CURRENT_SCHEMA_VERSION]
        )
        await client.query('COMMIT')
      } catch (e) {
        await client.query('ROLLBACK')
        throw e
      }
    }
  } finally {
    client.release()
  }
}
