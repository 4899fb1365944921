import { z } from 'zod'
import { ValidationError } from './errors/validation-error.js'
import type { SettlementPolicy } from './services/transaction-executor.js'

const configSchema = z.object({
  LEDGER_SETTLEMENT_POLICY: z.enum(['exact', 'residual']).default('exact'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  DATABASE_URL: z.string().url().optional(),
  LEDGER_TABLE_PREFIX: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lowercase SQL identifier prefix')
    .optional(),
  LEDGER_SNAPSHOT_PATH: z.string().min(1).optional()
})

export interface LedgerConfig {
  settlementPolicy: SettlementPolicy
  logLevel: z.infer<typeof configSchema>['LOG_LEVEL']
  databaseUrl?: string
  tablePrefix: string
  snapshotPath?: string
}

/**
 * Read ledger configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  )
  const result = configSchema.safeParse(present)

  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue.path.join('.')
    throw new ValidationError(`Invalid configuration ${field}: ${issue.message}`, field, env[field])
  }

  const parsed = result.data
  return {
    settlementPolicy: parsed.LEDGER_SETTLEMENT_POLICY,
    logLevel: parsed.LOG_LEVEL,
    databaseUrl: parsed.DATABASE_URL,
    tablePrefix: parsed.LEDGER_TABLE_PREFIX ?? '',
    snapshotPath: parsed.LEDGER_SNAPSHOT_PATH
  }
}
