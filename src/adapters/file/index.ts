import { loadConfig, type LedgerConfig } from '../../core/config.js'
import { LedgerService } from '../../core/services/ledger-service.js'
import { createLogger } from '../../core/utils/logger.js'
import { ValidationError } from '../../core/errors/validation-error.js'
import { FileLedgerRepository } from './file-ledger-repository.js'
import { type FileProvider, NodeFileProvider } from './file-provider.js'

export { FileLedgerRepository, type FileLedgerRepositoryOptions } from './file-ledger-repository.js'
export { type FileProvider, NodeFileProvider, InMemoryFileProvider } from './file-provider.js'
export {
  SNAPSHOT_FORMAT,
  parseSnapshot,
  serializeSnapshot,
  emptySnapshot,
  type Snapshot,
  type SnapshotRecord,
  type AccountRecord
} from './snapshot.js'

export interface CreateFileLedgerServiceOptions {
  /**
   * Path to the snapshot file. Defaults to LEDGER_SNAPSHOT_PATH.
   */
  snapshotPath?: string

  /**
   * Custom file provider; NodeFileProvider by default
   */
  fileProvider?: FileProvider

  /**
   * Settlement policy and log level; read from the environment when omitted
   */
  config?: LedgerConfig
}

/**
 * Create a LedgerService backed by a JSON snapshot file.
 *
 * @example
 * ```typescript
 * const ledger = createFileLedgerService({
 *   snapshotPath: './data/ledger.json'
 * })
 * ```
 */
export function createFileLedgerService(options: CreateFileLedgerServiceOptions = {}): LedgerService {
  const config = options.config ?? loadConfig()
  const snapshotPath = options.snapshotPath ?? config.snapshotPath

  if (!snapshotPath) {
    throw new ValidationError('A snapshot path is required (option or LEDGER_SNAPSHOT_PATH)', 'snapshotPath')
  }

  const ledgerRepository = new FileLedgerRepository({
    snapshotPath,
    fileProvider: options.fileProvider ?? new NodeFileProvider()
  })

  return new LedgerService({
    ledgerRepository,
    settlementPolicy: config.settlementPolicy,
    logger: createLogger({ level: config.logLevel })
  })
}
