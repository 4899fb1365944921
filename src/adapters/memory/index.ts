import { loadConfig, type LedgerConfig } from '../../core/config.js'
import { LedgerService, type LedgerServiceOptions } from '../../core/services/ledger-service.js'
import { createLogger } from '../../core/utils/logger.js'
import { MemoryLedgerRepository } from './memory-ledger-repository.js'

export { MemoryLedgerRepository } from './memory-ledger-repository.js'

export interface CreateMemoryLedgerServiceOptions extends Omit<LedgerServiceOptions, 'ledgerRepository'> {
  /**
   * Settlement policy and log level; read from the environment when omitted.
   * An explicit `settlementPolicy` or `logger` takes precedence.
   */
  config?: LedgerConfig
}

/**
 * Create a LedgerService whose state lives only in this process.
 *
 * @example
 * ```typescript
 * const ledger = createMemoryLedgerService({ settlementPolicy: 'exact' })
 * const receipt = await ledger.submit(decodeSignedTransaction(message))
 * ```
 */
export function createMemoryLedgerService(options: CreateMemoryLedgerServiceOptions = {}): LedgerService {
  const config = options.config ?? loadConfig()

  return new LedgerService({
    ledgerRepository: new MemoryLedgerRepository(),
    settlementPolicy: options.settlementPolicy ?? config.settlementPolicy,
    hasher: options.hasher,
    logger: options.logger ?? createLogger({ level: config.logLevel })
  })
}
