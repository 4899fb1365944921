import { pino, type Logger, type LoggerOptions } from 'pino'

export type { Logger }

/**
 * Structured JSON logger shared by the services. The level defaults to
 * `info`; factories pass the validated `LOG_LEVEL` from `loadConfig`.
 *
 * Usage:
 *   const log = createLogger().child({ module: 'ledger-service' })
 *   log.debug({ transactionHash }, 'Transaction committed')
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: 'info',
    base: { service: 'cosign-ledger' },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options
  })
}

export const logger = createLogger()
