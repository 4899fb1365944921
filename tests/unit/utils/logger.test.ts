import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger } from '../../../src/core/utils/logger.js'
import { loadConfig } from '../../../src/core/config.js'
import { ValidationError } from '../../../src/core/errors/validation-error.js'

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('should default to info regardless of LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose')

    expect(createLogger().level).toBe('info')
  })

  it('should take the level from its options', () => {
    expect(createLogger({ level: 'debug' }).level).toBe('debug')
  })

  it('should tag entries with the service name', () => {
    expect(createLogger().bindings()).toEqual({ service: 'cosign-ledger' })
  })

  it('should leave level validation to the config', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ValidationError)
  })
})
