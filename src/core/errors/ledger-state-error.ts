import type { PublicKey } from '../domain/identity.js'

/**
 * The ledger was asked to do something its caller should have ruled out,
 * e.g. debiting past the available balance. Always a bug in the caller.
 */
export class LedgerStateError extends Error {
  constructor(
    message: string,
    public readonly accountId: PublicKey
  ) {
    super(message)
    this.name = 'LedgerStateError'
  }
}
