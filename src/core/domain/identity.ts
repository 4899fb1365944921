/**
 * 32-byte public key of an account holder, as 64 lowercase hex characters.
 * Authenticated by the signing layer before it reaches the ledger.
 */
export type PublicKey = string

/**
 * 32-byte transaction or digest hash, as 64 lowercase hex characters.
 */
export type Hash = string
