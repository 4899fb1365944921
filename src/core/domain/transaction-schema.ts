import { z } from 'zod'
import { Amount } from './amount.js'
import { Decimal, isU64 } from '../utils/decimal.js'
import { isHex32 } from '../utils/hex.js'
import { ValidationError } from '../errors/validation-error.js'
import type { SignedTransaction, Transaction } from './transaction.js'

const hex32 = z.string().refine(isHex32, 'must be 64 lowercase hex characters')

// Decimal digits only; JSON numbers past 2^53 have already lost precision
const u64 = z
  .union([
    z.string().regex(/^\d+$/, 'must be a decimal integer'),
    z.number().int().nonnegative().safe(),
    z.bigint().nonnegative()
  ])
  .refine(value => isU64(new Decimal(value.toString())), 'must be an unsigned 64-bit integer')

const amount = u64.transform(value => Amount.of(value))
const seed = u64.transform(value => new Decimal(value.toString()).toFixed(0))
const approvers = z.array(hex32).min(1, 'must name at least one approver')

const transactionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('create-account'),
    name: z.string().refine(name => name.trim() !== '', 'cannot be empty')
  }),
  z.object({
    type: z.literal('issue'),
    amount,
    seed
  }),
  z.object({
    type: z.literal('transfer'),
    to: hex32,
    amount,
    seed
  }),
  z.object({
    type: z.literal('propose-multisig-transfer'),
    from: hex32,
    to: hex32,
    approvers,
    amount,
    seed
  }),
  z.object({
    type: z.literal('accept-multisig-transfer'),
    proposalHash: hex32,
    from: hex32,
    to: hex32,
    approvers,
    seed
  }),
  z.object({
    type: z.literal('reject-multisig-transfer'),
    proposalHash: hex32,
    from: hex32,
    approvers,
    seed
  })
])

const signedTransactionSchema = z.object({
  hash: hex32,
  author: hex32,
  payload: transactionSchema
})

/**
 * JSON-safe form of a signed transaction: amounts and seeds are decimal strings.
 */
export type EncodedSignedTransaction = z.input<typeof signedTransactionSchema>

/**
 * Validate a transaction delivered by the consensus layer.
 * @throws ValidationError naming the first offending field
 */
export function decodeSignedTransaction(input: unknown): SignedTransaction {
  const result = signedTransactionSchema.safeParse(input)

  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue.path.join('.')
    throw new ValidationError(`Invalid transaction ${field}: ${issue.message}`, field)
  }

  return result.data
}

export function encodeSignedTransaction(signed: SignedTransaction): EncodedSignedTransaction {
  return {
    hash: signed.hash,
    author: signed.author,
    payload: encodeTransaction(signed.payload)
  }
}

function encodeTransaction(payload: Transaction): EncodedSignedTransaction['payload'] {
  switch (payload.type) {
    case 'create-account':
      return { type: payload.type, name: payload.name }
    case 'issue':
      return { type: payload.type, amount: payload.amount.toString(), seed: payload.seed }
    case 'transfer':
      return { type: payload.type, to: payload.to, amount: payload.amount.toString(), seed: payload.seed }
    case 'propose-multisig-transfer':
      return {
        type: payload.type,
        from: payload.from,
        to: payload.to,
        approvers: [...payload.approvers],
        amount: payload.amount.toString(),
        seed: payload.seed
      }
    case 'accept-multisig-transfer':
      return {
        type: payload.type,
        proposalHash: payload.proposalHash,
        from: payload.from,
        to: payload.to,
        approvers: [...payload.approvers],
        seed: payload.seed
      }
    case 'reject-multisig-transfer':
      return {
        type: payload.type,
        proposalHash: payload.proposalHash,
        from: payload.from,
        approvers: [...payload.approvers],
        seed: payload.seed
      }
  }
}

/**
 * Serialize a transaction body with keys in sorted order, so equal
 * transactions always produce the same bytes to hash.
 */
export function canonicalTransactionJson(author: string, payload: Transaction): string {
  return JSON.stringify(sortKeys({ author, payload: encodeTransaction(payload) }))
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, sortKeys(entry)])
    )
  }
  return value
}
