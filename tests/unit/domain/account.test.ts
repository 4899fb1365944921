import { describe, it, expect } from 'vitest'
import { Account } from '../../../src/core/domain/account.js'
import { Amount } from '../../../src/core/domain/amount.js'
import { PendingTransfer } from '../../../src/core/domain/pending-transfer.js'
import { ValidationError } from '../../../src/core/errors/validation-error.js'
import { ZERO_HASH } from '../../../src/core/utils/hex.js'
import { testKey } from '../../../src/testing/keys.js'

describe('Account', () => {
  const alice = testKey('alice')
  const bob = testKey('bob')
  const digest = 'a'.repeat(64)

  const proposal = (hash: string, amount: number) =>
    new PendingTransfer({ hash, to: bob, amount: Amount.of(amount), approvers: [alice] })

  it('should create an empty account', () => {
    const account = new Account({ id: alice, name: 'alice', historyDigest: ZERO_HASH })

    expect(account.name).toBe('alice')
    expect(account.balance.isZero()).toBe(true)
    expect(account.pendingBalance.isZero()).toBe(true)
    expect(account.pendingTransfers).toHaveLength(0)
    expect(account.historyLength).toBe(0)
  })

  it('should throw on empty name', () => {
    expect(() => new Account({ id: alice, name: '', historyDigest: ZERO_HASH })).toThrow('Account name cannot be empty')
    expect(() => new Account({ id: alice, name: '  ', historyDigest: ZERO_HASH })).toThrow(ValidationError)
  })

  it('should reject a pending balance above the balance', () => {
    expect(() => new Account({
      id: alice,
      name: 'alice',
      balance: Amount.of(10),
      pendingBalance: Amount.of(11),
      historyDigest: ZERO_HASH
    })).toThrow(ValidationError)
  })

  it('should reject duplicate pending transfers', () => {
    expect(() => new Account({
      id: alice,
      name: 'alice',
      balance: Amount.of(100),
      pendingBalance: Amount.of(20),
      pendingTransfers: [proposal('1'.repeat(64), 10), proposal('1'.repeat(64), 10)],
      historyDigest: ZERO_HASH
    })).toThrow('Duplicate pending transfer')
  })

  it('should compute available balance', () => {
    const account = new Account({
      id: alice,
      name: 'alice',
      balance: Amount.of(100),
      pendingBalance: Amount.of(40),
      pendingTransfers: [proposal('1'.repeat(64), 40)],
      historyDigest: ZERO_HASH
    })

    expect(account.availableBalance.toString()).toBe('60')
    expect(account.pendingTransferHashes).toEqual(['1'.repeat(64)])
    expect(account.hasPendingTransfer('1'.repeat(64))).toBe(true)
    expect(account.hasPendingTransfer('2'.repeat(64))).toBe(false)
  })

  it('should return a new record with advanced history on balance change', () => {
    const account = new Account({ id: alice, name: 'alice', historyDigest: ZERO_HASH })
    const updated = account.withBalance(Amount.of(50), digest)

    expect(updated).not.toBe(account)
    expect(updated.balance.toString()).toBe('50')
    expect(updated.historyLength).toBe(1)
    expect(updated.historyDigest).toBe(digest)
    expect(account.balance.isZero()).toBe(true)
    expect(account.historyLength).toBe(0)
  })

  it('should add and remove pending transfers', () => {
    const account = new Account({
      id: alice,
      name: 'alice',
      balance: Amount.of(100),
      historyDigest: ZERO_HASH
    })

    const reserved = account.withPendingTransfer(proposal('1'.repeat(64), 30), digest)
    expect(reserved.pendingBalance.toString()).toBe('30')
    expect(reserved.historyLength).toBe(1)

    const released = reserved.withoutPendingTransfer('1'.repeat(64), false, digest)
    expect(released.pendingBalance.toString()).toBe('0')
    expect(released.pendingTransfers).toHaveLength(0)
    expect(released.historyLength).toBe(2)

    const kept = reserved.withoutPendingTransfer('1'.repeat(64), true, digest)
    expect(kept.pendingBalance.toString()).toBe('30')
    expect(kept.pendingTransfers).toHaveLength(0)
  })

  it('should compare by id', () => {
    const a = new Account({ id: alice, name: 'alice', historyDigest: ZERO_HASH })
    const b = new Account({ id: alice, name: 'renamed', historyDigest: digest })
    const c = new Account({ id: bob, name: 'alice', historyDigest: ZERO_HASH })

    expect(a.equals(b)).toBe(true)
    expect(a.equals(c)).toBe(false)
  })
})
