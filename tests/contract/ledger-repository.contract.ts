import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { LedgerRepository } from '../../src/core/ports/ledger-repository.js'
import type { ExecutionReceipt } from '../../src/core/domain/receipt.js'
import { AccountBuilder } from '../../src/testing/builders/account-builder.js'
import { testKey } from '../../src/testing/keys.js'

const hash = (n: number) => n.toString(16).padStart(64, '0')

const receipt = (n: number): ExecutionReceipt => ({
  transactionHash: hash(n),
  author: testKey('alice'),
  type: 'issue',
  status: 'success'
})

export function createLedgerRepositoryContractTests(
  name: string,
  getRepository: () => Promise<LedgerRepository>,
  cleanup?: () => Promise<void>
) {
  describe(`LedgerRepository Contract: ${name}`, () => {
    let repo: LedgerRepository

    const alice = new AccountBuilder('alice').withBalance(100).withHistory(1, hash(901)).build()
    const bob = new AccountBuilder('bob').withHistory(0, hash(902)).build()

    beforeEach(async () => {
      repo = await getRepository()
    })

    if (cleanup) {
      afterEach(async () => {
        await cleanup()
      })
    }

    describe('getHead', () => {
      it('should start at version 0', async () => {
        const head = await repo.getHead()
        expect(head.version).toBe('0')
      })

      it('should advance with every commit', async () => {
        await repo.commit({ changes: { accounts: [alice], history: [] }, receipt: receipt(1) })
        await repo.commit({ changes: { accounts: [], history: [] }, receipt: receipt(2) })

        const head = await repo.getHead()
        expect(head.version).toBe('2')
      })
    })

    describe('commit', () => {
      it('should store accounts', async () => {
        await repo.commit({
          changes: {
            accounts: [alice, bob],
            history: [{ accountId: alice.id, causeHash: hash(1) }]
          },
          receipt: receipt(1)
        })

        const stored = await repo.getAccount(alice.id)
        expect(stored?.name).toBe('alice')
        expect(stored?.balance.toString()).toBe('100')
        expect(stored?.historyLength).toBe(1)
        expect(stored?.historyDigest).toBe(hash(901))
      })

      it('should replace accounts on later commits', async () => {
        await repo.commit({ changes: { accounts: [alice], history: [] }, receipt: receipt(1) })

        const updated = new AccountBuilder('alice').withBalance(40).withHistory(2, hash(903)).build()
        await repo.commit({ changes: { accounts: [updated], history: [] }, receipt: receipt(2) })

        const stored = await repo.getAccount(alice.id)
        expect(stored?.balance.toString()).toBe('40')
        expect(stored?.historyDigest).toBe(hash(903))
      })

      it('should store pending transfers in order', async () => {
        const proposer = new AccountBuilder('alice')
          .withBalance(100)
          .withPendingTransfer({ hash: hash(11), to: bob.id, amount: 30, approvers: [testKey('carol')] })
          .withPendingTransfer({ hash: hash(10), to: bob.id, amount: 20, approvers: [testKey('carol'), testKey('dave')] })
          .withHistory(2, hash(904))
          .build()

        await repo.commit({ changes: { accounts: [proposer, bob], history: [] }, receipt: receipt(1) })

        const stored = await repo.getAccount(alice.id)
        expect(stored?.pendingBalance.toString()).toBe('50')
        expect(stored?.pendingTransferHashes).toEqual([hash(11), hash(10)])
        expect(stored?.findPendingTransfer(hash(10))?.approvers).toEqual([testKey('carol'), testKey('dave')])
        expect(stored?.findPendingTransfer(hash(11))?.amount.toString()).toBe('30')
      })

      it('should drop pending transfers removed in a later commit', async () => {
        const proposer = new AccountBuilder('alice')
          .withBalance(100)
          .withPendingTransfer({ hash: hash(11), to: bob.id, amount: 30, approvers: [bob.id] })
          .withHistory(1, hash(904))
          .build()
        await repo.commit({ changes: { accounts: [proposer, bob], history: [] }, receipt: receipt(1) })

        await repo.commit({ changes: { accounts: [alice], history: [] }, receipt: receipt(2) })

        const stored = await repo.getAccount(alice.id)
        expect(stored?.pendingTransfers).toEqual([])
      })

      it('should append history in order', async () => {
        await repo.commit({
          changes: {
            accounts: [alice],
            history: [{ accountId: alice.id, causeHash: hash(1) }]
          },
          receipt: receipt(1)
        })
        const later = new AccountBuilder('alice').withBalance(100).withHistory(3, hash(905)).build()
        await repo.commit({
          changes: {
            accounts: [later],
            history: [
              { accountId: alice.id, causeHash: hash(2) },
              { accountId: alice.id, causeHash: hash(2) }
            ]
          },
          receipt: receipt(2)
        })

        expect(await repo.getHistory(alice.id)).toEqual([hash(1), hash(2), hash(2)])
        expect(await repo.getHistory(bob.id)).toEqual([])
      })

      it('should store failure receipts', async () => {
        const failure: ExecutionReceipt = {
          transactionHash: hash(1),
          author: testKey('alice'),
          type: 'transfer',
          status: 'failure',
          error: { kind: 'InsufficientFunds', code: 3, description: 'Insufficient currency amount' }
        }

        await repo.commit({ changes: { accounts: [], history: [] }, receipt: failure })

        expect(await repo.getReceipt(hash(1))).toEqual(failure)
      })

      it('should refuse a second commit for the same transaction', async () => {
        await repo.commit({ changes: { accounts: [alice], history: [] }, receipt: receipt(1) })

        await expect(
          repo.commit({ changes: { accounts: [bob], history: [] }, receipt: receipt(1) })
        ).rejects.toThrow()

        expect(await repo.getAccount(bob.id)).toBeNull()
      })
    })

    describe('queries', () => {
      beforeEach(async () => {
        await repo.commit({ changes: { accounts: [bob, alice], history: [] }, receipt: receipt(1) })
      })

      it('should return null for unknown accounts and receipts', async () => {
        expect(await repo.getAccount(testKey('nobody'))).toBeNull()
        expect(await repo.getReceipt(hash(99))).toBeNull()
      })

      it('should fetch only existing accounts', async () => {
        const accounts = await repo.getAccounts([alice.id, testKey('nobody')])
        expect(accounts.map(a => a.id)).toEqual([alice.id])
      })

      it('should list accounts ordered by key', async () => {
        const ids = (await repo.listAccounts()).map(a => a.id)
        expect(ids).toEqual([alice.id, bob.id].sort())
      })
    })
  })
}
