import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { FileLedgerRepository } from '../../src/adapters/file/file-ledger-repository.js'
import { InMemoryFileProvider } from '../../src/adapters/file/file-provider.js'
import { createFileLedgerService } from '../../src/adapters/file/index.js'
import type { LedgerConfig } from '../../src/core/config.js'
import { ValidationError } from '../../src/core/errors/validation-error.js'
import { AccountBuilder } from '../../src/testing/builders/account-builder.js'
import { TransactionBuilder } from '../../src/testing/builders/transaction-builder.js'
import { testKey } from '../../src/testing/keys.js'
import { createLedgerRepositoryContractTests } from '../contract/ledger-repository.contract.js'

const config: LedgerConfig = {
  settlementPolicy: 'exact',
  logLevel: 'silent',
  tablePrefix: ''
}

describe('FileLedgerRepository', () => {
  describe('in memory', () => {
    createLedgerRepositoryContractTests(
      'FileLedgerRepository (InMemoryFileProvider)',
      async () => new FileLedgerRepository({
        snapshotPath: '/ledger.json',
        fileProvider: new InMemoryFileProvider()
      })
    )
  })

  describe('on disk', () => {
    let tempDir: string
    let snapshotPath: string

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cosign-ledger-test-'))
      snapshotPath = path.join(tempDir, 'data', 'ledger.json')
    })

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true })
    })

    createLedgerRepositoryContractTests(
      'FileLedgerRepository (NodeFileProvider)',
      async () => new FileLedgerRepository({ snapshotPath })
    )

    it('should persist state for a new instance', async () => {
      const alice = new AccountBuilder('alice').withBalance(100).withHistory(1, 'a'.repeat(64)).build()
      const writer = new FileLedgerRepository({ snapshotPath })
      await writer.commit({
        changes: { accounts: [alice], history: [{ accountId: alice.id, causeHash: 'b'.repeat(64) }] },
        receipt: { transactionHash: 'b'.repeat(64), author: alice.id, type: 'issue', status: 'success' }
      })

      const reader = new FileLedgerRepository({ snapshotPath })

      expect((await reader.getAccount(alice.id))?.balance.toString()).toBe('100')
      expect(await reader.getHistory(alice.id)).toEqual(['b'.repeat(64)])
      expect((await reader.getHead()).version).toBe('1')
    })

    it('should write a readable snapshot', async () => {
      const alice = new AccountBuilder('alice').withBalance(100).withHistory(1, 'a'.repeat(64)).build()
      await new FileLedgerRepository({ snapshotPath }).commit({
        changes: { accounts: [alice], history: [] },
        receipt: { transactionHash: 'b'.repeat(64), author: alice.id, type: 'issue', status: 'success' }
      })

      const content = await fs.readFile(snapshotPath, 'utf-8')
      const json: unknown = JSON.parse(content)

      expect(content.endsWith('\n')).toBe(true)
      expect(json).toMatchObject({
        format: 1,
        commits: 1,
        accounts: [{ id: alice.id, name: 'alice', balance: '100', pendingBalance: '0', pendingTransfers: [] }]
      })
    })

    it('should reject a corrupt snapshot', async () => {
      await fs.mkdir(path.dirname(snapshotPath), { recursive: true })
      await fs.writeFile(snapshotPath, '{"format": 2}')

      await expect(new FileLedgerRepository({ snapshotPath }).getHead()).rejects.toThrow(ValidationError)
    })

    it('should treat an empty file as an empty ledger', async () => {
      await fs.mkdir(path.dirname(snapshotPath), { recursive: true })
      await fs.writeFile(snapshotPath, '')

      expect(await new FileLedgerRepository({ snapshotPath }).listAccounts()).toEqual([])
    })
  })
})

describe('createFileLedgerService', () => {
  it('should run transactions against the snapshot', async () => {
    const alice = testKey('alice')
    const fileProvider = new InMemoryFileProvider()
    const service = createFileLedgerService({ snapshotPath: '/ledger.json', fileProvider, config })

    await service.submitAll([
      TransactionBuilder.by(alice).createAccount('alice'),
      TransactionBuilder.by(alice).issue(25)
    ])

    expect((await service.getAccount(alice))?.balance.toString()).toBe('25')
    expect(await fileProvider.read('/ledger.json')).toContain('"commits": 2')
  })

  it('should take the path from the config', async () => {
    const fileProvider = new InMemoryFileProvider()
    const service = createFileLedgerService({
      fileProvider,
      config: { ...config, snapshotPath: '/from-config.json' }
    })

    await service.submit(TransactionBuilder.by(testKey('alice')).createAccount('alice'))

    expect(await fileProvider.stat('/from-config.json')).not.toBeNull()
  })

  it('should require a snapshot path', () => {
    expect(() => createFileLedgerService({ config })).toThrow(ValidationError)
  })
})
