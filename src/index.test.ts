import { describe, it, expect, vi, afterEach } from 'vitest'
import { createWallet, loadConfig, MemoryStorageBackend } from './index'
import { FakeBlockchainProvider } from './test/fakes'
import { createMockUtxo } from './test/factories'

describe('createWallet', () => {
  const config = loadConfig({ WALLET_SECRET_PASSPHRASE: 'test-secret', WALLET_LOG_LEVEL: 'error' })
  let stop: (() => void) | undefined

  afterEach(() => {
    stop?.()
    stop = undefined
  })

  it('should create a key, persist it encrypted and track the balance', async () => {
    const provider = new FakeBlockchainProvider()
    provider.utxos = [createMockUtxo({ value: 42000 })]
    const backend = new MemoryStorageBackend()

    const wallet = createWallet(config, { provider, backend })
    stop = wallet.stop
    await wallet.start()

    const address = wallet.engine.getAddress()
    expect(address).not.toBeNull()
    expect(address?.startsWith('tb1q')).toBe(true)
    expect(await backend.getItem('seed_mnemonic')).not.toBeNull()
    expect(await backend.getItem('seed_mnemonic_iv')).not.toBeNull()
    await vi.waitFor(() => expect(wallet.engine.balance).toBe(42000))
  })

  it('should reload the same key from the same backend', async () => {
    const backend = new MemoryStorageBackend()

    const first = createWallet(config, { provider: new FakeBlockchainProvider(), backend })
    await first.start()
    first.stop()

    const second = createWallet(config, { provider: new FakeBlockchainProvider(), backend })
    stop = second.stop
    await second.start()

    expect(second.engine.getAddress()).toBe(first.engine.getAddress())
  })

  it('should report a wrong passphrase as a key error', async () => {
    const backend = new MemoryStorageBackend()
    const first = createWallet(config, { provider: new FakeBlockchainProvider(), backend })
    await first.start()
    first.stop()

    const second = createWallet({ ...config, secretPassphrase: 'other-secret' }, { provider: new FakeBlockchainProvider(), backend })
    stop = second.stop
    await second.start()

    expect(second.custodian.state.status).toBe('error')
    expect(second.engine.getAddress()).toBeNull()
  })

  it('should retain log entries for export when a buffer is configured', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    const wallet = createWallet(
      { ...config, logLevel: 'info', logBufferSize: 50 },
      { provider: new FakeBlockchainProvider(), backend: new MemoryStorageBackend() }
    )
    stop = wallet.stop
    await wallet.start()

    const messages = wallet.getLogEntries().map(entry => entry.message)
    expect(messages).toContain('Spending key ready')
    expect(JSON.parse(wallet.exportLogs())).toHaveLength(messages.length)
    vi.restoreAllMocks()
  })
})
