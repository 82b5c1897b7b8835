/**
 * Wallet core entry point
 *
 * {@link createWallet} wires the secret store, key custodian, Esplora client,
 * UTXO cache and wallet engine from a {@link WalletConfig}.
 */

import { loadConfig, type WalletConfig } from './config'
import { createEsploraClient, type BlockchainProvider } from './infrastructure/api/esploraClient'
import { UtxoCache } from './infrastructure/api/utxoCache'
import { KeyCustodian } from './services/keyCustodian'
import { logger, type LogEntry } from './services/logger'
import {
  EncryptedSecretStore,
  FileStorageBackend,
  MemoryStorageBackend,
  type StorageBackend
} from './services/secureStorage'
import { WalletEngine } from './services/wallet'

export interface Wallet {
  custodian: KeyCustodian
  engine: WalletEngine
  provider: BlockchainProvider
  /** Load the key and start tracking the balance */
  start(): Promise<void>
  stop(): void
  /** Entries retained under `logBufferSize`, oldest first */
  getLogEntries(): LogEntry[]
  /** Retained entries as pretty-printed JSON */
  exportLogs(): string
}

export interface CreateWalletOverrides {
  provider?: BlockchainProvider
  backend?: StorageBackend
  fetchImpl?: typeof fetch
}

export function createWallet(config: WalletConfig, overrides: CreateWalletOverrides = {}): Wallet {
  logger.configure({ minLevel: config.logLevel, bufferSize: config.logBufferSize })

  const backend = overrides.backend ??
    (config.storagePath ? new FileStorageBackend(config.storagePath) : new MemoryStorageBackend())
  const secretStore = new EncryptedSecretStore(backend, config.secretPassphrase)
  const custodian = new KeyCustodian({ secretStore })

  const provider = overrides.provider ?? createEsploraClient({
    baseUrl: config.esploraUrl,
    timeout: config.httpTimeoutMs,
    fetchImpl: overrides.fetchImpl
  })
  const cache = new UtxoCache(provider)
  const engine = new WalletEngine({ custodian, cache, provider })

  return {
    custodian,
    engine,
    provider,
    async start() {
      engine.start()
      await custodian.initialize()
    },
    stop() {
      engine.stop()
    },
    getLogEntries() {
      return logger.getEntries()
    },
    exportLogs() {
      return logger.exportEntries()
    }
  }
}

export { loadConfig }
export type { WalletConfig }
export type { LogEntry, LogLevel } from './services/logger'
export * from './domain'
export * from './services/errors'
export { EncryptedSecretStore, FileStorageBackend, MemoryStorageBackend } from './services/secureStorage'
export type { SecretStore, StorageBackend } from './services/secureStorage'
export { KeyCustodian } from './services/keyCustodian'
export { WalletEngine } from './services/wallet'
export { createEsploraClient } from './infrastructure/api/esploraClient'
export type { BlockchainProvider } from './infrastructure/api/esploraClient'
export { UtxoCache } from './infrastructure/api/utxoCache'
export { btcToSatoshis, formatBtc, parseBtc, satoshisToBtc, SATS_PER_BTC } from './utils/satoshiConversion'
