/**
 * Key Custodian
 *
 * Owns the wallet's single spending key. On initialization the seed phrase
 * is read from the secret store, or created and stored when none exists,
 * and the key is derived from it.
 *
 * State transitions:
 *
 *   unknown ──initialize()──▶ present(key)
 *      │
 *      └──────────────────────▶ error(cause) ──initialize()──▶ …
 *
 * `present` is terminal for the session. `error` is only left through an
 * explicit call to `initialize()`; nothing retries automatically.
 *
 * @module services/keyCustodian
 */

import { createStore, type StoreApi } from 'zustand/vanilla'
import { STORAGE } from '../config'
import type { KeyState, SpendingKey } from '../domain/types'
import { deriveKey } from '../domain/wallet/keyDerivation'
import { entropyToMnemonic, generateEntropy, mnemonicToSeed } from '../domain/wallet/seedCodec'
import { AppError, DecryptionError, KeyDecodeError, NoKeyAvailableError, SecretNotFoundError } from './errors'
import { keyLogger } from './logger'
import type { SecretStore } from './secureStorage'

export interface KeyCustodianState {
  keyState: KeyState
}

export interface KeyCustodianOptions {
  secretStore: SecretStore
  /** Entropy source for new wallets */
  entropySource?: () => Uint8Array
  accountIndex?: number
  addressIndex?: number
}

export class KeyCustodian {
  readonly store: StoreApi<KeyCustodianState>
  private inFlight: Promise<KeyState> | null = null
  private readonly secretStore: SecretStore
  private readonly entropySource: () => Uint8Array
  private readonly accountIndex: number
  private readonly addressIndex: number

  constructor(options: KeyCustodianOptions) {
    this.secretStore = options.secretStore
    this.entropySource = options.entropySource ?? generateEntropy
    this.accountIndex = options.accountIndex ?? 0
    this.addressIndex = options.addressIndex ?? 0
    this.store = createStore<KeyCustodianState>()(() => ({
      keyState: { status: 'unknown' }
    }))
  }

  get state(): KeyState {
    return this.store.getState().keyState
  }

  getKey(): SpendingKey | null {
    const state = this.state
    return state.status === 'present' ? state.key : null
  }

  /**
   * @throws {NoKeyAvailableError} Until the key is present
   */
  requireKey(): SpendingKey {
    const key = this.getKey()
    if (!key) {
      throw new NoKeyAvailableError()
    }
    return key
  }

  /**
   * Listen for key state changes. Returns the unsubscribe function.
   */
  subscribe(listener: (state: KeyState, previous: KeyState) => void): () => void {
    return this.store.subscribe((next, prev) => {
      if (next.keyState !== prev.keyState) {
        listener(next.keyState, prev.keyState)
      }
    })
  }

  /**
   * Load or create the spending key and publish the outcome.
   *
   * Concurrent calls share one attempt. Once the key is present further
   * calls resolve to it without touching the store.
   */
  initialize(): Promise<KeyState> {
    const current = this.state
    if (current.status === 'present') {
      return Promise.resolve(current)
    }

    if (!this.inFlight) {
      this.inFlight = this.loadOrCreate().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  private async loadOrCreate(): Promise<KeyState> {
    let next: KeyState
    try {
      next = { status: 'present', key: await this.loadOrCreateKey() }
    } catch (e) {
      const cause = e instanceof Error ? e : AppError.fromUnknown(e)
      keyLogger.error('Failed to load spending key', cause)
      next = { status: 'error', cause }
    }

    this.store.setState({ keyState: next })
    return next
  }

  private async loadOrCreateKey(): Promise<SpendingKey> {
    const mnemonic = await this.readOrCreateMnemonic()
    const key = deriveKey(mnemonicToSeed(mnemonic), this.accountIndex, this.addressIndex)
    keyLogger.info('Spending key ready', { address: key.address, path: key.path })
    return key
  }

  private async readOrCreateMnemonic(): Promise<string> {
    try {
      const mnemonic = await this.secretStore.get(STORAGE.SEED_KEY)
      keyLogger.debug('Loaded stored seed phrase')
      return mnemonic
    } catch (e) {
      if (e instanceof DecryptionError) {
        throw new KeyDecodeError('Stored seed phrase could not be decrypted', undefined, e)
      }
      if (!(e instanceof SecretNotFoundError)) {
        throw e
      }
    }

    keyLogger.info('No seed phrase stored, creating a new wallet')
    const mnemonic = entropyToMnemonic(this.entropySource())
    await this.secretStore.put(STORAGE.SEED_KEY, mnemonic)
    return mnemonic
  }
}
