/**
 * Secure Storage Service
 *
 * Encrypted key-value storage for wallet secrets. Each logical key is kept
 * as two backend entries: the AES-GCM ciphertext under the key itself and
 * its IV under `${key}_iv`. A store-wide PBKDF2 salt lives under a reserved
 * entry and is created on the first write.
 *
 * @module services/secureStorage
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { SECURITY, STORAGE } from '../config'
import { base64ToBytes, bytesToBase64, decryptWithKey, deriveEncryptionKey, encryptWithKey, generateSalt } from './crypto'
import { DecryptionError, SecretNotFoundError } from './errors'
import { cryptoLogger } from './logger'

// ============================================
// Interfaces
// ============================================

/**
 * Secret store consumed by the key custodian.
 * `get` rejects with {@link SecretNotFoundError} when nothing is stored.
 */
export interface SecretStore {
  put(key: string, value: string): Promise<void>
  get(key: string): Promise<string>
}

/**
 * Raw string storage underneath the encrypted store. A batch passed to
 * `setItems` is applied completely or not at all.
 */
export interface StorageBackend {
  getItem(key: string): Promise<string | null>
  setItems(items: Record<string, string>): Promise<void>
}

// ============================================
// Backends
// ============================================

export class MemoryStorageBackend implements StorageBackend {
  private entries = new Map<string, string>()

  async getItem(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null
  }

  async setItems(items: Record<string, string>): Promise<void> {
    for (const [key, value] of Object.entries(items)) {
      this.entries.set(key, value)
    }
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) &&
    Object.values(value).every(v => typeof v === 'string')
}

/**
 * JSON file backend. Updates are serialized; each one writes a modified copy
 * through a temporary file and a rename, and the in-memory view only moves
 * to the copy once the rename has succeeded.
 */
export class FileStorageBackend implements StorageBackend {
  private entries: Promise<Map<string, string>> | null = null
  private updateChain: Promise<void> = Promise.resolve()

  constructor(private readonly filePath: string) {}

  private load(): Promise<Map<string, string>> {
    if (this.entries) return this.entries

    const pending = this.readEntries()
    this.entries = pending
    // A failed read is retried on the next access
    void pending.catch(() => {
      if (this.entries === pending) this.entries = null
    })
    return pending
  }

  private async readEntries(): Promise<Map<string, string>> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf8')
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
        return new Map()
      }
      throw e
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      throw new DecryptionError(`Secret file ${this.filePath} is not valid JSON`)
    }
    if (!isStringRecord(parsed)) {
      throw new DecryptionError(`Secret file ${this.filePath} has an unexpected shape`)
    }

    return new Map(Object.entries(parsed))
  }

  private async writeEntries(entries: Map<string, string>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true })
    const tmpPath = `${this.filePath}.tmp`
    await writeFile(tmpPath, JSON.stringify(Object.fromEntries(entries), null, 2), { mode: 0o600 })
    await rename(tmpPath, this.filePath)
  }

  /**
   * Queue an update that edits a copy of the current entries.
   */
  private update(mutate: (draft: Map<string, string>) => void): Promise<void> {
    const run = async () => {
      const draft = new Map(await this.load())
      mutate(draft)
      await this.writeEntries(draft)
      this.entries = Promise.resolve(draft)
    }
    const next = this.updateChain.then(run, run)
    this.updateChain = next
    return next
  }

  async getItem(key: string): Promise<string | null> {
    const entries = await this.load()
    return entries.get(key) ?? null
  }

  setItems(items: Record<string, string>): Promise<void> {
    return this.update(draft => {
      for (const [key, value] of Object.entries(items)) {
        draft.set(key, value)
      }
    })
  }
}

// ============================================
// Encrypted store
// ============================================

export interface EncryptedSecretStoreOptions {
  /** PBKDF2 iterations, defaults to {@link SECURITY.PBKDF2_ITERATIONS} */
  iterations?: number
}

export class EncryptedSecretStore implements SecretStore {
  private keyPromise: Promise<CryptoKey> | null = null
  private readonly iterations: number

  constructor(
    private readonly backend: StorageBackend,
    private readonly passphrase: string,
    options: EncryptedSecretStoreOptions = {}
  ) {
    this.iterations = options.iterations ?? SECURITY.PBKDF2_ITERATIONS
  }

  /**
   * Derive the store key, creating the salt when `createSalt` is set and
   * none exists yet. Concurrent callers share one attempt; a failed attempt
   * is forgotten so the next call starts over.
   */
  private getKey(createSalt: boolean): Promise<CryptoKey> {
    if (this.keyPromise) return this.keyPromise

    const pending = this.loadKey(createSalt)
    this.keyPromise = pending
    void pending.catch(() => {
      if (this.keyPromise === pending) this.keyPromise = null
    })
    return pending
  }

  private async loadKey(createSalt: boolean): Promise<CryptoKey> {
    const storedSalt = await this.backend.getItem(STORAGE.SALT_KEY)
    let salt: Uint8Array
    if (storedSalt !== null) {
      salt = base64ToBytes(storedSalt)
    } else if (createSalt) {
      salt = generateSalt()
      await this.backend.setItems({ [STORAGE.SALT_KEY]: bytesToBase64(salt) })
      cryptoLogger.debug('Created secret store salt')
    } else {
      throw new DecryptionError('Secret store has no salt')
    }
    return deriveEncryptionKey(this.passphrase, salt, this.iterations)
  }

  async put(key: string, value: string): Promise<void> {
    const cryptoKey = await this.getKey(true)
    const sealed = await encryptWithKey(value, cryptoKey)

    await this.backend.setItems({
      [key]: sealed.ciphertext,
      [`${key}${STORAGE.IV_SUFFIX}`]: sealed.iv
    })
    cryptoLogger.debug('Secret stored', { key })
  }

  async get(key: string): Promise<string> {
    const ciphertext = await this.backend.getItem(key)
    const iv = await this.backend.getItem(`${key}${STORAGE.IV_SUFFIX}`)

    if (ciphertext === null && iv === null) {
      throw new SecretNotFoundError(key)
    }
    if (ciphertext === null || iv === null) {
      throw new DecryptionError(`Secret ${key} is missing its ${ciphertext === null ? 'ciphertext' : 'IV'}`)
    }

    const cryptoKey = await this.getKey(false)
    return decryptWithKey({ ciphertext, iv }, cryptoKey)
  }
}
