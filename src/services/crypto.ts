/**
 * Cryptographic Utilities for the secret store
 *
 * At-rest encryption for wallet secrets:
 *
 * - **Key Derivation**: PBKDF2-SHA256 with 100,000 iterations (OWASP recommended)
 * - **Encryption**: AES-256-GCM (authenticated encryption)
 * - **Random Generation**: Cryptographically secure random values for salt/IV
 *
 * A store derives its key once and then encrypts each value under a fresh IV.
 *
 * @module services/crypto
 *
 * @example
 * ```typescript
 * const key = await deriveEncryptionKey('test-secret', salt)
 * const sealed = await encryptWithKey('seed words ...', key)
 * // persist sealed.ciphertext and sealed.iv
 * const plain = await decryptWithKey(sealed, key)
 * ```
 */

import { SECURITY } from '../config'
import { DecryptionError, EncryptionError } from './errors'
import { cryptoLogger } from './logger'

// Using a getter function allows tests to override globalThis.crypto
const getCrypto = () => globalThis.crypto

/**
 * A value sealed with AES-GCM. Both fields are base64.
 */
export interface SealedValue {
  /** AES-GCM ciphertext with the auth tag appended */
  ciphertext: string
  /** 12-byte initialization vector */
  iv: string
}

/** Salt length in bytes (128 bits) */
export const SALT_LENGTH = 16
/** IV length in bytes (96 bits for AES-GCM) */
const IV_LENGTH = 12
/** AES key length in bits (256-bit for AES-256) */
const KEY_LENGTH = 256

/**
 * Convert bytes to a base64 string
 */
export function bytesToBase64(bytes: Uint8Array): string {
  let binary = ''
  for (const byte of bytes) {
    binary += String.fromCharCode(byte)
  }
  return btoa(binary)
}

/**
 * Convert a base64 string to bytes
 *
 * @throws {DecryptionError} If the string is not valid base64
 */
export function base64ToBytes(base64: string): Uint8Array {
  let binary: string
  try {
    binary = atob(base64)
  } catch {
    throw new DecryptionError('Stored value is not valid base64')
  }
  const bytes = new Uint8Array(binary.length)
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i)
  }
  return bytes
}

/**
 * Convert a Uint8Array to a pure ArrayBuffer.
 * Node.js webcrypto requires genuine ArrayBuffer instances, not Buffer or
 * TypedArray views. This creates a fresh ArrayBuffer copy.
 */
function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buf = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(buf).set(bytes)
  return buf
}

/**
 * Generate a random PBKDF2 salt
 */
export function generateSalt(): Uint8Array {
  return getCrypto().getRandomValues(new Uint8Array(SALT_LENGTH))
}

/**
 * Derive an AES-256-GCM key from a passphrase using PBKDF2
 */
export async function deriveEncryptionKey(
  passphrase: string,
  salt: Uint8Array,
  iterations: number = SECURITY.PBKDF2_ITERATIONS
): Promise<CryptoKey> {
  const passwordKey = await getCrypto().subtle.importKey(
    'raw',
    toArrayBuffer(new TextEncoder().encode(passphrase)),
    'PBKDF2',
    false,
    ['deriveBits', 'deriveKey']
  )

  return getCrypto().subtle.deriveKey(
    {
      name: 'PBKDF2',
      salt: toArrayBuffer(salt),
      iterations,
      hash: 'SHA-256'
    },
    passwordKey,
    { name: 'AES-GCM', length: KEY_LENGTH },
    false,
    ['encrypt', 'decrypt']
  )
}

/**
 * Encrypt a string under a derived key with a fresh random IV
 *
 * @throws {EncryptionError} If Web Crypto rejects the operation
 */
export async function encryptWithKey(plaintext: string, key: CryptoKey): Promise<SealedValue> {
  const iv = getCrypto().getRandomValues(new Uint8Array(IV_LENGTH))

  try {
    const ciphertext = await getCrypto().subtle.encrypt(
      { name: 'AES-GCM', iv: toArrayBuffer(iv) },
      key,
      toArrayBuffer(new TextEncoder().encode(plaintext))
    )

    return {
      ciphertext: bytesToBase64(new Uint8Array(ciphertext)),
      iv: bytesToBase64(iv)
    }
  } catch (error) {
    cryptoLogger.error('AES-GCM encryption failed', error)
    throw new EncryptionError()
  }
}

/**
 * Decrypt a sealed value
 *
 * @throws {DecryptionError} If the key is wrong or the data was tampered with
 */
export async function decryptWithKey(sealed: SealedValue, key: CryptoKey): Promise<string> {
  const ciphertext = base64ToBytes(sealed.ciphertext)
  const iv = base64ToBytes(sealed.iv)

  if (iv.length !== IV_LENGTH) {
    throw new DecryptionError(`Invalid IV length ${iv.length}`)
  }

  try {
    const plaintext = await getCrypto().subtle.decrypt(
      { name: 'AES-GCM', iv: toArrayBuffer(iv) },
      key,
      toArrayBuffer(ciphertext)
    )

    return new TextDecoder().decode(plaintext)
  } catch {
    throw new DecryptionError()
  }
}
