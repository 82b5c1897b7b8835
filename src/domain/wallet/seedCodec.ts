/**
 * Seed Codec
 *
 * Converts between raw entropy, BIP-39 mnemonics and binary seeds.
 * The wallet always uses 128 bits of entropy (12 words) and an empty
 * passphrase.
 *
 * @module domain/wallet/seedCodec
 */

import * as bip39 from 'bip39'
import { KeyDecodeError, MnemonicEncodingError } from '../../services/errors'

/** Entropy length in bytes (128 bits → 12 words) */
export const ENTROPY_LENGTH = 16

/** Number of words produced from {@link ENTROPY_LENGTH} bytes */
export const MNEMONIC_WORD_COUNT = 12

/**
 * Normalize a mnemonic phrase for consistent comparison.
 *
 * @example
 * ```typescript
 * normalizeMnemonic('  Abandon ABANDON  abandon ')
 * // Returns: 'abandon abandon abandon'
 * ```
 */
export function normalizeMnemonic(mnemonic: string): string {
  return mnemonic.toLowerCase().trim().replace(/\s+/g, ' ')
}

/**
 * Draw fresh entropy from the platform CSPRNG.
 */
export function generateEntropy(): Uint8Array {
  return globalThis.crypto.getRandomValues(new Uint8Array(ENTROPY_LENGTH))
}

/**
 * Encode 16 bytes of entropy as a 12-word English mnemonic.
 *
 * @throws {MnemonicEncodingError} If the entropy is not exactly 16 bytes
 *
 * @example
 * ```typescript
 * entropyToMnemonic(new Uint8Array(16))
 * // 'abandon abandon ... abandon about'
 * ```
 */
export function entropyToMnemonic(entropy: Uint8Array): string {
  if (entropy.length !== ENTROPY_LENGTH) {
    throw new MnemonicEncodingError(entropy.length)
  }
  return bip39.entropyToMnemonic(Buffer.from(entropy))
}

/**
 * Check a phrase against the English word list and its checksum.
 */
export function isValidMnemonic(mnemonic: string): boolean {
  return bip39.validateMnemonic(normalizeMnemonic(mnemonic))
}

/**
 * Derive the 64-byte BIP-39 seed from a mnemonic.
 *
 * bip39's seed derivation does not check the checksum on its own, so the
 * phrase is validated first.
 *
 * @throws {KeyDecodeError} If the phrase fails word-list or checksum validation
 */
export function mnemonicToSeed(mnemonic: string, passphrase: string = ''): Buffer {
  const normalized = normalizeMnemonic(mnemonic)
  if (!bip39.validateMnemonic(normalized)) {
    const wordCount = normalized === '' ? 0 : normalized.split(' ').length
    throw new KeyDecodeError('Seed phrase failed checksum validation', { wordCount })
  }
  return bip39.mnemonicToSeedSync(normalized, passphrase)
}
