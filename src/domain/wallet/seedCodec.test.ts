import { describe, it, expect } from 'vitest'
import {
  ENTROPY_LENGTH,
  MNEMONIC_WORD_COUNT,
  entropyToMnemonic,
  generateEntropy,
  isValidMnemonic,
  mnemonicToSeed,
  normalizeMnemonic
} from './seedCodec'
import { KeyDecodeError, MnemonicEncodingError } from '../../services/errors'

const ZERO_MNEMONIC = 'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about'

describe('Seed Codec', () => {
  describe('generateEntropy', () => {
    it('should produce 16 bytes', () => {
      expect(generateEntropy()).toHaveLength(ENTROPY_LENGTH)
    })

    it('should produce different values on each call', () => {
      expect(generateEntropy()).not.toEqual(generateEntropy())
    })
  })

  describe('entropyToMnemonic', () => {
    it('should encode all-zero entropy as the abandon phrase', () => {
      expect(entropyToMnemonic(new Uint8Array(16))).toBe(ZERO_MNEMONIC)
    })

    it('should produce twelve words', () => {
      const words = entropyToMnemonic(generateEntropy()).split(' ')
      expect(words).toHaveLength(MNEMONIC_WORD_COUNT)
    })

    it('should reject entropy of any other length', () => {
      expect(() => entropyToMnemonic(new Uint8Array(15))).toThrow(MnemonicEncodingError)
      expect(() => entropyToMnemonic(new Uint8Array(32))).toThrow(MnemonicEncodingError)
    })
  })

  describe('normalizeMnemonic', () => {
    it('should lowercase and collapse whitespace', () => {
      expect(normalizeMnemonic('  Abandon ABANDON\n abandon ')).toBe('abandon abandon abandon')
    })
  })

  describe('isValidMnemonic', () => {
    it('should accept a generated phrase', () => {
      expect(isValidMnemonic(entropyToMnemonic(generateEntropy()))).toBe(true)
    })

    it('should reject a phrase with a bad checksum', () => {
      expect(isValidMnemonic(ZERO_MNEMONIC.replace(/about$/, 'abandon'))).toBe(false)
    })

    it('should reject words outside the list', () => {
      expect(isValidMnemonic('not a real seed phrase at all')).toBe(false)
    })
  })

  describe('mnemonicToSeed', () => {
    it('should derive a 64-byte seed', () => {
      expect(mnemonicToSeed(ZERO_MNEMONIC)).toHaveLength(64)
    })

    it('should be deterministic and whitespace-insensitive', () => {
      const a = mnemonicToSeed(ZERO_MNEMONIC)
      const b = mnemonicToSeed(`  ${ZERO_MNEMONIC.toUpperCase()}  `)
      expect(a.equals(b)).toBe(true)
    })

    it('should change with the passphrase', () => {
      const plain = mnemonicToSeed(ZERO_MNEMONIC)
      const salted = mnemonicToSeed(ZERO_MNEMONIC, 'test-passphrase')
      expect(plain.equals(salted)).toBe(false)
    })

    it('should throw KeyDecodeError for a failing checksum', () => {
      expect(() => mnemonicToSeed(ZERO_MNEMONIC.replace(/about$/, 'abandon'))).toThrow(KeyDecodeError)
    })

    it('should report the word count in the error context', () => {
      try {
        mnemonicToSeed('abandon abandon')
        expect.unreachable('mnemonicToSeed should have thrown')
      } catch (e) {
        expect(e).toBeInstanceOf(KeyDecodeError)
        if (e instanceof KeyDecodeError) {
          expect(e.context).toEqual({ wordCount: 2 })
        }
      }
    })
  })
})
