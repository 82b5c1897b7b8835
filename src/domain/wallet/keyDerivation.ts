/**
 * Pure Key Derivation Functions
 *
 * Derives the wallet's single spending key from a BIP-39 seed using a
 * BIP-44 path and encodes it as a native SegWit (P2WPKH) address.
 * All functions are deterministic with no side effects.
 *
 * Path layout: m / 44' / coin' / account' / 0 / address
 *
 * @module domain/wallet/keyDerivation
 */

import BIP32Factory, { type BIP32Interface } from 'bip32'
import * as ecc from '@bitcoinerlab/secp256k1'
import * as bitcoin from 'bitcoinjs-lib'
import ECPairFactory, { type ECPairInterface } from 'ecpair'
import { NETWORK } from '../../config'
import { KeyDerivationError } from '../../services/errors'
import type { SpendingKey } from '../types'

bitcoin.initEccLib(ecc)
const bip32 = BIP32Factory(ecc)
const ECPair = ECPairFactory(ecc)

/**
 * Signet uses the testnet address and key serialization parameters.
 */
export const WALLET_NETWORK: bitcoin.Network = bitcoin.networks.testnet

export const WALLET_PATH = {
  purpose: 44,
  coinType: NETWORK.COIN_TYPE,
  /** External chain; the wallet never derives change addresses */
  change: 0
} as const

const HARDENED_LIMIT = 0x80000000

function assertIndex(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= HARDENED_LIMIT) {
    throw new KeyDerivationError(`${name} must be an integer in [0, 2^31), got ${value}`)
  }
}

/**
 * Build the BIP-44 path for an account/address pair.
 *
 * @example
 * ```typescript
 * derivationPath(0, 0) // "m/44'/1'/0'/0/0"
 * ```
 */
export function derivationPath(accountIndex: number = 0, addressIndex: number = 0): string {
  assertIndex('accountIndex', accountIndex)
  assertIndex('addressIndex', addressIndex)
  return `m/${WALLET_PATH.purpose}'/${WALLET_PATH.coinType}'/${accountIndex}'/${WALLET_PATH.change}/${addressIndex}`
}

/**
 * Derive the spending key and its P2WPKH address from a binary seed.
 *
 * The same seed and indices always yield the same key.
 *
 * @param seed - BIP-39 seed (16 to 64 bytes)
 * @throws {KeyDerivationError} If the seed is malformed or an index is out of range
 *
 * @example
 * ```typescript
 * const key = deriveKey(mnemonicToSeed(phrase))
 * key.address // "tb1q..."
 * ```
 */
export function deriveKey(seed: Uint8Array, accountIndex: number = 0, addressIndex: number = 0): SpendingKey {
  const path = derivationPath(accountIndex, addressIndex)

  let child: BIP32Interface
  try {
    child = bip32.fromSeed(Buffer.from(seed), WALLET_NETWORK).derivePath(path)
  } catch (e) {
    throw new KeyDerivationError(
      `Key derivation failed: ${e instanceof Error ? e.message : String(e)}`,
      e
    )
  }

  if (!child.privateKey) {
    throw new KeyDerivationError('Derived node has no private key')
  }

  const { address } = bitcoin.payments.p2wpkh({ pubkey: child.publicKey, network: WALLET_NETWORK })
  if (!address) {
    throw new KeyDerivationError('Could not encode P2WPKH address')
  }

  return {
    address,
    pubKey: child.publicKey.toString('hex'),
    wif: child.toWIF(),
    path
  }
}

/**
 * Rebuild the signing key pair of a {@link SpendingKey}.
 */
export function keyPairFromWif(wif: string): ECPairInterface {
  return ECPair.fromWIF(wif, WALLET_NETWORK)
}
