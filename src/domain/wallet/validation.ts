/**
 * Pure Validation Functions
 *
 * Format and structure checks only. Nothing here verifies data against the
 * blockchain or any external service.
 *
 * @module domain/wallet/validation
 */

import * as bitcoin from 'bitcoinjs-lib'
import { WALLET_NETWORK } from './keyDerivation'

/** Maximum supply in satoshis */
export const MAX_SATOSHIS = 21_000_000_00_000_000

/**
 * Validate an address for the wallet network.
 *
 * Delegates to the output-script encoder, so any address bitcoinjs can pay
 * to on this network (bech32, bech32m or base58) is accepted. Never throws.
 *
 * @example
 * ```typescript
 * isValidAddress('tb1q...')          // true
 * isValidAddress('invalidAddress')   // false
 * isValidAddress('')                 // false
 * ```
 */
export function isValidAddress(address: string, network: bitcoin.Network = WALLET_NETWORK): boolean {
  if (!address) {
    return false
  }
  try {
    bitcoin.address.toOutputScript(address, network)
    return true
  } catch {
    return false
  }
}

/**
 * Validate a transaction ID format (64 hex characters).
 */
export function isValidTxid(txid: string): boolean {
  return /^[0-9a-fA-F]{64}$/.test(txid)
}

/**
 * Validate a satoshi amount to send.
 *
 * @example
 * ```typescript
 * isValidSatoshiAmount(1000)  // true
 * isValidSatoshiAmount(0)     // false (not positive)
 * isValidSatoshiAmount(1.5)   // false (not integer)
 * ```
 */
export function isValidSatoshiAmount(amount: number): boolean {
  return Number.isInteger(amount) && amount > 0 && amount <= MAX_SATOSHIS
}
