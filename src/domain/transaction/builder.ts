/**
 * Pure Transaction Builder
 *
 * Constructs and signs single-key P2WPKH transactions. All functions are
 * deterministic with no side effects: no API calls, no storage access,
 * no logging.
 *
 * The raw `Transaction` API is used instead of PSBT so a transaction whose
 * outputs exceed its inputs can still be assembled and measured; such a
 * transaction is rejected later by the balance check, never broadcast.
 *
 * @module domain/transaction/builder
 */

import * as bitcoin from 'bitcoinjs-lib'
import { InvalidAddressError, InvalidAmountError, SigningError } from '../../services/errors'
import type { BuiltTransaction, SpendingKey, Utxo } from '../types'
import { keyPairFromWif, WALLET_NETWORK } from '../wallet/keyDerivation'
import { isValidAddress, isValidSatoshiAmount } from '../wallet/validation'
import { outputCountFor } from './coinSelection'
import { estimateFee } from './fees'

// ============================================
// Types
// ============================================

/**
 * Parameters for building a single-key P2WPKH transaction.
 */
export interface BuildP2WPKHTxParams {
  /** UTXOs to spend (already coin-selected) */
  selectedUtxos: readonly Utxo[]
  /** Recipient address */
  toAddress: string
  /** Amount to send in satoshis */
  satoshis: number
  /** Change goes back to the wallet's own address */
  changeAddress: string
  /** Key owning every selected UTXO */
  key: SpendingKey
  network?: bitcoin.Network
}

// ============================================
// Change Output
// ============================================

/**
 * Determine the fee and change for a spend.
 *
 * The fee is sized for two outputs when the inputs exceed the payment plus
 * the single-output fee. A change output is only created when the change
 * is positive; otherwise the remainder is left to the miner.
 *
 * @param totalInput - Total satoshis from all inputs
 * @param satoshis - Amount being sent
 * @param numInputs - Number of transaction inputs
 *
 * @example
 * ```typescript
 * calculateChangeAndFee(70000, 5000, 1)
 * // { fee: 185, change: 64815, numOutputs: 2 }
 * calculateChangeAndFee(5100, 5000, 1)
 * // { fee: 154, change: 0, numOutputs: 1 }
 * ```
 */
export function calculateChangeAndFee(
  totalInput: number,
  satoshis: number,
  numInputs: number
): { fee: number; change: number; numOutputs: 1 | 2 } {
  const outputCount = outputCountFor(totalInput, satoshis, estimateFee(numInputs, 1))
  const fee = estimateFee(numInputs, outputCount)
  const change = totalInput - satoshis - fee

  return change > 0
    ? { fee, change, numOutputs: 2 }
    : { fee, change: 0, numOutputs: 1 }
}

// ============================================
// Transaction Builder
// ============================================

function txidToHash(txid: string): Buffer {
  return Buffer.from(txid, 'hex').reverse()
}

/**
 * Build and sign a P2WPKH transaction.
 *
 * Every input is signed with SIGHASH_ALL over the BIP-143 digest and each
 * signature is verified before it is attached.
 *
 * @throws {InvalidAddressError} If the recipient or change address is not valid for the network
 * @throws {InvalidAmountError} If the amount is not a positive integer
 * @throws {SigningError} If signing or serialization fails
 *
 * @example
 * ```typescript
 * const built = buildP2WPKHTx({
 *   selectedUtxos: selection.selected,
 *   toAddress: 'tb1q...',
 *   satoshis: 5000,
 *   changeAddress: key.address,
 *   key
 * })
 * // built.rawTx is ready for broadcasting
 * ```
 */
export function buildP2WPKHTx(params: BuildP2WPKHTxParams): BuiltTransaction {
  const { selectedUtxos, toAddress, satoshis, changeAddress, key, network = WALLET_NETWORK } = params

  if (!isValidAddress(toAddress, network)) {
    throw new InvalidAddressError(toAddress)
  }
  if (!isValidAddress(changeAddress, network)) {
    throw new InvalidAddressError(changeAddress)
  }
  if (!isValidSatoshiAmount(satoshis)) {
    throw new InvalidAmountError(satoshis)
  }

  const totalInput = selectedUtxos.reduce((sum, utxo) => sum + utxo.value, 0)
  const { fee, change, numOutputs } = calculateChangeAndFee(totalInput, satoshis, selectedUtxos.length)

  try {
    const keyPair = keyPairFromWif(key.wif)
    // BIP-143 script code for P2WPKH is the P2PKH script of the key
    const scriptCode = bitcoin.payments.p2pkh({ pubkey: keyPair.publicKey, network }).output
    if (!scriptCode) {
      throw new Error('Could not build script code')
    }

    const tx = new bitcoin.Transaction()
    tx.version = 2

    for (const utxo of selectedUtxos) {
      tx.addInput(txidToHash(utxo.txid), utxo.vout)
    }

    tx.addOutput(bitcoin.address.toOutputScript(toAddress, network), satoshis)
    if (numOutputs === 2) {
      tx.addOutput(bitcoin.address.toOutputScript(changeAddress, network), change)
    }

    selectedUtxos.forEach((utxo, index) => {
      const hash = tx.hashForWitnessV0(index, scriptCode, utxo.value, bitcoin.Transaction.SIGHASH_ALL)
      const rawSignature = keyPair.sign(hash)
      if (!keyPair.verify(hash, rawSignature)) {
        throw new Error(`Signature for input ${index} failed verification`)
      }
      const signature = bitcoin.script.signature.encode(rawSignature, bitcoin.Transaction.SIGHASH_ALL)
      tx.setWitness(index, [signature, keyPair.publicKey])
    })

    return {
      rawTx: tx.toHex(),
      txid: tx.getId(),
      fee,
      change,
      numOutputs,
      spentOutpoints: selectedUtxos.map(u => ({ txid: u.txid, vout: u.vout }))
    }
  } catch (e) {
    throw new SigningError(
      `Failed to sign transaction: ${e instanceof Error ? e.message : String(e)}`,
      e
    )
  }
}
