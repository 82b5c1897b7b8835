/**
 * Pure Fee Calculation Functions
 *
 * Fee estimation for single-key P2WPKH transactions. The fee is the
 * estimated size in bytes multiplied by a fixed rate; there is no dynamic
 * fee-rate feed.
 *
 * Witness bytes are counted at full weight and the longest DER signature
 * is reserved, so estimates sit above the real virtual size.
 *
 * @module domain/transaction/fees
 */

/**
 * Transaction overhead in bytes.
 * Breakdown: version (4) + locktime (4) + input count (1) + output count (1)
 */
export const HEADER_SIZE = 10

/**
 * P2WPKH input size in bytes.
 * Breakdown: txid (32) + vout (4) + scriptlen (1) + sequence (4) + signature slot (72)
 */
export const PER_INPUT_SIZE = 32 + 4 + 1 + 4 + 72

/**
 * P2WPKH output size in bytes.
 * Breakdown: value (8) + scriptlen (1) + script (22)
 */
export const PER_OUTPUT_SIZE = 8 + 1 + 22

/**
 * Fee rate in satoshis per byte.
 */
export const FEE_RATE = 1

/**
 * Estimate the serialized size of a transaction.
 *
 * A transaction without inputs is reported as 0 bytes: it cannot be
 * broadcast, and the selection loop starts from that state.
 *
 * @example
 * ```typescript
 * estimateSize(0, 1)  // 0
 * estimateSize(1, 1)  // 154
 * estimateSize(1, 2)  // 185
 * estimateSize(2, 2)  // 298
 * ```
 */
export function estimateSize(inputCount: number, outputCount: number): number {
  if (inputCount === 0) {
    return 0
  }
  return HEADER_SIZE + (inputCount * PER_INPUT_SIZE) + (outputCount * PER_OUTPUT_SIZE)
}

/**
 * Estimate the fee for a transaction shape at {@link FEE_RATE}.
 */
export function estimateFee(inputCount: number, outputCount: number): number {
  return estimateSize(inputCount, outputCount) * FEE_RATE
}

/**
 * Fee reported to callers for a signed transaction, charged on the length
 * of its hex serialization.
 *
 * @param rawTxHex - Serialized transaction, hex
 */
export function feeFromSerializedLength(rawTxHex: string): number {
  return rawTxHex.length * FEE_RATE
}
