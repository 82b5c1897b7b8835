/**
 * Pure Coin Selection Algorithms
 *
 * Greedy largest-first selection with a fee feedback loop. The fee depends
 * on how many inputs are spent, and how many inputs are needed depends on
 * the fee, so selection is repeated until the input count it produces is
 * the one its fee estimate assumed.
 *
 * Selection never throws on a shortfall: it reports `sufficient: false`
 * and leaves the decision to the caller.
 *
 * @module domain/transaction/coinSelection
 */

import type { CoinSelectionResult, Utxo } from '../types'
import { estimateFee, HEADER_SIZE, PER_INPUT_SIZE, PER_OUTPUT_SIZE } from './fees'

/**
 * Largest standard transaction, in bytes (400,000 weight units / 4).
 */
export const MAX_STANDARD_TX_SIZE = 100_000

/**
 * Most inputs a standard two-output transaction can carry under the
 * {@link estimateFee} size model (884).
 */
export const MAX_STANDARD_INPUTS = Math.floor(
  (MAX_STANDARD_TX_SIZE - HEADER_SIZE - 2 * PER_OUTPUT_SIZE) / PER_INPUT_SIZE
)

/**
 * Upper bound on passes of the selection loop (1770).
 *
 * Every pass that does not stop moves the estimate to another
 * (input count, output count) pair, and a standard transaction has at most
 * `2 × (MAX_STANDARD_INPUTS + 1)` of them.
 */
export const MAX_SELECTION_ITERATIONS = 2 * (MAX_STANDARD_INPUTS + 1)

/**
 * Sort UTXOs by value, largest first.
 *
 * Returns a new array; equal values keep their original order.
 *
 * @example
 * ```typescript
 * sortUtxosByValueDesc([{ value: 500, ... }, { value: 1000, ... }])
 * // [{ value: 1000, ... }, { value: 500, ... }]
 * ```
 */
export function sortUtxosByValueDesc(utxos: readonly Utxo[]): Utxo[] {
  return [...utxos].sort((a, b) => b.value - a.value)
}

/**
 * Number of outputs a spend needs: a change output is only added when the
 * inputs exceed the payment plus fee.
 */
export function outputCountFor(total: number, amount: number, fee: number): 1 | 2 {
  return total > amount + fee ? 2 : 1
}

function accumulate(sorted: readonly Utxo[], needed: number): { selected: Utxo[]; total: number } {
  const selected: Utxo[] = []
  let total = 0

  for (const utxo of sorted) {
    if (total >= needed) break
    selected.push(utxo)
    total += utxo.value
  }

  return { selected, total }
}

/**
 * Select UTXOs covering `targetAmount` plus the fee for the selection itself.
 *
 * Each pass estimates the fee for the previous pass's input count (starting
 * from zero inputs and one output) and greedily takes the largest outputs
 * until `targetAmount + fee` is covered. The loop stops once the input count
 * is stable and either covers the target or can no longer change.
 *
 * @param available - Candidate outputs (usually the confirmed set)
 * @param targetAmount - Amount to send in satoshis, excluding fee
 * @param maxIterations - Pass limit
 *
 * @example
 * ```typescript
 * const result = selectUtxos([utxo(70000), utxo(50000)], 5000)
 * // result.selected = [utxo(70000)]
 * // result.fee = 185 (1 input, payment + change)
 * // result.sufficient = true
 * ```
 */
export function selectUtxos(
  available: readonly Utxo[],
  targetAmount: number,
  maxIterations: number = MAX_SELECTION_ITERATIONS
): CoinSelectionResult {
  const sorted = sortUtxosByValueDesc(available)

  let selected: Utxo[] = []
  let total = 0
  let fee = 0
  let outputs: 1 | 2 = 1
  let iterations = 0

  while (iterations < maxIterations) {
    const assumedInputs = selected.length
    fee = estimateFee(assumedInputs, outputs)

    const needed = targetAmount + fee
    const picked = accumulate(sorted, needed)
    selected = picked.selected
    total = picked.total
    iterations++

    const nextOutputs = outputCountFor(total, targetAmount, fee)
    if (selected.length === assumedInputs && (total >= needed || nextOutputs === outputs)) {
      break
    }
    outputs = nextOutputs
  }

  return {
    selected,
    total,
    fee,
    iterations,
    sufficient: total >= targetAmount + fee
  }
}
