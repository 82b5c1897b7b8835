/**
 * Core domain types for the wallet core
 * These are pure data types with no dependencies on infrastructure
 */

// ============================================
// Result Type (Functional Error Handling)
// ============================================

/**
 * A Result type for explicit error handling without exceptions.
 * Use this for operations that can fail in expected ways.
 *
 * @example
 * ```ts
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) return err('Division by zero')
 *   return ok(a / b)
 * }
 * ```
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a successful Result
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

/**
 * Create a failed Result
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}

/**
 * Unwrap a Result, throwing the error if it failed
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue
}

export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result
}

// ============================================
// Wallet Types
// ============================================

/**
 * An unspent output locked to the wallet address.
 * Identity is `(txid, vout)`; `value` is a non-negative integer in satoshis.
 */
export interface Utxo {
  txid: string
  vout: number
  confirmed: boolean
  /** Present on every confirmed output */
  blockHeight?: number
  value: number
}

/**
 * The single spending key of the wallet.
 * Re-derived from the seed on every start, never persisted.
 */
export interface SpendingKey {
  /** Bech32 P2WPKH address */
  address: string
  /** Compressed public key, hex */
  pubKey: string
  /** Private key in wallet import format */
  wif: string
  /** Derivation path the key was taken from */
  path: string
}

export type KeyState =
  | { status: 'unknown' }
  | { status: 'present'; key: SpendingKey }
  | { status: 'error'; cause: Error }

/** Confirmed balance in satoshis; `null` until the first successful fetch */
export type BalanceState = number | null

// ============================================
// Transaction Types
// ============================================

/**
 * Output of UTXO selection
 */
export interface CoinSelectionResult {
  /** Chosen outputs, largest first */
  selected: Utxo[]
  /** Sum of the selected values */
  total: number
  /** Fee estimate the final pass selected against */
  fee: number
  /** Passes of the fee feedback loop that ran */
  iterations: number
  /** Whether `total` covers the target plus `fee` */
  sufficient: boolean
}

/**
 * A signed transaction ready for broadcast
 */
export interface BuiltTransaction {
  /** Serialized transaction, hex */
  rawTx: string
  txid: string
  /** Estimated fee the outputs were sized for */
  fee: number
  /** Change returned to the wallet; 0 when no change output was added */
  change: number
  numOutputs: number
  spentOutpoints: Array<{ txid: string; vout: number }>
}

export interface SendResult {
  txid: string
}
