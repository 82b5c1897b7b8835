/**
 * Safe satoshi/BTC conversion utilities.
 *
 * Uses Math.round to avoid floating-point precision errors
 * (e.g., 0.1 + 0.2 !== 0.3 in IEEE 754). User-entered text goes through
 * {@link parseBtc}, which never touches floating point.
 */

import { InvalidAmountError } from '../services/errors'

export const SATS_PER_BTC = 100_000_000

/** Convert a BTC amount to satoshis with safe rounding */
export function btcToSatoshis(btc: number): number {
  if (!Number.isFinite(btc) || btc < 0) return 0
  return Math.round(btc * SATS_PER_BTC)
}

/** Convert satoshis to BTC for display */
export function satoshisToBtc(sats: number): number {
  return sats / SATS_PER_BTC
}

/**
 * Format a satoshi amount as a BTC string with all eight decimals,
 * computed on integers so no rounding can creep in
 */
export function formatBtc(sats: number): string {
  const sign = sats < 0 ? '-' : ''
  const abs = Math.abs(Math.trunc(sats))
  const whole = Math.floor(abs / SATS_PER_BTC)
  const fraction = String(abs % SATS_PER_BTC).padStart(8, '0')
  return `${sign}${whole}.${fraction}`
}

const BTC_AMOUNT_PATTERN = /^(-)?(\d+)(?:\.(\d*))?$/

/**
 * Parse a decimal BTC string into satoshis. Digits beyond the eighth
 * decimal are truncated.
 *
 * @throws {InvalidAmountError} If the text is not a plain decimal number
 *
 * @example
 * ```typescript
 * parseBtc('0.00005')      // 5000
 * parseBtc('0.000000015')  // 1
 * ```
 */
export function parseBtc(text: string): number {
  const match = BTC_AMOUNT_PATTERN.exec(text.trim())
  if (!match) {
    throw new InvalidAmountError(Number.NaN, `Not a BTC amount: ${text}`)
  }

  const [, sign, whole, fraction = ''] = match
  const sats = Number(whole) * SATS_PER_BTC + Number(fraction.padEnd(8, '0').slice(0, 8))
  if (!Number.isSafeInteger(sats)) {
    throw new InvalidAmountError(sats, `BTC amount out of range: ${text}`)
  }
  return sign && sats !== 0 ? -sats : sats
}
