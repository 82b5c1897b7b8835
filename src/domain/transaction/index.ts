/**
 * Transaction Domain - TX building, fee calculation, coin selection
 */

export {
  estimateFee,
  estimateSize,
  feeFromSerializedLength,
  FEE_RATE,
  HEADER_SIZE,
  PER_INPUT_SIZE,
  PER_OUTPUT_SIZE
} from './fees'

export {
  selectUtxos,
  sortUtxosByValueDesc,
  outputCountFor,
  MAX_SELECTION_ITERATIONS,
  MAX_STANDARD_INPUTS,
  MAX_STANDARD_TX_SIZE
} from './coinSelection'

export {
  buildP2WPKHTx,
  calculateChangeAndFee
} from './builder'

export type { BuildP2WPKHTxParams } from './builder'
