/**
 * Wallet Domain - seed encoding, key derivation, validation
 */

export {
  ENTROPY_LENGTH,
  MNEMONIC_WORD_COUNT,
  entropyToMnemonic,
  generateEntropy,
  isValidMnemonic,
  mnemonicToSeed,
  normalizeMnemonic
} from './seedCodec'

export {
  WALLET_NETWORK,
  WALLET_PATH,
  deriveKey,
  derivationPath,
  keyPairFromWif
} from './keyDerivation'

export {
  MAX_SATOSHIS,
  isValidAddress,
  isValidSatoshiAmount,
  isValidTxid
} from './validation'
