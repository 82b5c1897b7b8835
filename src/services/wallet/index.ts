/**
 * Wallet services barrel
 */

export { WalletEngine } from './engine'
export type { WalletEngineOptions, WalletEngineState } from './engine'
