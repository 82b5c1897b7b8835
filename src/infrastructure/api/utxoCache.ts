/**
 * UTXO Cache
 *
 * Single-slot, time-bounded cache in front of the blockchain provider.
 * The wallet has one address, so one entry is all it keeps; fetching
 * another address replaces it.
 */

import type { Utxo } from '../../domain/types'
import { apiLogger } from '../../services/logger'
import type { BlockchainProvider } from './esploraClient'

export interface UtxoCacheEntry {
  address: string
  utxos: readonly Utxo[]
  timestamp: number
}

export class UtxoCache {
  private entry: UtxoCacheEntry | null = null

  constructor(
    private readonly provider: BlockchainProvider,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Return the UTXO set of `address`, served from the cache when the entry
   * is younger than `maxAgeMs`. `maxAgeMs = 0` always refetches.
   *
   * Provider errors propagate unchanged and leave the entry untouched.
   */
  async fetch(address: string, maxAgeMs: number): Promise<Utxo[]> {
    const cached = this.entry
    if (cached && cached.address === address && this.now() - cached.timestamp < maxAgeMs) {
      apiLogger.debug('UTXO cache hit', { address, ageMs: this.now() - cached.timestamp })
      return [...cached.utxos]
    }

    const utxos = await this.provider.fetchUnspentOutputs(address)
    this.entry = { address, utxos: [...utxos], timestamp: this.now() }
    return utxos
  }

  peek(): UtxoCacheEntry | null {
    return this.entry
  }

  clear(): void {
    this.entry = null
  }
}
