/**
 * In-process stand-ins for the wallet's external collaborators.
 */

import { vi } from 'vitest'
import type { Utxo } from '../domain/types'
import type { BlockchainProvider } from '../infrastructure/api/esploraClient'
import { SecretNotFoundError } from '../services/errors'
import type { SecretStore } from '../services/secureStorage'

/**
 * Blockchain provider serving a mutable UTXO set. `broadcast` answers with a
 * fixed txid unless a failure is queued.
 */
export class FakeBlockchainProvider implements BlockchainProvider {
  utxos: Utxo[] = []
  readonly broadcasts: string[] = []
  txid = 'ab'.repeat(32)
  private fetchFailures: Error[] = []
  private broadcastFailure: Error | null = null

  readonly fetchUnspentOutputs = vi.fn(async (_address: string): Promise<Utxo[]> => {
    const failure = this.fetchFailures.shift()
    if (failure) throw failure
    return this.utxos.map(utxo => ({ ...utxo }))
  })

  readonly broadcast = vi.fn(async (rawTxHex: string): Promise<string> => {
    if (this.broadcastFailure) throw this.broadcastFailure
    this.broadcasts.push(rawTxHex)
    return this.txid
  })

  /** Fail the next fetch with `error`; queued failures are consumed in order */
  failNextFetch(error: Error): void {
    this.fetchFailures.push(error)
  }

  failBroadcasts(error: Error | null): void {
    this.broadcastFailure = error
  }
}

/**
 * Plain in-memory secret store with call spies.
 */
export class InMemorySecretStore implements SecretStore {
  readonly entries = new Map<string, string>()
  private getFailure: Error | null = null

  readonly put = vi.fn(async (key: string, value: string): Promise<void> => {
    this.entries.set(key, value)
  })

  readonly get = vi.fn(async (key: string): Promise<string> => {
    if (this.getFailure) throw this.getFailure
    const value = this.entries.get(key)
    if (value === undefined) throw new SecretNotFoundError(key)
    return value
  })

  failGets(error: Error | null): void {
    this.getFailure = error
  }
}
