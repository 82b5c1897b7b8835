/**
 * Wallet Engine
 *
 * Public surface of the wallet core: the observable confirmed balance,
 * address validation, fee preview and send. Composes the key custodian,
 * the UTXO cache, coin selection, the transaction builder and the
 * blockchain provider.
 *
 * Balance state:
 *
 *   null ──refresh ok──▶ n ──refresh ok──▶ n'
 *
 * A failed refresh never publishes. A transport failure schedules one
 * delayed retry; the retry itself does not schedule another.
 */

import { createStore, type StoreApi } from 'zustand/vanilla'
import { TIMEOUTS, TRANSACTION } from '../../config'
import { buildP2WPKHTx } from '../../domain/transaction/builder'
import { selectUtxos } from '../../domain/transaction/coinSelection'
import { feeFromSerializedLength } from '../../domain/transaction/fees'
import type { BalanceState, BuiltTransaction, SendResult, Utxo } from '../../domain/types'
import { isValidAddress } from '../../domain/wallet/validation'
import type { BlockchainProvider } from '../../infrastructure/api/esploraClient'
import type { UtxoCache } from '../../infrastructure/api/utxoCache'
import { InsufficientFundsError, isTransportError } from '../errors'
import type { KeyCustodian } from '../keyCustodian'
import { logTransaction, walletLogger } from '../logger'

export interface WalletEngineState {
  balance: BalanceState
}

export interface WalletEngineOptions {
  custodian: KeyCustodian
  cache: UtxoCache
  provider: BlockchainProvider
  /** Delay before the balance retry, defaults to 1 s */
  retryDelayMs?: number
  /** Cache lifetime for fee previews, defaults to 60 s */
  feeCacheTtlMs?: number
}

export class WalletEngine {
  readonly store: StoreApi<WalletEngineState>
  private readonly custodian: KeyCustodian
  private readonly cache: UtxoCache
  private readonly provider: BlockchainProvider
  private readonly retryDelayMs: number
  private readonly feeCacheTtlMs: number
  private retryTimer: ReturnType<typeof setTimeout> | null = null
  private unsubscribeKey: (() => void) | null = null

  constructor(options: WalletEngineOptions) {
    this.custodian = options.custodian
    this.cache = options.cache
    this.provider = options.provider
    this.retryDelayMs = options.retryDelayMs ?? TIMEOUTS.BALANCE_RETRY_DELAY_MS
    this.feeCacheTtlMs = options.feeCacheTtlMs ?? TRANSACTION.UTXO_CACHE_TTL_MS
    this.store = createStore<WalletEngineState>()(() => ({ balance: null }))
  }

  get balance(): BalanceState {
    return this.store.getState().balance
  }

  subscribeBalance(listener: (balance: BalanceState) => void): () => void {
    return this.store.subscribe((next, prev) => {
      if (next.balance !== prev.balance) {
        listener(next.balance)
      }
    })
  }

  /**
   * Refresh the balance whenever the spending key becomes available.
   */
  start(): void {
    if (this.unsubscribeKey) return

    this.unsubscribeKey = this.custodian.subscribe(state => {
      if (state.status === 'present') {
        walletLogger.debug('Spending key available, refreshing balance')
        void this.updateBalance()
      }
    })

    if (this.custodian.state.status === 'present') {
      void this.updateBalance()
    }
  }

  stop(): void {
    this.unsubscribeKey?.()
    this.unsubscribeKey = null
    this.cancelRetry()
  }

  getAddress(): string | null {
    return this.custodian.getKey()?.address ?? null
  }

  /**
   * Recompute the confirmed balance from a fresh UTXO fetch.
   *
   * Never rejects. Supersedes a pending retry.
   */
  updateBalance(): Promise<void> {
    this.cancelRetry()
    return this.refreshBalance(true)
  }

  private async refreshBalance(retryOnTransportFailure: boolean): Promise<void> {
    try {
      const balance = await this.getConfirmedBalance()
      walletLogger.debug('Balance refreshed', { balance })
      this.store.setState({ balance })
    } catch (e) {
      if (isTransportError(e) && retryOnTransportFailure) {
        walletLogger.warn('Balance refresh failed, retrying', { delayMs: this.retryDelayMs }, e)
        this.scheduleRetry()
      } else {
        walletLogger.error('Balance refresh failed', e)
      }
    }
  }

  private scheduleRetry(): void {
    this.cancelRetry()
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null
      void this.refreshBalance(false)
    }, this.retryDelayMs)
  }

  private cancelRetry(): void {
    if (this.retryTimer !== null) {
      clearTimeout(this.retryTimer)
      this.retryTimer = null
    }
  }

  isAddressValid(address: string): boolean {
    return isValidAddress(address)
  }

  /**
   * Fee for sending `amount` to `address`, charged on the length of the
   * signed transaction's hex serialization. Uses cached UTXOs.
   */
  async calculateFee(address: string, amount: number): Promise<number> {
    const built = await this.createSignedTransaction(address, amount, this.feeCacheTtlMs)
    return feeFromSerializedLength(built.rawTx)
  }

  /**
   * Build, verify against the live confirmed balance, and broadcast.
   *
   * A balance refresh is triggered afterwards whatever the outcome.
   *
   * @throws {NoKeyAvailableError} Before the key is loaded
   * @throws {InsufficientFundsError} When amount plus fee exceeds the live balance; nothing is broadcast
   */
  async send(address: string, amount: number): Promise<SendResult> {
    try {
      const built = await this.createSignedTransaction(address, amount, TRANSACTION.UTXO_CACHE_BYPASS_MS)
      const fee = feeFromSerializedLength(built.rawTx)
      const balance = await this.getConfirmedBalance()

      if (amount + fee > balance) {
        walletLogger.info('Send rejected: insufficient funds', { required: amount + fee, balance })
        throw new InsufficientFundsError(amount + fee, balance)
      }

      const txid = await this.provider.broadcast(built.rawTx)
      logTransaction('broadcast', txid, { amount, fee, inputs: built.spentOutpoints.length })
      return { txid }
    } finally {
      void this.updateBalance()
    }
  }

  private async getConfirmedUtxos(maxAgeMs: number): Promise<Utxo[]> {
    const { address } = this.custodian.requireKey()
    const utxos = await this.cache.fetch(address, maxAgeMs)
    return utxos.filter(utxo => utxo.confirmed)
  }

  private async getConfirmedBalance(): Promise<number> {
    const utxos = await this.getConfirmedUtxos(TRANSACTION.UTXO_CACHE_BYPASS_MS)
    return utxos.reduce((sum, utxo) => sum + utxo.value, 0)
  }

  private async createSignedTransaction(address: string, amount: number, maxAgeMs: number): Promise<BuiltTransaction> {
    const key = this.custodian.requireKey()
    const utxos = await this.getConfirmedUtxos(maxAgeMs)
    const selection = selectUtxos(utxos, amount)

    walletLogger.debug('Selected UTXOs', {
      inputs: selection.selected.length,
      total: selection.total,
      fee: selection.fee,
      iterations: selection.iterations,
      sufficient: selection.sufficient
    })

    return buildP2WPKHTx({
      selectedUtxos: selection.selected,
      toAddress: address,
      satoshis: amount,
      changeAddress: key.address,
      key
    })
  }
}
