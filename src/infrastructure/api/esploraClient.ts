/**
 * Esplora API Client
 *
 * Blockchain data provider backed by an Esplora REST server. Only the two
 * calls the wallet needs are exposed: the address UTXO set and transaction
 * broadcast.
 *
 * HTTP failures are mapped onto the wallet error taxonomy:
 * no response at all → {@link NetworkError}; any answered failure →
 * {@link ServerRejectionError}.
 */

import { NETWORK, TIMEOUTS } from '../../config'
import type { Utxo } from '../../domain/types'
import { isValidTxid } from '../../domain/wallet/validation'
import { NetworkError, ServerRejectionError } from '../../services/errors'
import { apiLogger, logApiCall } from '../../services/logger'
import { createHttpClient, isTransportFailure, type HttpError } from './httpClient'

/**
 * Blockchain data provider consumed by the wallet engine
 */
export interface BlockchainProvider {
  fetchUnspentOutputs(address: string): Promise<Utxo[]>
  /** Broadcast a signed transaction; resolves with its txid */
  broadcast(rawTxHex: string): Promise<string>
}

export interface EsploraConfig {
  /** Server origin, e.g. https://mempool.space */
  baseUrl: string
  /** API prefix on that origin */
  apiPrefix: string
  timeout: number
  maxRetries: number
  fetchImpl?: typeof fetch
}

export const DEFAULT_ESPLORA_CONFIG: EsploraConfig = {
  baseUrl: NETWORK.DEFAULT_ESPLORA_URL,
  apiPrefix: NETWORK.ESPLORA_API_PREFIX,
  timeout: TIMEOUTS.HTTP_REQUEST_MS,
  maxRetries: TIMEOUTS.HTTP_MAX_RETRIES
}

/**
 * Wire shape of one entry of `GET /address/{address}/utxo`
 */
interface EsploraUtxo {
  txid: string
  vout: number
  value: number
  status: {
    confirmed: boolean
    block_height?: number
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
}

function isEsploraUtxo(value: unknown): value is EsploraUtxo {
  if (!isRecord(value)) return false
  const status = value.status
  if (!isRecord(status)) return false
  if (typeof status.confirmed !== 'boolean') return false
  if (status.confirmed && !isNonNegativeInteger(status.block_height)) return false

  return typeof value.txid === 'string' && isValidTxid(value.txid) &&
    isNonNegativeInteger(value.vout) &&
    isNonNegativeInteger(value.value)
}

function toUtxo(entry: EsploraUtxo): Utxo {
  const utxo: Utxo = {
    txid: entry.txid,
    vout: entry.vout,
    confirmed: entry.status.confirmed,
    value: entry.value
  }
  if (entry.status.confirmed) {
    utxo.blockHeight = entry.status.block_height
  }
  return utxo
}

/**
 * Parse the UTXO list, dropping entries that do not match the wire shape
 *
 * @throws {ServerRejectionError} If the body is not a list
 */
export function parseUtxoResponse(data: unknown, endpoint?: string): Utxo[] {
  if (!Array.isArray(data)) {
    throw new ServerRejectionError('Unexpected UTXO response: not a list', undefined, endpoint)
  }

  const utxos: Utxo[] = []
  for (const entry of data) {
    if (isEsploraUtxo(entry)) {
      utxos.push(toUtxo(entry))
    } else {
      apiLogger.warn('Dropping malformed UTXO entry', { endpoint })
    }
  }
  return utxos
}

function toProviderError(error: HttpError, endpoint: string): NetworkError | ServerRejectionError {
  if (isTransportFailure(error)) {
    return new NetworkError(error.message, endpoint)
  }
  return new ServerRejectionError(error.message, error.status, endpoint)
}

/**
 * Create an Esplora API client
 * Returns an object with methods - allows dependency injection
 */
export function createEsploraClient(config: Partial<EsploraConfig> = {}): BlockchainProvider {
  const cfg: EsploraConfig = { ...DEFAULT_ESPLORA_CONFIG, ...config }
  const http = createHttpClient({
    baseUrl: `${cfg.baseUrl.replace(/\/+$/, '')}${cfg.apiPrefix}`,
    timeout: cfg.timeout,
    maxRetries: cfg.maxRetries,
    fetchImpl: cfg.fetchImpl
  })

  return {
    async fetchUnspentOutputs(address: string): Promise<Utxo[]> {
      const path = `/address/${encodeURIComponent(address)}/utxo`
      const result = await http.getJson(path)
      if (!result.ok) {
        logApiCall(path, 'GET', result.error.status)
        throw toProviderError(result.error, path)
      }
      logApiCall(path, 'GET', 200)
      return parseUtxoResponse(result.value, path)
    },

    async broadcast(rawTxHex: string): Promise<string> {
      const path = '/tx'
      const result = await http.postText(path, rawTxHex)
      if (!result.ok) {
        logApiCall(path, 'POST', result.error.status)
        throw toProviderError(result.error, path)
      }
      logApiCall(path, 'POST', 200)

      const txid = result.value.trim()
      if (!isValidTxid(txid)) {
        throw new ServerRejectionError(`Broadcast returned an unexpected body: ${txid.slice(0, 80)}`, undefined, path)
      }
      return txid
    }
  }
}
