/**
 * Application Configuration
 *
 * Centralized configuration for all wallet constants and settings.
 * Static groups are `as const`; deployment-specific values are read from
 * the environment by {@link loadConfig}.
 *
 * @module config
 */

import { AppError, ErrorCodes } from '../services/errors'

// ============================================
// Network Configuration
// ============================================

export const NETWORK = {
  /** Bitcoin network the wallet operates on (signet shares testnet address parameters) */
  TYPE: 'signet' as const,

  /** BIP44 coin type for every test network */
  COIN_TYPE: 1,

  /** Default Esplora host; the signet API lives under /signet/api */
  DEFAULT_ESPLORA_URL: 'https://mempool.space',

  /** Esplora API prefix for signet */
  ESPLORA_API_PREFIX: '/signet/api'
} as const

// ============================================
// Timeouts and Retries
// ============================================

export const TIMEOUTS = {
  /** HTTP request timeout in milliseconds */
  HTTP_REQUEST_MS: 20000,

  /** Transport-level retries for 5xx / connection errors */
  HTTP_MAX_RETRIES: 5,

  /** Base delay for transport backoff */
  HTTP_RETRY_DELAY_MS: 100,

  /** Delay before the single balance refresh retry after a network failure */
  BALANCE_RETRY_DELAY_MS: 1000
} as const

// ============================================
// Transaction Configuration
// ============================================

export const TRANSACTION = {
  /** UTXO cache lifetime used for fee previews */
  UTXO_CACHE_TTL_MS: 60000,

  /** Forces a refetch (balance refresh and send) */
  UTXO_CACHE_BYPASS_MS: 0
} as const

// ============================================
// Security / Storage Configuration
// ============================================

export const SECURITY = {
  /** PBKDF2 iterations for deriving the at-rest encryption key */
  PBKDF2_ITERATIONS: 100000
} as const

export const STORAGE = {
  /** Secret store key holding the seed mnemonic */
  SEED_KEY: 'seed_mnemonic',

  /** Suffix of the entry holding each secret's IV */
  IV_SUFFIX: '_iv',

  /** Entry holding the store-wide PBKDF2 salt */
  SALT_KEY: '__salt'
} as const

// ============================================
// Runtime configuration
// ============================================

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error'

export interface WalletConfig {
  esploraUrl: string
  logLevel: LogLevelSetting
  secretPassphrase: string
  /** JSON file backing the secret store; in-memory when absent */
  storagePath?: string
  httpTimeoutMs: number
  /** Log entries kept in memory for export; 0 keeps none */
  logBufferSize: number
}

const LOG_LEVEL_SETTINGS: readonly LogLevelSetting[] = ['debug', 'info', 'warn', 'error']

function isLogLevel(value: string): value is LogLevelSetting {
  return LOG_LEVEL_SETTINGS.some(level => level === value)
}

/**
 * Map a raw environment value to a log level, falling back to `info`.
 */
export function resolveLogLevel(value: string | undefined): LogLevelSetting {
  const normalized = value?.trim().toLowerCase()
  return normalized && isLogLevel(normalized) ? normalized : 'info'
}

export class ConfigError extends AppError {
  constructor(public readonly variable: string, message: string) {
    super(`${variable}: ${message}`, ErrorCodes.INVALID_PARAMS, { variable })
    this.name = 'ConfigError'
  }
}

/**
 * Build the runtime configuration from environment variables.
 *
 * @throws {ConfigError} when a variable is present but unusable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WalletConfig {
  const esploraUrl = (env.WALLET_ESPLORA_URL ?? NETWORK.DEFAULT_ESPLORA_URL).replace(/\/+$/, '')
  if (!/^https?:\/\//.test(esploraUrl)) {
    throw new ConfigError('WALLET_ESPLORA_URL', 'must be an http(s) URL')
  }

  const secretPassphrase = env.WALLET_SECRET_PASSPHRASE
  if (!secretPassphrase) {
    throw new ConfigError('WALLET_SECRET_PASSPHRASE', 'is required to encrypt the seed at rest')
  }

  let httpTimeoutMs: number = TIMEOUTS.HTTP_REQUEST_MS
  if (env.WALLET_HTTP_TIMEOUT_MS !== undefined) {
    httpTimeoutMs = Number(env.WALLET_HTTP_TIMEOUT_MS)
    if (!Number.isInteger(httpTimeoutMs) || httpTimeoutMs <= 0) {
      throw new ConfigError('WALLET_HTTP_TIMEOUT_MS', 'must be a positive integer')
    }
  }

  let logBufferSize = 0
  if (env.WALLET_LOG_BUFFER !== undefined) {
    logBufferSize = Number(env.WALLET_LOG_BUFFER)
    if (!Number.isInteger(logBufferSize) || logBufferSize < 0) {
      throw new ConfigError('WALLET_LOG_BUFFER', 'must be a non-negative integer')
    }
  }

  return {
    esploraUrl,
    logLevel: resolveLogLevel(env.WALLET_LOG_LEVEL),
    secretPassphrase,
    storagePath: env.WALLET_STORAGE_PATH || undefined,
    httpTimeoutMs,
    logBufferSize
  }
}
