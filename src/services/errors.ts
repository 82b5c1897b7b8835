/**
 * Structured Error Handling for the wallet core
 *
 * Provides consistent error types, codes, and handling across the wallet.
 * Codes follow JSON-RPC conventions so they can be surfaced to a host
 * application without translation.
 */

// Standard JSON-RPC error codes
export const ErrorCodes = {
  // JSON-RPC standard errors
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,

  // Application-specific errors (-32000 to -32099)
  GENERIC_ERROR: -32000,
  NO_KEY_AVAILABLE: -32001,
  KEY_DECODE_FAILED: -32002,
  KEY_DERIVATION_FAILED: -32003,
  INSUFFICIENT_FUNDS: -32004,
  INVALID_ADDRESS: -32005,
  INVALID_AMOUNT: -32006,
  SERVER_REJECTED: -32007,
  NETWORK_ERROR: -32008,
  SECRET_NOT_FOUND: -32009,
  ENCRYPTION_ERROR: -32010,
  DECRYPTION_ERROR: -32011,
  MNEMONIC_ENCODING_FAILED: -32012,
  SIGNATURE_ERROR: -32016
} as const

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes]

/**
 * Application error with structured code and context
 */
export class AppError extends Error {
  public readonly code: ErrorCode
  public readonly context?: Record<string, unknown>
  public readonly timestamp: number

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.GENERIC_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'AppError'
    this.code = code
    this.context = context
    this.timestamp = Date.now()

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  toJSON(): { code: number; message: string; data?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.context && { data: this.context })
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCode: ErrorCode = ErrorCodes.GENERIC_ERROR): AppError {
    if (error instanceof AppError) {
      return error
    }

    if (error instanceof Error) {
      return new AppError(error.message, defaultCode, { originalError: error.name }, { cause: error })
    }

    if (typeof error === 'string') {
      return new AppError(error, defaultCode)
    }

    return new AppError('An unknown error occurred', defaultCode)
  }
}

// Key custody errors

export class NoKeyAvailableError extends AppError {
  constructor() {
    super('No spending key available yet', ErrorCodes.NO_KEY_AVAILABLE)
    this.name = 'NoKeyAvailableError'
  }
}

export class KeyDecodeError extends AppError {
  constructor(
    message: string = 'Stored seed phrase could not be decoded',
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, ErrorCodes.KEY_DECODE_FAILED, context, { cause })
    this.name = 'KeyDecodeError'
  }
}

export class KeyDerivationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCodes.KEY_DERIVATION_FAILED, undefined, { cause })
    this.name = 'KeyDerivationError'
  }
}

export class MnemonicEncodingError extends AppError {
  constructor(entropyLength: number) {
    super(
      `Entropy must be 16 bytes, got ${entropyLength}`,
      ErrorCodes.MNEMONIC_ENCODING_FAILED,
      { entropyLength }
    )
    this.name = 'MnemonicEncodingError'
  }
}

// Wallet operation errors

export class InsufficientFundsError extends AppError {
  constructor(required: number, available: number) {
    super(
      `Insufficient funds: need ${required} sats, have ${available} sats`,
      ErrorCodes.INSUFFICIENT_FUNDS,
      { required, available }
    )
    this.name = 'InsufficientFundsError'
  }
}

export class InvalidAddressError extends AppError {
  constructor(address: string) {
    super(`Invalid address: ${address}`, ErrorCodes.INVALID_ADDRESS, { address })
    this.name = 'InvalidAddressError'
  }
}

export class InvalidAmountError extends AppError {
  constructor(amount: number, reason?: string) {
    super(
      reason || `Invalid amount: ${amount}`,
      ErrorCodes.INVALID_AMOUNT,
      { amount }
    )
    this.name = 'InvalidAmountError'
  }
}

export class SigningError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCodes.SIGNATURE_ERROR, undefined, { cause })
    this.name = 'SigningError'
  }
}

// Remote errors

/**
 * Transport-level failure (connection refused, DNS, timeout).
 * The only error kind the balance refresh retries.
 */
export class NetworkError extends AppError {
  constructor(message: string, endpoint?: string) {
    super(message, ErrorCodes.NETWORK_ERROR, endpoint ? { endpoint } : undefined)
    this.name = 'NetworkError'
  }
}

/**
 * The remote answered but refused the request (non-2xx status, bad body).
 */
export class ServerRejectionError extends AppError {
  constructor(message: string, status?: number, endpoint?: string) {
    super(message, ErrorCodes.SERVER_REJECTED, {
      ...(status !== undefined && { status }),
      ...(endpoint !== undefined && { endpoint })
    })
    this.name = 'ServerRejectionError'
  }
}

// Secret store errors

export class SecretNotFoundError extends AppError {
  constructor(key: string) {
    super(`No secret stored under ${key}`, ErrorCodes.SECRET_NOT_FOUND, { key })
    this.name = 'SecretNotFoundError'
  }
}

export class EncryptionError extends AppError {
  constructor(message: string = 'Encryption failed') {
    super(message, ErrorCodes.ENCRYPTION_ERROR)
    this.name = 'EncryptionError'
  }
}

export class DecryptionError extends AppError {
  constructor(message: string = 'Decryption failed - wrong passphrase or corrupted data') {
    super(message, ErrorCodes.DECRYPTION_ERROR)
    this.name = 'DecryptionError'
  }
}

/**
 * Type guard to check if a value is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

export function isTransportError(error: unknown): error is NetworkError {
  return error instanceof NetworkError
}

/**
 * Get user-friendly error message
 */
export function getUserMessage(error: unknown): string {
  if (error instanceof NetworkError) {
    return 'Network connection failed. Please check your internet connection.'
  }

  if (error instanceof NoKeyAvailableError) {
    return 'The wallet is still loading. Please try again in a moment.'
  }

  if (error instanceof AppError) {
    return error.message
  }

  if (error instanceof Error) {
    return error.message
  }

  return 'An unexpected error occurred'
}
