/**
 * Tests for the wallet error taxonomy
 */

import { describe, it, expect } from 'vitest'
import {
  AppError,
  DecryptionError,
  ErrorCodes,
  getUserMessage,
  InsufficientFundsError,
  InvalidAddressError,
  InvalidAmountError,
  isAppError,
  isTransportError,
  KeyDecodeError,
  MnemonicEncodingError,
  NetworkError,
  NoKeyAvailableError,
  SecretNotFoundError,
  ServerRejectionError
} from './errors'

describe('errors', () => {
  describe('AppError', () => {
    it('should carry code, context and timestamp', () => {
      const error = new AppError('boom', ErrorCodes.INTERNAL_ERROR, { step: 'sign' })

      expect(error).toBeInstanceOf(Error)
      expect(error.name).toBe('AppError')
      expect(error.code).toBe(-32603)
      expect(error.context).toEqual({ step: 'sign' })
      expect(typeof error.timestamp).toBe('number')
    })

    it('should default to the generic code', () => {
      expect(new AppError('boom').code).toBe(ErrorCodes.GENERIC_ERROR)
    })

    it('should serialize to a JSON-RPC error object', () => {
      expect(new AppError('boom', ErrorCodes.INVALID_PARAMS, { field: 'amount' }).toJSON()).toEqual({
        code: -32602,
        message: 'boom',
        data: { field: 'amount' }
      })
      expect(new AppError('boom').toJSON()).toEqual({ code: -32000, message: 'boom' })
    })

    it('should keep the cause', () => {
      const cause = new Error('root')
      const error = new KeyDecodeError('wrapped', undefined, cause)
      expect(error.cause).toBe(cause)
    })
  })

  describe('AppError.fromUnknown', () => {
    it('should return AppErrors unchanged', () => {
      const original = new NoKeyAvailableError()
      expect(AppError.fromUnknown(original)).toBe(original)
    })

    it('should wrap plain errors', () => {
      const wrapped = AppError.fromUnknown(new TypeError('bad type'))
      expect(wrapped.message).toBe('bad type')
      expect(wrapped.context).toEqual({ originalError: 'TypeError' })
    })

    it('should wrap strings and other values', () => {
      expect(AppError.fromUnknown('text').message).toBe('text')
      expect(AppError.fromUnknown(42).message).toBe('An unknown error occurred')
    })
  })

  describe('specific errors', () => {
    it('should describe insufficient funds', () => {
      const error = new InsufficientFundsError(5154, 1000)
      expect(error.message).toBe('Insufficient funds: need 5154 sats, have 1000 sats')
      expect(error.code).toBe(ErrorCodes.INSUFFICIENT_FUNDS)
      expect(error.context).toEqual({ required: 5154, available: 1000 })
    })

    it('should name the rejected address and amount', () => {
      expect(new InvalidAddressError('nope').message).toBe('Invalid address: nope')
      expect(new InvalidAmountError(0).message).toBe('Invalid amount: 0')
      expect(new InvalidAmountError(0, 'Amount must be positive').message).toBe('Amount must be positive')
    })

    it('should report the entropy length', () => {
      expect(new MnemonicEncodingError(15).message).toBe('Entropy must be 16 bytes, got 15')
    })

    it('should only include the server rejection details it was given', () => {
      expect(new ServerRejectionError('bad', 400, '/tx').context).toEqual({ status: 400, endpoint: '/tx' })
      expect(new ServerRejectionError('bad').context).toEqual({})
    })

    it('should set distinct names', () => {
      expect(new SecretNotFoundError('seed').name).toBe('SecretNotFoundError')
      expect(new DecryptionError().name).toBe('DecryptionError')
      expect(new NetworkError('down').name).toBe('NetworkError')
    })
  })

  describe('type guards', () => {
    it('should recognise AppErrors', () => {
      expect(isAppError(new NetworkError('down'))).toBe(true)
      expect(isAppError(new Error('plain'))).toBe(false)
    })

    it('should treat only network errors as transport errors', () => {
      expect(isTransportError(new NetworkError('down'))).toBe(true)
      expect(isTransportError(new ServerRejectionError('bad', 500))).toBe(false)
    })
  })

  describe('getUserMessage', () => {
    it('should translate network and loading errors', () => {
      expect(getUserMessage(new NetworkError('ECONNREFUSED'))).toBe(
        'Network connection failed. Please check your internet connection.'
      )
      expect(getUserMessage(new NoKeyAvailableError())).toBe(
        'The wallet is still loading. Please try again in a moment.'
      )
    })

    it('should pass other messages through', () => {
      expect(getUserMessage(new InvalidAddressError('x'))).toBe('Invalid address: x')
      expect(getUserMessage(new Error('plain'))).toBe('plain')
      expect(getUserMessage(null)).toBe('An unexpected error occurred')
    })
  })
})
