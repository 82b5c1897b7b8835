import { describe, it, expect } from 'vitest'
import {
  estimateFee,
  estimateSize,
  feeFromSerializedLength,
  FEE_RATE,
  HEADER_SIZE,
  PER_INPUT_SIZE,
  PER_OUTPUT_SIZE
} from './fees'

describe('Fee Calculation', () => {
  describe('constants', () => {
    it('should use the P2WPKH size model', () => {
      expect(HEADER_SIZE).toBe(10)
      expect(PER_INPUT_SIZE).toBe(113)
      expect(PER_OUTPUT_SIZE).toBe(31)
      expect(FEE_RATE).toBe(1)
    })
  })

  describe('estimateSize', () => {
    it('should report 0 bytes without inputs', () => {
      expect(estimateSize(0, 1)).toBe(0)
      expect(estimateSize(0, 2)).toBe(0)
    })

    it('should add header, inputs and outputs', () => {
      expect(estimateSize(1, 1)).toBe(154)
      expect(estimateSize(1, 2)).toBe(185)
      expect(estimateSize(2, 2)).toBe(298)
      expect(estimateSize(3, 2)).toBe(411)
    })

    it('should grow with every extra input or output', () => {
      for (let inputs = 1; inputs < 10; inputs++) {
        expect(estimateSize(inputs + 1, 1)).toBeGreaterThan(estimateSize(inputs, 1))
        expect(estimateSize(inputs, 2)).toBeGreaterThan(estimateSize(inputs, 1))
      }
    })
  })

  describe('estimateFee', () => {
    it('should charge the estimated size at the fixed rate', () => {
      expect(estimateFee(1, 2)).toBe(185)
      expect(estimateFee(0, 1)).toBe(0)
    })
  })

  describe('feeFromSerializedLength', () => {
    it('should charge the hex length', () => {
      expect(feeFromSerializedLength('00'.repeat(41))).toBe(82)
      expect(feeFromSerializedLength('')).toBe(0)
    })
  })
})
