/**
 * Segment 02: Execution Key Tests
 *
 * Keys are the first little-endian 64-bit word of the MD5 digest over
 * seed + suite + case + iteration + NUL.
 */

import { describe, it, expect } from 'vitest'
import {
  INVALID_EXEC_KEY,
  deriveExecKey,
  formatExecKey,
  isValidExecKey,
  parseExecKey,
} from '../src/exec-key'
import { InvalidArgumentError } from '../src/errors'
import { createMemoryLogger } from '../src/logger'

describe('Segment 02: Execution Keys', () => {
  describe('deriveExecKey', () => {
    it('matches known digests', () => {
      expect(deriveExecKey('ABCDEFGH12345678', 'Suite', 'Case', 1)).toBe(8407690713621582563n)
      expect(deriveExecKey('ABCDEFGH12345678', 'Suite', 'Case', 2)).toBe(14417404863598634668n)
      expect(deriveExecKey('SEED', 'Basics', 'add', 1)).toBe(6703392868093419645n)
    })

    it('is deterministic', () => {
      const first = deriveExecKey('RUNSEED', 'suite', 'case', 7)
      const second = deriveExecKey('RUNSEED', 'suite', 'case', 7)
      expect(first).toBe(second)
      expect(first).not.toBe(INVALID_EXEC_KEY)
    })

    it('returns the sentinel and logs for empty fields', () => {
      const logger = createMemoryLogger()
      expect(deriveExecKey('', 'suite', 'case', 1, logger)).toBe(INVALID_EXEC_KEY)
      expect(deriveExecKey('seed', '', 'case', 1, logger)).toBe(INVALID_EXEC_KEY)
      expect(deriveExecKey('seed', 'suite', '', 1, logger)).toBe(INVALID_EXEC_KEY)
      expect(logger.lines).toEqual([
        { level: 'error', message: 'Invalid runSeed string.' },
        { level: 'error', message: 'Invalid suiteName string.' },
        { level: 'error', message: 'Invalid testName string.' },
      ])
    })

    it('returns the sentinel for non-positive or fractional iterations', () => {
      const logger = createMemoryLogger()
      expect(deriveExecKey('seed', 'suite', 'case', 0, logger)).toBe(INVALID_EXEC_KEY)
      expect(deriveExecKey('seed', 'suite', 'case', -1)).toBe(INVALID_EXEC_KEY)
      expect(deriveExecKey('seed', 'suite', 'case', 1.5)).toBe(INVALID_EXEC_KEY)
      expect(logger.messages()).toEqual(['Invalid iteration count.'])
    })

    it('does not need a logger', () => {
      expect(deriveExecKey('', 'suite', 'case', 1)).toBe(INVALID_EXEC_KEY)
    })
  })

  describe('parseExecKey', () => {
    it('parses decimal and hex text', () => {
      expect(parseExecKey('42')).toBe(42n)
      expect(parseExecKey(' 0xff ')).toBe(255n)
      expect(parseExecKey('18446744073709551615')).toBe(18446744073709551615n)
    })

    it('round-trips through formatExecKey', () => {
      expect(formatExecKey(parseExecKey('8407690713621582563'))).toBe('8407690713621582563')
    })

    it('rejects zero, negatives, garbage and values beyond 64 bits', () => {
      expect(() => parseExecKey('0')).toThrow('Execution key must be non-zero')
      expect(() => parseExecKey('-5')).toThrow(InvalidArgumentError)
      expect(() => parseExecKey('abc')).toThrow(InvalidArgumentError)
      expect(() => parseExecKey('18446744073709551616')).toThrow('does not fit in 64 bits')
    })
  })

  describe('isValidExecKey', () => {
    it('accepts the 64-bit non-zero range', () => {
      expect(isValidExecKey(1n)).toBe(true)
      expect(isValidExecKey((1n << 64n) - 1n)).toBe(true)
      expect(isValidExecKey(0n)).toBe(false)
      expect(isValidExecKey(1n << 64n)).toBe(false)
    })
  })
})
