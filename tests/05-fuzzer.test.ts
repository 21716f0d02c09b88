/**
 * Segment 05: Fuzzer Tests
 *
 * The fuzzer must replay the same sequence for the same execution key.
 */

import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { createFuzzer, foldExecKey } from '../src/fuzzer'

describe('Segment 05: Fuzzer', () => {
  describe('foldExecKey', () => {
    it('xors the high word into the low word as a signed 32-bit value', () => {
      expect(foldExecKey(0n)).toBe(0)
      expect(foldExecKey(1n)).toBe(1)
      expect(foldExecKey(1n << 32n)).toBe(1)
      expect(foldExecKey(0xffffffffn)).toBe(-1)
      expect(foldExecKey((5n << 32n) | 3n)).toBe(6)
    })
  })

  describe('createFuzzer', () => {
    it('replays the same sequence for the same key', () => {
      const a = createFuzzer()
      const b = createFuzzer()
      a.init(8407690713621582563n)
      b.init(8407690713621582563n)

      const drawAll = (f: ReturnType<typeof createFuzzer>) => [
        f.integer(-100, 100),
        f.uint8(),
        f.sint32(),
        f.boolean(),
        f.asciiString(12),
      ]

      expect(drawAll(a)).toEqual(drawAll(b))
    })

    it('restarts the sequence on re-init', () => {
      const fuzzer = createFuzzer()
      fuzzer.init(42n)
      const first = [fuzzer.sint32(), fuzzer.sint32(), fuzzer.sint32()]
      fuzzer.init(42n)
      const second = [fuzzer.sint32(), fuzzer.sint32(), fuzzer.sint32()]

      expect(second).toEqual(first)
    })

    it('counts every draw and resets the count on init', () => {
      const fuzzer = createFuzzer()
      fuzzer.init(7n)
      expect(fuzzer.invocationCount()).toBe(0)

      fuzzer.uint8()
      fuzzer.boolean()
      fuzzer.draw(fc.constantFrom('x', 'y'))
      expect(fuzzer.invocationCount()).toBe(3)

      fuzzer.init(8n)
      expect(fuzzer.invocationCount()).toBe(0)
    })

    it('respects the requested ranges', () => {
      const fuzzer = createFuzzer()
      fuzzer.init(123456789n)
      for (let i = 0; i < 50; i++) {
        const n = fuzzer.integer(10, 20)
        expect(n).toBeGreaterThanOrEqual(10)
        expect(n).toBeLessThanOrEqual(20)
        const byte = fuzzer.uint8()
        expect(byte).toBeGreaterThanOrEqual(0)
        expect(byte).toBeLessThanOrEqual(255)
        expect(fuzzer.asciiString(5).length).toBeLessThanOrEqual(5)
      }
    })
  })
})
