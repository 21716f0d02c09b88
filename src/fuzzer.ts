/**
 * Fuzzer Module
 *
 * Randomized-input generator handed to case bodies. Every draw is seeded from
 * the execution key and the draw's position in the sequence, so the same key
 * always yields the same sequence of values.
 */

import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import type { ExecKey } from './exec-key'

// ============================================================================
// Types
// ============================================================================

export type Fuzzer = {
  /** Re-seed with an execution key and reset the invocation counter */
  init(key: ExecKey): void
  invocationCount(): number
  draw<T>(arbitrary: Arbitrary<T>): T
  integer(min: number, max: number): number
  uint8(): number
  sint32(): number
  boolean(): boolean
  asciiString(maxLength: number): string
}

// ============================================================================
// Seeding
// ============================================================================

/**
 * Fold a 64-bit key into the 32-bit seed space fast-check accepts.
 */
export function foldExecKey(key: ExecKey): number {
  return Number(BigInt.asIntN(32, key ^ (key >> 32n)))
}

// ============================================================================
// Implementation
// ============================================================================

export function createFuzzer(): Fuzzer {
  let baseSeed = 0
  let invocations = 0

  function draw<T>(arbitrary: Arbitrary<T>): T {
    const seed = (baseSeed + invocations) | 0
    invocations++
    const [value] = fc.sample(arbitrary, { seed, numRuns: 1 })
    return value
  }

  return {
    init(key) {
      baseSeed = foldExecKey(key)
      invocations = 0
    },

    invocationCount() {
      return invocations
    },

    draw,

    integer(min, max) {
      return draw(fc.integer({ min, max }))
    },

    uint8() {
      return draw(fc.integer({ min: 0, max: 255 }))
    },

    sint32() {
      return draw(fc.integer({ min: -0x80000000, max: 0x7fffffff }))
    },

    boolean() {
      return draw(fc.boolean())
    },

    asciiString(maxLength) {
      return draw(fc.string({ maxLength }))
    },
  }
}
