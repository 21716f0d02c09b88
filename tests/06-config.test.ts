/**
 * Segment 06: Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { DEFAULT_HARNESS_CONFIG, clampIterations, resolveHarnessConfig } from '../src/config'
import { ConfigError } from '../src/errors'

describe('Segment 06: Configuration', () => {
  describe('resolveHarnessConfig', () => {
    it('falls back to defaults with an empty environment', () => {
      expect(resolveHarnessConfig({}, {})).toEqual({ timeoutSeconds: 3600, iterations: 1, color: false })
      expect(resolveHarnessConfig({}, {})).toEqual(DEFAULT_HARNESS_CONFIG)
    })

    it('reads the environment', () => {
      const env = { HARNESS_TIMEOUT_SECONDS: '30', HARNESS_ITERATIONS: '4', HARNESS_COLOR: 'true' }
      expect(resolveHarnessConfig({}, env)).toEqual({ timeoutSeconds: 30, iterations: 4, color: true })
    })

    it('ignores unparseable and non-positive environment numbers', () => {
      const env = { HARNESS_TIMEOUT_SECONDS: 'soon', HARNESS_ITERATIONS: '-2', HARNESS_COLOR: '0' }
      expect(resolveHarnessConfig({}, env)).toEqual({ timeoutSeconds: 3600, iterations: 1, color: false })
    })

    it('prefers explicit overrides over the environment', () => {
      const env = { HARNESS_TIMEOUT_SECONDS: '30', HARNESS_ITERATIONS: '4', HARNESS_COLOR: '1' }
      expect(resolveHarnessConfig({ timeoutSeconds: 5, iterations: 2, color: false }, env)).toEqual({
        timeoutSeconds: 5,
        iterations: 2,
        color: false,
      })
    })

    it('clamps explicit iterations below one', () => {
      expect(resolveHarnessConfig({ iterations: 0 }, {}).iterations).toBe(1)
      expect(resolveHarnessConfig({ iterations: -10 }, {}).iterations).toBe(1)
    })

    it('rejects invalid explicit values', () => {
      expect(() => resolveHarnessConfig({ timeoutSeconds: -1 }, {})).toThrow(ConfigError)
      expect(() => resolveHarnessConfig({ timeoutSeconds: Number.NaN }, {})).toThrow(ConfigError)
      expect(() => resolveHarnessConfig({ iterations: Number.POSITIVE_INFINITY }, {})).toThrow(
        'iterations must be a finite number, got Infinity'
      )
    })
  })

  describe('timeout ceiling', () => {
    it('accepts the largest timeout a timer can hold', () => {
      expect(resolveHarnessConfig({ timeoutSeconds: 2_147_483 }, {}).timeoutSeconds).toBe(2_147_483)
    })

    it('rejects an explicit timeout beyond the timer range', () => {
      expect(() => resolveHarnessConfig({ timeoutSeconds: 3_000_000 }, {})).toThrow(
        'timeoutSeconds must not exceed 2147483, got 3000000'
      )
    })

    it('ignores an environment timeout beyond the timer range', () => {
      expect(resolveHarnessConfig({}, { HARNESS_TIMEOUT_SECONDS: '3000000' }).timeoutSeconds).toBe(3600)
    })
  })

  describe('clampIterations', () => {
    it('keeps counts of one or more and floors fractions', () => {
      expect(clampIterations(1)).toBe(1)
      expect(clampIterations(3)).toBe(3)
      expect(clampIterations(2.7)).toBe(2)
      expect(clampIterations(0)).toBe(1)
      expect(clampIterations(0.5)).toBe(1)
    })

    it('turns non-finite counts into a single iteration', () => {
      expect(clampIterations(Number.NaN)).toBe(1)
      expect(clampIterations(Number.POSITIVE_INFINITY)).toBe(1)
      expect(clampIterations(Number.NEGATIVE_INFINITY)).toBe(1)
    })
  })
})
