/**
 * Assertion Tracker
 *
 * Counts passed and failed assertions for the case currently executing. The
 * case executor resets it before each execution and reads its summary to
 * classify the result.
 */

import type { Logger } from './logger'

// ============================================================================
// Types
// ============================================================================

export type AssertSummary = {
  passed: number
  failed: number
  total: number
}

export type AssertVerdict = 'passed' | 'failed' | 'noAsserts'

export type AssertTracker = {
  reset(): void
  /** Record `condition` as an assertion; returns it unchanged */
  assert(condition: boolean, message: string): boolean
  /** Record an assertion that passed unconditionally */
  pass(message: string): void
  summary(): AssertSummary
  toResult(): AssertVerdict
  logSummary(): void
}

// ============================================================================
// Implementation
// ============================================================================

export function createAssertTracker(logger: Logger): AssertTracker {
  let passed = 0
  let failed = 0

  const summary = (): AssertSummary => ({ passed, failed, total: passed + failed })

  return {
    reset() {
      passed = 0
      failed = 0
    },

    assert(condition, message) {
      if (condition) {
        passed++
        logger.log(`Assert '${message}': Passed`)
      } else {
        failed++
        logger.error(`Assert '${message}': Failed`)
      }
      return condition
    },

    pass(message) {
      passed++
      logger.log(`Assert '${message}': Pass`)
    },

    summary,

    toResult() {
      if (failed > 0) return 'failed'
      if (passed === 0) return 'noAsserts'
      return 'passed'
    },

    logSummary() {
      const { total } = summary()
      const line = `Assert Summary: Total=${total} Passed=${passed} Failed=${failed}`
      if (failed === 0) {
        logger.log(line)
      } else {
        logger.error(line)
      }
    },
  }
}
