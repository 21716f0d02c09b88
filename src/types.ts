/**
 * Shared Types
 *
 * Test case and suite declarations supplied by the caller, the context handed
 * to their callables, and the outcome/result vocabularies.
 */

import type { AssertTracker } from './assertions'
import type { ExecKey } from './exec-key'
import type { Fuzzer } from './fuzzer'
import type { Logger } from './logger'

// ============================================================================
// Outcomes & Results
// ============================================================================

/** Raw value a case body returns */
export const TestOutcome = {
  COMPLETED: 'completed',
  SKIPPED: 'skipped',
  /** Body began but never signalled completion */
  STARTED: 'started',
  ABORTED: 'aborted',
} as const

export type TestOutcome = (typeof TestOutcome)[keyof typeof TestOutcome]

/** Harness-level classification of one execution */
export const TestResult = {
  PASSED: 'passed',
  FAILED: 'failed',
  NO_ASSERTS: 'noAsserts',
  SKIPPED: 'skipped',
  SETUP_FAILURE: 'setupFailure',
} as const

export type TestResult = (typeof TestResult)[keyof typeof TestResult]

// ============================================================================
// Declarations
// ============================================================================

export type TestContext = {
  assert: AssertTracker
  fuzzer: Fuzzer
  logger: Logger
  execKey: ExecKey
  suiteName: string
  caseName: string
  iteration: number
}

export type TestCase = {
  name: string
  description?: string
  enabled: boolean
  run(ctx: TestContext): TestOutcome | Promise<TestOutcome>
}

export type TestSuite = {
  name: string
  /** Execution order; position + 1 is the display index */
  cases: readonly TestCase[]
  setUp?(ctx: TestContext): void | Promise<void>
  tearDown?(ctx: TestContext): void | Promise<void>
}

// ============================================================================
// Counters
// ============================================================================

export type Counters = {
  passed: number
  failed: number
  skipped: number
}
