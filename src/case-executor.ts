/**
 * Case Executor
 *
 * Runs one case once for one execution key:
 * fuzzer init -> assert reset -> arm watchdog -> suite setUp -> body ->
 * suite tearDown -> disarm -> classify.
 *
 * A failing setUp short-circuits to SETUP_FAILURE without running the body or
 * tearDown; the watchdog is still disarmed on that path. Exceptions thrown by
 * caller code never escape: a throwing body counts as aborted, a throwing
 * setUp as a setup failure, and a throwing tearDown is only logged.
 */

import type { AssertTracker, AssertVerdict } from './assertions'
import { describeError } from './errors'
import type { ExecKey } from './exec-key'
import type { Fuzzer } from './fuzzer'
import { finalResultLine } from './internal/format'
import type { Colorizer, Logger } from './logger'
import type { TimeoutGuard } from './timeout-guard'
import { TestOutcome, TestResult } from './types'
import type { TestCase, TestContext, TestSuite } from './types'

// ============================================================================
// Types
// ============================================================================

export type CaseExecutorDeps = {
  assertions: AssertTracker
  fuzzer: Fuzzer
  guard: TimeoutGuard
  logger: Logger
  colors: Colorizer
}

export type ExecuteCaseOptions = {
  /** Run even if the case is disabled */
  forceRun: boolean
  timeoutSeconds: number
  /** 1-based iteration number, exposed to the case through its context */
  iteration: number
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Map a body outcome onto a harness result. Skipped wins over any recorded
 * assertion failures; STARTED and ABORTED are failures regardless of asserts.
 */
export function classifyOutcome(outcome: TestOutcome, verdict: AssertVerdict): TestResult {
  switch (outcome) {
    case TestOutcome.SKIPPED:
      return TestResult.SKIPPED
    case TestOutcome.STARTED:
    case TestOutcome.ABORTED:
      return TestResult.FAILED
    default:
      break
  }
  if (verdict === 'failed') return TestResult.FAILED
  if (verdict === 'noAsserts') return TestResult.NO_ASSERTS
  return TestResult.PASSED
}

// ============================================================================
// Execution
// ============================================================================

export async function executeCase(
  deps: CaseExecutorDeps,
  suite: TestSuite,
  testCase: TestCase,
  execKey: ExecKey,
  options: ExecuteCaseOptions
): Promise<TestResult> {
  const { assertions, fuzzer, guard, logger, colors } = deps

  if (suite.name.length === 0 || testCase.name.length === 0) {
    logger.error('Setup failure: testSuite or testCase has no name')
    return TestResult.SETUP_FAILURE
  }

  if (!testCase.enabled && !options.forceRun) {
    logger.log(finalResultLine(colors, 'Test', testCase.name, 'Skipped (Disabled)'))
    return TestResult.SKIPPED
  }

  fuzzer.init(execKey)
  assertions.reset()

  const timer = guard.arm(options.timeoutSeconds)

  const ctx: TestContext = {
    assert: assertions,
    fuzzer,
    logger,
    execKey,
    suiteName: suite.name,
    caseName: testCase.name,
    iteration: options.iteration,
  }

  if (suite.setUp) {
    let setUpThrew = false
    try {
      await suite.setUp(ctx)
    } catch (error) {
      setUpThrew = true
      logger.error(`Suite setUp '${suite.name}' threw: ${describeError(error)}`)
    }
    if (setUpThrew || assertions.toResult() === 'failed') {
      guard.disarm(timer)
      logger.error(finalResultLine(colors, 'Suite Setup', suite.name, colors.red('Failed')))
      return TestResult.SETUP_FAILURE
    }
  }

  let outcome: TestOutcome
  try {
    outcome = await testCase.run(ctx)
  } catch (error) {
    logger.error(`Test '${testCase.name}' threw: ${describeError(error)}`)
    outcome = TestOutcome.ABORTED
  }

  // Teardown asserts must not affect the classification
  const verdict = assertions.toResult()

  if (suite.tearDown) {
    try {
      await suite.tearDown(ctx)
    } catch (error) {
      logger.error(`Suite tearDown '${suite.name}' threw: ${describeError(error)}`)
    }
  }

  guard.disarm(timer)

  const result = classifyOutcome(outcome, verdict)

  const fuzzerCount = fuzzer.invocationCount()
  if (fuzzerCount > 0) {
    logger.log(`Fuzzer invocations: ${fuzzerCount}`)
  }

  switch (outcome) {
    case TestOutcome.SKIPPED:
      logger.log(finalResultLine(colors, 'Test', testCase.name, colors.blue('Skipped (Programmatically)')))
      break
    case TestOutcome.STARTED:
      logger.error(
        finalResultLine(colors, 'Test', testCase.name, colors.red('Failed (test started, but did not return COMPLETED)'))
      )
      break
    case TestOutcome.ABORTED:
      logger.error(finalResultLine(colors, 'Test', testCase.name, colors.red('Failed (Aborted)')))
      break
    default:
      assertions.logSummary()
  }

  return result
}
