/**
 * seedharness
 *
 * Public API exports
 */

// Error system
export {
  HarnessError, HarnessErrorCode,
  InvalidArgumentError, ConfigError,
  SetupFailureError, TimeoutError,
  FilterMissError, NoTestsError,
  describeError,
} from './errors'
export type { HarnessErrorCode as HarnessErrorCodeType } from './errors'

// Declarations & result vocabularies
export type { TestCase, TestSuite, TestContext, Counters } from './types'
export { TestOutcome, TestResult } from './types'

// Configuration
export type { HarnessConfig, Environment } from './config'
export { DEFAULT_HARNESS_CONFIG, resolveHarnessConfig, clampIterations } from './config'

// Logging
export type { Logger, LogLevel, LogLine, MemoryLogger, Colorizer } from './logger'
export { createConsoleLogger, createMemoryLogger, createColorizer } from './logger'

// Clock
export type { Clock } from './clock'
export { createPerformanceClock, elapsedSeconds } from './clock'

// Run seed & execution keys
export { RUN_SEED_LENGTH, RUN_SEED_ALPHABET, generateRunSeed } from './run-seed'
export type { ExecKey } from './exec-key'
export { INVALID_EXEC_KEY, deriveExecKey, parseExecKey, formatExecKey, isValidExecKey } from './exec-key'

// Timeout guard
export type { TimerHandle, TimerPlatform, TimeoutGuard, TimeoutGuardDeps, ExitHandler } from './timeout-guard'
export {
  TEST_ABORTED_EXIT_CODE, DEFAULT_TIMEOUT_SECONDS, MAX_TIMER_DELAY_MS, MAX_TIMEOUT_SECONDS,
  createTimeoutGuard, createNodeTimerPlatform, exitProcess,
} from './timeout-guard'

// Collaborators handed to case bodies
export type { AssertTracker, AssertSummary, AssertVerdict } from './assertions'
export { createAssertTracker } from './assertions'
export type { Fuzzer } from './fuzzer'
export { createFuzzer, foldExecKey } from './fuzzer'

// Case execution
export type { CaseExecutorDeps, ExecuteCaseOptions } from './case-executor'
export { executeCase, classifyOutcome } from './case-executor'

// Run orchestration
export type {
  RunOptions, RunReport, SuiteReport, FailureRecord, CounterSummary,
  FilterSelection, HarnessDeps, Harness,
} from './run-suites'
export { ExitCode, createHarness, runSuites, countTests, resolveFilter } from './run-suites'

// Command line
export type { HarnessCliOptions } from './cli'
export { parseHarnessArgs, runHarnessCli } from './cli'
