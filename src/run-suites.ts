/**
 * Run Orchestrator
 *
 * Top-level driver: resolves the run seed, counts cases, resolves the name
 * filter, then walks suites -> cases -> iterations through the case executor
 * while keeping per-suite and per-run counters. Ends with the run summary and
 * one reproduction line per recorded failure.
 *
 * Expected conditions (no tests, filter miss, seed failure) never throw; they
 * are reported through the exit code and RunReport.error.
 */

import { createAssertTracker } from './assertions'
import type { AssertTracker } from './assertions'
import { executeCase } from './case-executor'
import type { CaseExecutorDeps } from './case-executor'
import type { Clock } from './clock'
import { createPerformanceClock, elapsedSeconds } from './clock'
import { clampIterations, resolveHarnessConfig } from './config'
import type { HarnessConfig } from './config'
import { FilterMissError, NoTestsError, SetupFailureError, describeError } from './errors'
import type { HarnessError } from './errors'
import { INVALID_EXEC_KEY, deriveExecKey, formatExecKey } from './exec-key'
import type { ExecKey } from './exec-key'
import { createFuzzer } from './fuzzer'
import type { Fuzzer } from './fuzzer'
import { finalResultLine, formatSeconds, summaryLine } from './internal/format'
import { createColorizer, createConsoleLogger } from './logger'
import type { Colorizer, Logger } from './logger'
import { RUN_SEED_LENGTH, generateRunSeed } from './run-seed'
import { createNodeTimerPlatform, createTimeoutGuard, exitProcess } from './timeout-guard'
import type { ExitHandler, TimerPlatform } from './timeout-guard'
import { TestResult } from './types'
import type { Counters, TestCase, TestSuite } from './types'

// ============================================================================
// Exit Codes
// ============================================================================

export const ExitCode = {
  PASSED: 0,
  FAILED: 1,
  /** Seed generation failed or the filter matched nothing */
  SETUP_FAILURE: 2,
  NO_TESTS: -1,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

// ============================================================================
// Types
// ============================================================================

export type RunOptions = {
  /** Used verbatim when non-empty; otherwise a seed is generated */
  runSeed?: string
  /** Non-zero key used for every iteration instead of derived keys */
  execKey?: ExecKey
  /** Suite or case name, matched case-insensitively */
  filter?: string
  /** Overrides the configured iteration count */
  iterations?: number
}

export type CounterSummary = Counters & { total: number }

export type SuiteReport = {
  name: string
  /** 1-based display index */
  index: number
  /** True when the suite was excluded by the filter */
  filtered: boolean
  counters: CounterSummary
  runtimeSeconds: number
}

export type FailureRecord = {
  testCase: TestCase
  suiteName: string
  runSeed: string
  iteration: number
  execKey: ExecKey
}

export type RunReport = {
  exitCode: ExitCode
  /** Null only when seed generation failed */
  runSeed: string | null
  totals: CounterSummary
  suites: SuiteReport[]
  failures: FailureRecord[]
  runtimeSeconds: number
  /** Why the run stopped before executing anything */
  error?: HarnessError
}

export type FilterSelection =
  | { kind: 'none' }
  | { kind: 'suite'; suiteName: string }
  | { kind: 'case'; suiteName: string; caseName: string }
  | { kind: 'miss'; filter: string }

export type HarnessDeps = {
  logger?: Logger
  clock?: Clock
  timerPlatform?: TimerPlatform
  exit?: ExitHandler
  assertions?: AssertTracker
  fuzzer?: Fuzzer
  generateSeed?: (length: number) => string
}

export type Harness = {
  readonly config: HarnessConfig
  runSuites(suites: readonly TestSuite[], options?: RunOptions): Promise<RunReport>
}

// ============================================================================
// Counting & Filtering
// ============================================================================

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

/**
 * Total number of declared cases, ignoring enablement.
 */
export function countTests(suites: readonly TestSuite[]): number {
  return suites.reduce((sum, suite) => sum + suite.cases.length, 0)
}

/**
 * Resolve a filter to a selection. Suite names are checked first across all
 * suites; only if none matches are case names checked, first match in
 * traversal order winning.
 */
export function resolveFilter(suites: readonly TestSuite[], filter?: string): FilterSelection {
  if (filter === undefined || filter.length === 0) return { kind: 'none' }

  const suite = suites.find((s) => sameName(s.name, filter))
  if (suite) return { kind: 'suite', suiteName: suite.name }

  for (const s of suites) {
    const testCase = s.cases.find((c) => sameName(c.name, filter))
    if (testCase) return { kind: 'case', suiteName: s.name, caseName: testCase.name }
  }

  return { kind: 'miss', filter }
}

function emptyCounters(): Counters {
  return { passed: 0, failed: 0, skipped: 0 }
}

function summarize(counters: Counters): CounterSummary {
  return { ...counters, total: counters.passed + counters.failed + counters.skipped }
}

function tally(counters: Counters, result: TestResult): void {
  if (result === TestResult.PASSED) {
    counters.passed++
  } else if (result === TestResult.SKIPPED) {
    counters.skipped++
  } else {
    counters.failed++
  }
}

// ============================================================================
// Harness
// ============================================================================

export function createHarness(config: Partial<HarnessConfig> = {}, deps: HarnessDeps = {}): Harness {
  const resolved = resolveHarnessConfig(config)
  const logger = deps.logger ?? createConsoleLogger()
  const clock = deps.clock ?? createPerformanceClock()
  const colors: Colorizer = createColorizer(resolved.color)
  const generateSeed = deps.generateSeed ?? ((length: number) => generateRunSeed(length, clock))

  const executorDeps: CaseExecutorDeps = {
    assertions: deps.assertions ?? createAssertTracker(logger),
    fuzzer: deps.fuzzer ?? createFuzzer(),
    guard: createTimeoutGuard({
      platform: deps.timerPlatform ?? createNodeTimerPlatform(),
      logger,
      exit: deps.exit ?? exitProcess,
    }),
    logger,
    colors,
  }

  const finish = (report: RunReport): RunReport => {
    logger.log(`Exit code: ${report.exitCode}`)
    return report
  }

  const listSuites = (suites: readonly TestSuite[]): void => {
    for (const suite of suites) {
      logger.log(`Test suite: ${suite.name}`)
      for (const testCase of suite.cases) {
        logger.log(`      test: ${testCase.name}${testCase.enabled ? '' : ' (disabled)'}`)
      }
    }
  }

  async function runSuites(suites: readonly TestSuite[], options: RunOptions = {}): Promise<RunReport> {
    const iterations = clampIterations(options.iterations ?? resolved.iterations)
    const forcedKey = options.execKey !== undefined && options.execKey !== INVALID_EXEC_KEY ? options.execKey : null
    const totals = emptyCounters()
    const suiteReports: SuiteReport[] = []
    const failures: FailureRecord[] = []

    const aborted = (exitCode: ExitCode, runSeed: string | null, error: HarnessError): RunReport =>
      finish({
        exitCode,
        runSeed,
        totals: summarize(totals),
        suites: suiteReports,
        failures,
        runtimeSeconds: 0,
        error,
      })

    // Seed resolution
    let runSeed: string
    if (options.runSeed !== undefined && options.runSeed.length > 0) {
      runSeed = options.runSeed
    } else {
      try {
        runSeed = generateSeed(RUN_SEED_LENGTH)
      } catch (error) {
        const reason = new SetupFailureError(`Generating a random seed failed: ${describeError(error)}`)
        logger.error(reason.message)
        return aborted(ExitCode.SETUP_FAILURE, null, reason)
      }
    }

    const runStart = clock.now()
    logger.log(`::::: Test Run /w seed '${runSeed}' started`)

    // Counting
    if (countTests(suites) === 0) {
      const reason = new NoTestsError('No tests to run?')
      logger.error(reason.message)
      return aborted(ExitCode.NO_TESTS, runSeed, reason)
    }

    // Filter resolution
    const selection = resolveFilter(suites, options.filter)
    switch (selection.kind) {
      case 'suite':
        logger.log(`Filtering: running only suite '${selection.suiteName}'`)
        break
      case 'case':
        logger.log(`Filtering: running only test '${selection.caseName}' in suite '${selection.suiteName}'`)
        break
      case 'miss': {
        const reason = new FilterMissError(`Filter '${selection.filter}' did not match any test suite/case.`)
        logger.error(reason.message)
        listSuites(suites)
        return aborted(ExitCode.SETUP_FAILURE, runSeed, reason)
      }
      default:
        break
    }

    const suiteFilter = selection.kind === 'suite' || selection.kind === 'case' ? selection.suiteName : null
    const caseFilter = selection.kind === 'case' ? selection.caseName : null

    // Suite loop
    for (const [suiteOffset, suite] of suites.entries()) {
      const suiteIndex = suiteOffset + 1

      if (suiteFilter !== null && !sameName(suiteFilter, suite.name)) {
        logger.log(`===== Test Suite ${suiteIndex}: '${suite.name}' ${colors.blue('skipped')}`)
        suiteReports.push({
          name: suite.name,
          index: suiteIndex,
          filtered: true,
          counters: summarize(emptyCounters()),
          runtimeSeconds: 0,
        })
        continue
      }

      const counters = emptyCounters()
      const suiteStart = clock.now()
      logger.log(`===== Test Suite ${suiteIndex}: '${suite.name}' started`)

      // Case loop
      for (const [caseOffset, testCase] of suite.cases.entries()) {
        const caseLabel = `${suiteIndex}.${caseOffset + 1}`

        if (caseFilter !== null && !sameName(caseFilter, testCase.name)) {
          logger.log(`===== Test Case ${caseLabel}: '${testCase.name}' ${colors.blue('skipped')}`)
          continue
        }

        const forceRun = caseFilter !== null && !testCase.enabled
        if (forceRun) {
          logger.log('Force run of disabled test since test filter was set')
        }

        const caseStart = clock.now()
        logger.log(colors.yellow(`----- Test Case ${caseLabel}: '${testCase.name}' started`))
        if (testCase.description !== undefined && testCase.description.length > 0) {
          logger.log(`Test Description: '${testCase.description}'`)
        }

        // Iteration loop
        let lastResult: TestResult = TestResult.SKIPPED
        for (let iteration = 1; iteration <= iterations; iteration++) {
          const execKey = forcedKey ?? deriveExecKey(runSeed, suite.name, testCase.name, iteration, logger)
          logger.log(`Test Iteration ${iteration}: execKey ${formatExecKey(execKey)}`)

          lastResult = await executeCase(executorDeps, suite, testCase, execKey, {
            forceRun,
            timeoutSeconds: resolved.timeoutSeconds,
            iteration,
          })

          tally(counters, lastResult)
          tally(totals, lastResult)

          if (lastResult !== TestResult.PASSED && lastResult !== TestResult.SKIPPED) {
            failures.push({ testCase, suiteName: suite.name, runSeed, iteration, execKey })
          }
        }

        const caseRuntime = elapsedSeconds(clock, caseStart)
        if (iterations > 1) {
          logger.log(`Runtime of ${iterations} iterations: ${formatSeconds(caseRuntime)} sec`)
          logger.log(`Average Test runtime: ${formatSeconds(caseRuntime / iterations, 5)} sec`)
        } else {
          logger.log(`Total Test runtime: ${formatSeconds(caseRuntime)} sec`)
        }

        switch (lastResult) {
          case TestResult.PASSED:
            logger.log(finalResultLine(colors, 'Test', testCase.name, colors.green('Passed')))
            break
          case TestResult.FAILED:
            logger.error(finalResultLine(colors, 'Test', testCase.name, colors.red('Failed')))
            break
          case TestResult.NO_ASSERTS:
            logger.error(finalResultLine(colors, 'Test', testCase.name, colors.blue('No Asserts')))
            break
          default:
            break
        }
      }

      const suiteRuntime = elapsedSeconds(clock, suiteStart)
      logger.log(`Total Suite runtime: ${formatSeconds(suiteRuntime)} sec`)

      if (counters.failed === 0) {
        logger.log(summaryLine(colors, 'Suite', counters))
        logger.log(finalResultLine(colors, 'Suite', suite.name, colors.green('Passed')))
      } else {
        logger.error(summaryLine(colors, 'Suite', counters))
        logger.error(finalResultLine(colors, 'Suite', suite.name, colors.red('Failed')))
      }

      suiteReports.push({
        name: suite.name,
        index: suiteIndex,
        filtered: false,
        counters: summarize(counters),
        runtimeSeconds: suiteRuntime,
      })
    }

    // Run summary
    const runRuntime = elapsedSeconds(clock, runStart)
    logger.log(`Total Run runtime: ${formatSeconds(runRuntime)} sec`)

    const exitCode: ExitCode = totals.failed === 0 ? ExitCode.PASSED : ExitCode.FAILED
    if (exitCode === ExitCode.PASSED) {
      logger.log(summaryLine(colors, 'Run', totals))
      logger.log(finalResultLine(colors, 'Run /w seed', runSeed, colors.green('Passed')))
    } else {
      logger.error(summaryLine(colors, 'Run', totals))
      logger.error(finalResultLine(colors, 'Run /w seed', runSeed, colors.red('Failed')))
    }

    if (failures.length > 0) {
      logger.log('Harness input to repro failures:')
      for (const failure of failures) {
        logger.log(colors.red(` --seed ${failure.runSeed} --filter ${failure.testCase.name}`))
      }
    }

    return finish({
      exitCode,
      runSeed,
      totals: summarize(totals),
      suites: suiteReports,
      failures,
      runtimeSeconds: runRuntime,
    })
  }

  return {
    config: resolved,
    runSuites,
  }
}

/**
 * One-shot entry point: build a harness, run the suites and return the exit
 * code.
 */
export async function runSuites(
  suites: readonly TestSuite[],
  options: RunOptions = {},
  config: Partial<HarnessConfig> = {},
  deps: HarnessDeps = {}
): Promise<ExitCode> {
  const report = await createHarness(config, deps).runSuites(suites, options)
  return report.exitCode
}
