/**
 * Command-line adapter
 *
 * Parses the harness's standard arguments so a test program's entry point can
 * be re-invoked with the reproduction line the harness prints:
 *
 * ```ts
 * const code = await runHarnessCli(suites, process.argv.slice(2))
 * process.exit(code)
 * ```
 */

import { Command, CommanderError } from 'commander'
import { ConfigError, HarnessError, describeError } from './errors'
import { parseExecKey } from './exec-key'
import type { ExecKey } from './exec-key'
import { createConsoleLogger } from './logger'
import { ExitCode, createHarness } from './run-suites'
import type { HarnessDeps } from './run-suites'
import { MAX_TIMEOUT_SECONDS } from './timeout-guard'
import type { TestSuite } from './types'

// ============================================================================
// Types
// ============================================================================

export type HarnessCliOptions = {
  runSeed?: string
  execKey?: ExecKey
  filter?: string
  iterations?: number
  timeoutSeconds?: number
  color?: boolean
}

type RawOptions = {
  seed?: string
  execKey?: string
  filter?: string
  iterations?: string
  timeout?: string
  color?: boolean
}

// ============================================================================
// Parsing
// ============================================================================

function parseCount(flag: string, raw: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number.parseInt(raw, 10)
  if (!/^-?\d+$/.test(raw.trim()) || !Number.isFinite(parsed) || parsed < min) {
    throw new ConfigError(`${flag} expects an integer >= ${min}, got '${raw}'`)
  }
  if (parsed > max) {
    throw new ConfigError(`${flag} expects an integer <= ${max}, got '${raw}'`)
  }
  return parsed
}

/**
 * Parse harness arguments (without the node executable and script path).
 * Throws ConfigError for unknown options or invalid values.
 */
export function parseHarnessArgs(argv: readonly string[]): HarnessCliOptions {
  const program = new Command()
    .name('harness')
    .helpOption(false)
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} })
    .option('--seed <seed>', 'Run seed to derive execution keys from')
    .option('--exec-key <key>', 'Fixed execution key for every iteration (decimal or 0x hex)')
    .option('--filter <name>', 'Run only the suite or case with this name')
    .option('--iterations <n>', 'Iterations per case')
    .option('--timeout <seconds>', 'Per-case timeout in seconds')
    .option('--color', 'Colour result fragments with ANSI codes')

  try {
    program.parse([...argv], { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new ConfigError(error.message)
    }
    throw error
  }

  const raw = program.opts<RawOptions>()
  const options: HarnessCliOptions = {}

  if (raw.seed !== undefined) {
    if (raw.seed.length === 0) throw new ConfigError('--seed must not be empty')
    options.runSeed = raw.seed
  }
  if (raw.execKey !== undefined) {
    try {
      options.execKey = parseExecKey(raw.execKey)
    } catch (error) {
      throw new ConfigError(`--exec-key: ${describeError(error)}`)
    }
  }
  if (raw.filter !== undefined) options.filter = raw.filter
  if (raw.iterations !== undefined) options.iterations = parseCount('--iterations', raw.iterations, 1)
  if (raw.timeout !== undefined) {
    options.timeoutSeconds = parseCount('--timeout', raw.timeout, 0, MAX_TIMEOUT_SECONDS)
  }
  if (raw.color === true) options.color = true

  return options
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Parse `argv`, run the suites and return the exit code. Argument errors are
 * logged and reported as ExitCode.SETUP_FAILURE.
 */
export async function runHarnessCli(
  suites: readonly TestSuite[],
  argv: readonly string[],
  deps: HarnessDeps = {}
): Promise<number> {
  const logger = deps.logger ?? createConsoleLogger()

  let options: HarnessCliOptions
  try {
    options = parseHarnessArgs(argv)
  } catch (error) {
    if (error instanceof HarnessError) {
      logger.error(`Invalid harness arguments: ${error.message}`)
      return ExitCode.SETUP_FAILURE
    }
    throw error
  }

  const harness = createHarness(
    { timeoutSeconds: options.timeoutSeconds, color: options.color },
    { ...deps, logger }
  )
  const report = await harness.runSuites(suites, {
    runSeed: options.runSeed,
    execKey: options.execKey,
    filter: options.filter,
    iterations: options.iterations,
  })
  return report.exitCode
}
