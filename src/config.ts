/**
 * Harness Configuration
 *
 * Process-wide settings resolved once and passed to createHarness. Explicit
 * overrides win over environment values, which win over defaults.
 *
 * Environment:
 * - HARNESS_TIMEOUT_SECONDS: per-case ceiling (default 3600)
 * - HARNESS_ITERATIONS: iterations per case (default 1)
 * - HARNESS_COLOR: `1` or `true` enables ANSI colour
 */

import { ConfigError } from './errors'
import { DEFAULT_TIMEOUT_SECONDS, MAX_TIMEOUT_SECONDS } from './timeout-guard'

// ============================================================================
// Types
// ============================================================================

export type HarnessConfig = {
  /** Per-case watchdog ceiling in seconds */
  timeoutSeconds: number
  /** Iterations per case, at least 1 */
  iterations: number
  /** Wrap result fragments in ANSI colour codes */
  color: boolean
}

export type Environment = Record<string, string | undefined>

export const DEFAULT_HARNESS_CONFIG: HarnessConfig = {
  timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
  iterations: 1,
  color: false,
}

// ============================================================================
// Environment Parsing
// ============================================================================

function readPositiveInt(env: Environment, key: string, max: number = Number.MAX_SAFE_INTEGER): number | undefined {
  const envValue = env[key]
  if (envValue) {
    const parsed = parseInt(envValue, 10)
    if (!isNaN(parsed) && parsed > 0 && parsed <= max) {
      return parsed
    }
  }
  return undefined
}

function readFlag(env: Environment, key: string): boolean | undefined {
  const envValue = env[key]
  if (envValue === undefined || envValue === '') return undefined
  return envValue === '1' || envValue.toLowerCase() === 'true'
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Clamp an iteration count to the minimum of 1. Non-finite counts also
 * become 1.
 */
export function clampIterations(iterations: number): number {
  if (!Number.isFinite(iterations) || iterations < 1) return 1
  return Math.floor(iterations)
}

export function resolveHarnessConfig(
  overrides: Partial<HarnessConfig> = {},
  env: Environment = process.env
): HarnessConfig {
  if (overrides.timeoutSeconds !== undefined) {
    if (!Number.isFinite(overrides.timeoutSeconds) || overrides.timeoutSeconds < 0) {
      throw new ConfigError(`timeoutSeconds must be a non-negative number, got ${overrides.timeoutSeconds}`)
    }
    if (overrides.timeoutSeconds > MAX_TIMEOUT_SECONDS) {
      throw new ConfigError(`timeoutSeconds must not exceed ${MAX_TIMEOUT_SECONDS}, got ${overrides.timeoutSeconds}`)
    }
  }
  if (overrides.iterations !== undefined && !Number.isFinite(overrides.iterations)) {
    throw new ConfigError(`iterations must be a finite number, got ${overrides.iterations}`)
  }

  const timeoutSeconds =
    overrides.timeoutSeconds ??
    readPositiveInt(env, 'HARNESS_TIMEOUT_SECONDS', MAX_TIMEOUT_SECONDS) ??
    DEFAULT_HARNESS_CONFIG.timeoutSeconds
  const iterations =
    overrides.iterations ?? readPositiveInt(env, 'HARNESS_ITERATIONS') ?? DEFAULT_HARNESS_CONFIG.iterations
  const color = overrides.color ?? readFlag(env, 'HARNESS_COLOR') ?? DEFAULT_HARNESS_CONFIG.color

  return {
    timeoutSeconds,
    iterations: clampIterations(iterations),
    color,
  }
}
