/**
 * Consolidated error system for seedharness.
 *
 * All error classes extend HarnessError, which carries a typed error code.
 * The run orchestrator maps these onto process exit codes; it never lets an
 * expected condition escape as an exception.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const HarnessErrorCode = {
  // Boundary validation
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  CONFIG: 'CONFIG',

  // Case execution
  SETUP_FAILURE: 'SETUP_FAILURE',
  TIMEOUT: 'TIMEOUT',

  // Run setup
  FILTER_MISS: 'FILTER_MISS',
  NO_TESTS: 'NO_TESTS',
} as const

export type HarnessErrorCode = (typeof HarnessErrorCode)[keyof typeof HarnessErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class HarnessError extends Error {
  readonly code: HarnessErrorCode

  constructor(code: HarnessErrorCode, message: string) {
    super(message)
    this.name = 'HarnessError'
    this.code = code
  }
}

// ============================================================================
// Boundary Errors
// ============================================================================

export class InvalidArgumentError extends HarnessError {
  constructor(message: string) {
    super(HarnessErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string) {
    super(HarnessErrorCode.CONFIG, message)
    this.name = 'ConfigError'
  }
}

// ============================================================================
// Execution Errors
// ============================================================================

export class SetupFailureError extends HarnessError {
  constructor(message: string) {
    super(HarnessErrorCode.SETUP_FAILURE, message)
    this.name = 'SetupFailureError'
  }
}

export class TimeoutError extends HarnessError {
  constructor(message: string) {
    super(HarnessErrorCode.TIMEOUT, message)
    this.name = 'TimeoutError'
  }
}

// ============================================================================
// Run Setup Errors
// ============================================================================

export class FilterMissError extends HarnessError {
  constructor(message: string) {
    super(HarnessErrorCode.FILTER_MISS, message)
    this.name = 'FilterMissError'
  }
}

export class NoTestsError extends HarnessError {
  constructor(message: string) {
    super(HarnessErrorCode.NO_TESTS, message)
    this.name = 'NoTestsError'
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Render an unknown thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
