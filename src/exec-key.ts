/**
 * Execution Key Module
 *
 * Derives the 64-bit key that seeds the fuzzer for one (suite, case, iteration)
 * execution. Derivation is a pure function of its inputs, which is what makes
 * `--seed <seed> --filter <case>` reproduce a failure exactly.
 *
 * Byte stream: seed, suite name, case name and the decimal iteration number
 * are concatenated without separators, followed by a single 0x00 byte. The
 * MD5 digest of that stream is read as little-endian 64-bit words and the
 * first word is the key.
 */

import { createHash } from 'node:crypto'
import { InvalidArgumentError } from './errors'
import type { Logger } from './logger'

// ============================================================================
// Types & Constants
// ============================================================================

/** Unsigned 64-bit execution key */
export type ExecKey = bigint

/** Returned by deriveExecKey for rejected input; never a valid key */
export const INVALID_EXEC_KEY: ExecKey = 0n

const MAX_EXEC_KEY: ExecKey = (1n << 64n) - 1n

// ============================================================================
// Derivation
// ============================================================================

function rejectionReason(
  seed: string,
  suiteName: string,
  caseName: string,
  iteration: number
): string | null {
  if (seed.length === 0) return 'Invalid runSeed string.'
  if (suiteName.length === 0) return 'Invalid suiteName string.'
  if (caseName.length === 0) return 'Invalid testName string.'
  if (!Number.isInteger(iteration) || iteration <= 0) return 'Invalid iteration count.'
  return null
}

/**
 * Derive the execution key for one iteration of a case.
 *
 * Returns INVALID_EXEC_KEY (and logs the reason, when a logger is given) if any
 * name is empty or the iteration is not a positive integer.
 */
export function deriveExecKey(
  seed: string,
  suiteName: string,
  caseName: string,
  iteration: number,
  logger?: Logger
): ExecKey {
  const reason = rejectionReason(seed, suiteName, caseName, iteration)
  if (reason !== null) {
    logger?.error(reason)
    return INVALID_EXEC_KEY
  }

  const text = Buffer.from(`${seed}${suiteName}${caseName}${iteration}`, 'utf8')
  const digest = createHash('md5')
    .update(Buffer.concat([text, Buffer.alloc(1)]))
    .digest()

  return digest.readBigUInt64LE(0)
}

// ============================================================================
// Text Form
// ============================================================================

export function formatExecKey(key: ExecKey): string {
  return key.toString(10)
}

/**
 * Parse a caller-forced execution key from decimal or `0x`-prefixed hex text.
 */
export function parseExecKey(text: string): ExecKey {
  const trimmed = text.trim()
  if (!/^(0x[0-9a-f]+|\d+)$/i.test(trimmed)) {
    throw new InvalidArgumentError(`Invalid execution key '${text}'`)
  }
  const key = BigInt(trimmed)
  if (key === INVALID_EXEC_KEY) {
    throw new InvalidArgumentError('Execution key must be non-zero')
  }
  if (key > MAX_EXEC_KEY) {
    throw new InvalidArgumentError(`Execution key '${text}' does not fit in 64 bits`)
  }
  return key
}

export function isValidExecKey(key: ExecKey): boolean {
  return key > INVALID_EXEC_KEY && key <= MAX_EXEC_KEY
}
