/**
 * Run Seed Module
 *
 * Generates the human-shareable seed a run derives all of its execution keys
 * from. The string itself is not reproducible; only the keys derived from it
 * are.
 */

import * as fc from 'fast-check'
import type { Clock } from './clock'
import { createPerformanceClock } from './clock'
import { InvalidArgumentError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const RUN_SEED_LENGTH = 16

export const RUN_SEED_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ'

// ============================================================================
// Generation
// ============================================================================

/**
 * Generate a run seed of `length` characters from RUN_SEED_ALPHABET.
 *
 * The pseudo-random stream is private to the call and seeded from the
 * clock's current tick count. Not suitable for anything security related.
 */
export function generateRunSeed(length: number, clock: Clock = createPerformanceClock()): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidArgumentError('The length of the harness seed must be >0.')
  }

  const seedFromClock = Math.trunc(clock.now() * 1000) | 0
  const chars = fc.array(fc.constantFrom(...RUN_SEED_ALPHABET), {
    minLength: length,
    maxLength: length,
  })
  const [sampled] = fc.sample(chars, { seed: seedFromClock, numRuns: 1 })
  if (sampled === undefined || sampled.length !== length) {
    throw new InvalidArgumentError(`Generated seed has unexpected length (wanted ${length})`)
  }
  return sampled.join('')
}
