/**
 * Clock Module
 *
 * Monotonic tick source used for run/suite/case timings and for seeding the
 * run-seed generator.
 */

export type Clock = {
  /** Current monotonic tick count */
  now(): number
  readonly ticksPerSecond: number
}

export function createPerformanceClock(): Clock {
  return {
    now: () => performance.now(),
    ticksPerSecond: 1000,
  }
}

/**
 * Seconds elapsed since `startTicks`. A negative delta (measurement noise)
 * is clamped to zero.
 */
export function elapsedSeconds(clock: Clock, startTicks: number): number {
  const seconds = (clock.now() - startTicks) / clock.ticksPerSecond
  return seconds < 0 ? 0 : seconds
}
