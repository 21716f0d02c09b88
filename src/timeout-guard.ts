/**
 * Timeout Guard Module
 *
 * One-shot watchdog armed around every case execution. When it fires the
 * process is terminated: a hung case leaves the harness in an unknown state,
 * so counters and logs for the in-flight case are never finalized.
 *
 * Only asynchronous case bodies can be interrupted. A body that blocks the
 * event loop synchronously also blocks the timer callback.
 */

import { TimeoutError, describeError } from './errors'
import type { Logger } from './logger'

// ============================================================================
// Types
// ============================================================================

/** Process exit status used when the watchdog fires */
export const TEST_ABORTED_EXIT_CODE = -1

/** Default per-case ceiling in seconds */
export const DEFAULT_TIMEOUT_SECONDS = 3600

/** Longest delay a Node timer holds; larger delays fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 0x7fffffff

/** Largest whole-second timeout that fits MAX_TIMER_DELAY_MS */
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000)

export type TimerHandle = {
  readonly id: number
}

/** Platform one-shot timer primitive */
export type TimerPlatform = {
  /** Schedule `callback` after `ms`; null if the platform refuses */
  schedule(ms: number, callback: () => void): TimerHandle | null
  cancel(handle: TimerHandle): void
}

export type ExitHandler = (code: number, reason: TimeoutError) => void

export type TimeoutGuard = {
  arm(timeoutSeconds: number, onTimeout?: () => void): TimerHandle | null
  disarm(handle: TimerHandle | null): void
}

export type TimeoutGuardDeps = {
  platform: TimerPlatform
  logger: Logger
  exit: ExitHandler
}

// ============================================================================
// Node Platform
// ============================================================================

export function createNodeTimerPlatform(): TimerPlatform {
  const timers = new Map<number, ReturnType<typeof setTimeout>>()
  let nextId = 1

  return {
    schedule(ms, callback) {
      const id = nextId++
      const timer = setTimeout(() => {
        timers.delete(id)
        callback()
      }, ms)
      timers.set(id, timer)
      return { id }
    },
    cancel(handle) {
      const timer = timers.get(handle.id)
      if (timer === undefined) return
      clearTimeout(timer)
      timers.delete(handle.id)
    },
  }
}

export const exitProcess: ExitHandler = (code) => {
  process.exit(code)
}

// ============================================================================
// Guard
// ============================================================================

export function createTimeoutGuard(deps: TimeoutGuardDeps): TimeoutGuard {
  const { platform, logger, exit } = deps
  const fired = new Set<number>()

  const bailOut = (): void => {
    const reason = new TimeoutError('TestCaseTimeout timer expired. Aborting test run.')
    logger.error(reason.message)
    exit(TEST_ABORTED_EXIT_CODE, reason)
  }

  return {
    arm(timeoutSeconds, onTimeout = bailOut) {
      if (!Number.isFinite(timeoutSeconds) || timeoutSeconds < 0) {
        logger.error('Timeout value must be bigger than zero.')
        return null
      }

      const delayMs = timeoutSeconds * 1000
      if (delayMs > MAX_TIMER_DELAY_MS) {
        logger.error(`Timeout value must not exceed ${MAX_TIMEOUT_SECONDS} seconds; running without a watchdog.`)
        return null
      }

      let handle: TimerHandle | null = null
      try {
        handle = platform.schedule(delayMs, () => {
          if (handle !== null) {
            if (fired.has(handle.id)) return
            fired.add(handle.id)
          }
          onTimeout()
        })
      } catch (error) {
        logger.error(`Creation of timer failed: ${describeError(error)}`)
        return null
      }

      if (handle === null) {
        logger.error('Creation of timer failed: platform refused to schedule callback')
      }
      return handle
    },

    disarm(handle) {
      if (handle === null) return
      if (fired.delete(handle.id)) return
      platform.cancel(handle)
    },
  }
}
