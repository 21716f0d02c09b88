/**
 * Log Line Formats
 *
 * Text shapes of the result, summary and runtime lines. Downstream log
 * scrapers match on these, so the plain (uncoloured) text must stay stable.
 */

import type { Colorizer } from '../logger'
import type { Counters } from '../types'

export function finalResultLine(colors: Colorizer, kind: string, name: string, result: string): string {
  return `${colors.yellow(`>>> ${kind} '${name}':`)} ${result}`
}

export function summaryLine(colors: Colorizer, kind: string, counters: Counters): string {
  const total = counters.passed + counters.failed + counters.skipped
  const failedColor = counters.failed === 0 ? colors.green : colors.red
  return [
    `${kind} Summary: Total=${total}`,
    colors.green(`Passed=${counters.passed}`),
    failedColor(`Failed=${counters.failed}`),
    colors.blue(`Skipped=${counters.skipped}`),
  ].join(' ')
}

export function formatSeconds(seconds: number, digits: number = 1): string {
  return seconds.toFixed(digits)
}
