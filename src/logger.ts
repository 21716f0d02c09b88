/**
 * Logger Module
 *
 * Line-oriented logging used by every harness component. The harness never
 * writes to the console directly; it goes through an injected Logger so
 * embedding hosts and tests can capture the output.
 */

// ============================================================================
// Types
// ============================================================================

export type Logger = {
  log(message: string): void
  error(message: string): void
}

export type LogLevel = 'info' | 'error'

export type LogLine = {
  level: LogLevel
  message: string
}

export type MemoryLogger = Logger & {
  readonly lines: LogLine[]
  /** Message texts only, in emission order */
  messages(): string[]
  clear(): void
}

// ============================================================================
// Implementations
// ============================================================================

export function createConsoleLogger(): Logger {
  return {
    log(message) {
      console.log(message)
    },
    error(message) {
      console.error(message)
    },
  }
}

export function createMemoryLogger(): MemoryLogger {
  const lines: LogLine[] = []
  return {
    lines,
    log(message) {
      lines.push({ level: 'info', message })
    },
    error(message) {
      lines.push({ level: 'error', message })
    },
    messages() {
      return lines.map((line) => line.message)
    },
    clear() {
      lines.length = 0
    },
  }
}

// ============================================================================
// Colour
// ============================================================================

const ANSI_RED = '\u001B[0;31m'
const ANSI_GREEN = '\u001B[0;32m'
const ANSI_YELLOW = '\u001B[0;93m'
const ANSI_BLUE = '\u001B[0;94m'
const ANSI_RESET = '\u001B[0m'

export type Colorizer = {
  red(text: string): string
  green(text: string): string
  yellow(text: string): string
  blue(text: string): string
}

export function createColorizer(enabled: boolean): Colorizer {
  const wrap = (code: string) => (text: string) => (enabled ? `${code}${text}${ANSI_RESET}` : text)
  return {
    red: wrap(ANSI_RED),
    green: wrap(ANSI_GREEN),
    yellow: wrap(ANSI_YELLOW),
    blue: wrap(ANSI_BLUE),
  }
}
