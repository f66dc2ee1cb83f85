/**
 * Logger passed explicitly through the backend context.
 * Everything goes to stderr so stdout only carries the report.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const levelOrder: LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
  /** Same sink and level, prefix extended with `/scope` */
  child(scope: string): Logger
}

export interface ConsoleLoggerOptions {
  level?: LogLevel
  prefix?: string
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const level = options.level ?? 'warn'
  const prefix = options.prefix ?? 'spellsweep'
  const allow = (candidate: LogLevel) => levelOrder.indexOf(candidate) >= levelOrder.indexOf(level)
  const tag = `[${prefix}]`

  return {
    debug(message, ...details) {
      if (allow('debug')) console.error(tag, message, ...details)
    },
    info(message, ...details) {
      if (allow('info')) console.error(tag, message, ...details)
    },
    warn(message, ...details) {
      if (allow('warn')) console.warn(tag, message, ...details)
    },
    error(message, ...details) {
      if (allow('error')) console.error(tag, message, ...details)
    },
    child(scope) {
      return createConsoleLogger({ level, prefix: `${prefix}/${scope}` })
    },
  }
}

export function createSilentLogger(): Logger {
  const silent: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
    child() {
      return silent
    },
  }
  return silent
}

/** CLI verbosity (-v count) to level: 0 → warn, 1 → info, 2+ → debug */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) return 'debug'
  if (verbosity === 1) return 'info'
  return 'warn'
}
