import chalk from 'chalk'
import type { Severity } from '../types/index.js'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel
  quiet: boolean
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

let config: LoggerConfig = {
  level: 'info',
  quiet: false
}

/**
 * Configure the logger. Only the CLI entry point calls this.
 */
export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options }
}

function shouldLog(level: LogLevel): boolean {
  if (config.quiet && level !== 'error') {
    return false
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level]
}

/**
 * Format a log message with timestamp
 */
function formatMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString()
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`
  return `${prefix} ${message}`
}

// Diagnostics go to stderr so stdout stays reserved for reports
export function debug(message: string, ...args: unknown[]): void {
  if (shouldLog('debug')) {
    console.error(chalk.gray(formatMessage('debug', message)), ...args)
  }
}

export function info(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.error(chalk.blue(formatMessage('info', message)), ...args)
  }
}

export function warn(message: string, ...args: unknown[]): void {
  if (shouldLog('warn')) {
    console.error(chalk.yellow(formatMessage('warn', message)), ...args)
  }
}

export function error(message: string, ...args: unknown[]): void {
  if (shouldLog('error')) {
    console.error(chalk.red(formatMessage('error', message)), ...args)
  }
}

const SEVERITY_COLORS: Record<Severity, (s: string) => string> = {
  critical: chalk.bgRed.white,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.cyan,
  info: chalk.gray
}

/**
 * Print one finding line, coloured by severity
 */
export function finding(severity: Severity, message: string, location: string): void {
  if (config.quiet) {
    return
  }

  const severityLabel = SEVERITY_COLORS[severity](`[${severity.toUpperCase()}]`)
  console.error(`${severityLabel} ${message} (${chalk.dim(location)})`)
}

/**
 * Logger interface for named loggers
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

/**
 * Create a named logger instance
 */
export function createLogger(name: string): Logger {
  const prefix = (msg: string) => `[${name}] ${msg}`

  return {
    debug: (message: string, ...args: unknown[]) => debug(prefix(message), ...args),
    info: (message: string, ...args: unknown[]) => info(prefix(message), ...args),
    warn: (message: string, ...args: unknown[]) => warn(prefix(message), ...args),
    error: (message: string, ...args: unknown[]) => error(prefix(message), ...args)
  }
}

/**
 * Spinner on stderr while a scan runs; a no-op when quiet or not a TTY
 */
export function progress(message: string): { stop: (finalMessage?: string) => void } {
  if (config.quiet || !process.stderr.isTTY) {
    return { stop: () => {} }
  }

  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']
  let i = 0
  const interval = setInterval(() => {
    process.stderr.write(`\r${chalk.cyan(frames[i])} ${message}`)
    i = (i + 1) % frames.length
  }, 80)

  return {
    stop: (finalMessage?: string) => {
      clearInterval(interval)
      process.stderr.write('\r' + ' '.repeat(message.length + 5) + '\r')
      if (finalMessage) {
        console.error(finalMessage)
      }
    }
  }
}
