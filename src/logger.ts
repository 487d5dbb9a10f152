import pc from 'picocolors'
import { format } from 'util'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

const envLevel = process.env.INFERPROBE_LOG_LEVEL
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel]
}

// stdout is reserved for reports (JSON in quiet mode), so everything goes to stderr
function write(prefix: string, message: unknown, args: unknown[]): void {
  process.stderr.write(`${prefix} ${format(message, ...args)}\n`)
}

export const logger = {
  debug(message: unknown, ...args: unknown[]): void {
    if (enabled('debug')) write(pc.gray('debug'), message, args)
  },
  info(message: unknown, ...args: unknown[]): void {
    if (enabled('info')) write(pc.cyan('info '), message, args)
  },
  warn(message: unknown, ...args: unknown[]): void {
    if (enabled('warn')) write(pc.yellow('warn '), message, args)
  },
  error(message: unknown, ...args: unknown[]): void {
    if (enabled('error')) write(pc.red('error'), message, args)
  },
}
