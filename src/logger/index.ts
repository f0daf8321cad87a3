// src/logger/index.ts
import { appendFileSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogSink = 'console' | 'file' | 'silent'

export interface Logger {
  debug(component: string, message: string, data?: object): void
  info(component: string, message: string, data?: object): void
  warn(component: string, message: string, data?: object): void
  error(component: string, message: string, error?: Error): void
}

export interface LoggerOptions {
  level: LogLevel
  sink: LogSink
  /** Required when sink is 'file' */
  file?: string
  /** Where console output goes, defaults to stderr */
  write?: (line: string) => void
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
}

export function formatEntry(
  level: LogLevel,
  component: string,
  message: string,
  extra?: object | Error
): string {
  const timestamp = new Date().toISOString()
  const levelStr = level.toUpperCase().padEnd(5)
  let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`

  if (extra) {
    if (extra instanceof Error) {
      entry += `\n  Error: ${extra.message}`
      if (extra.stack) {
        entry += `\n  Stack: ${extra.stack}`
      }
    } else {
      entry += `\n  ${JSON.stringify(extra)}`
    }
  }

  return entry
}

function consoleLine(level: LogLevel, component: string, message: string, extra?: object | Error): string {
  const tag = LEVEL_COLORS[level](level.toUpperCase().padEnd(5))
  let line = `${tag} ${chalk.bold(component)} ${message}`
  if (extra instanceof Error) {
    line += chalk.dim(` (${extra.message})`)
  } else if (extra) {
    line += chalk.dim(` ${JSON.stringify(extra)}`)
  }
  return line
}

/**
 * Create a logger for the given level and sink. Entries below `level` are
 * dropped before formatting.
 */
export function createLogger(options: LoggerOptions): Logger {
  if (options.sink === 'silent') {
    return createNullLogger()
  }

  const threshold = LOG_LEVELS.indexOf(options.level)
  let emit: (level: LogLevel, component: string, message: string, extra?: object | Error) => void

  if (options.sink === 'file') {
    const file = options.file
    if (!file) {
      throw new Error('Logger sink "file" requires a file path')
    }
    let initialized = false
    emit = (level, component, message, extra) => {
      if (!initialized) {
        mkdirSync(dirname(file), { recursive: true })
        initialized = true
      }
      appendFileSync(file, formatEntry(level, component, message, extra) + '\n')
    }
  } else {
    const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'))
    emit = (level, component, message, extra) => {
      write(consoleLine(level, component, message, extra))
    }
  }

  const log = (level: LogLevel, component: string, message: string, extra?: object | Error) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return
    emit(level, component, message, extra)
  }

  return {
    debug(component: string, message: string, data?: object) {
      log('debug', component, message, data)
    },

    info(component: string, message: string, data?: object) {
      log('info', component, message, data)
    },

    warn(component: string, message: string, data?: object) {
      log('warn', component, message, data)
    },

    error(component: string, message: string, error?: Error) {
      log('error', component, message, error)
    }
  }
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
  return {
    debug() {},
    info() {},
    warn() {},
    error() {}
  }
}
