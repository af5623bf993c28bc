/* eslint-disable no-console */

import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const LEVEL_TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: pc.gray('[gtmetrix:debug]'),
  info: pc.cyan('[gtmetrix:info]'),
  warn: pc.yellow('[gtmetrix:warn]'),
  error: pc.red('[gtmetrix:error]'),
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_WEIGHTS, value)
}

function levelFromEnv(): LogLevel {
  const value = process.env.GTMETRIX_LOG_LEVEL?.toLowerCase()
  return value && isLogLevel(value) ? value : 'warn'
}

let currentLevel: LogLevel = levelFromEnv()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
  if (LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[currentLevel]) {
    return
  }
  // stdout is left to the caller; diagnostics go to stderr
  console.error(`${LEVEL_TAGS[level]} ${message}`, ...args)
}

export const logger = {
  debug: (message: string, ...args: unknown[]) => write('debug', message, args),
  info: (message: string, ...args: unknown[]) => write('info', message, args),
  warn: (message: string, ...args: unknown[]) => write('warn', message, args),
  error: (message: string, ...args: unknown[]) => write('error', message, args),
}

export type Logger = typeof logger
