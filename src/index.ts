export * from './client'
export * from './core'
export { runTest, createAccount } from './gtmetrix'
export type { RunTestOptions, RunTestResult } from './gtmetrix'
export { logger, setLogLevel, getLogLevel } from './logger'
export type { LogLevel, Logger } from './logger'
