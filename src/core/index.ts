/**
 * Core module - types, errors, configuration and small utilities shared by
 * the client classes
 */

export * from './types'
export * from './errors'
export * from './config'
export * from './utils/sleep'
