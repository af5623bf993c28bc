export * from './json'
export * from './api'
export * from './config'
