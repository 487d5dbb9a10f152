export { run, createScenario, validateConfig } from './inferprobe'
export type { RunOptions } from './api'

export * from './core'
export * from './backends'
export * from './metrics'
export * from './reporting'
export { logger, setLogLevel, getLogLevel, type LogLevel } from './logger'
