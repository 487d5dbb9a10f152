/**
 * Core module - the measurement pipeline and its shared types
 */

export * from './types'
export * from './config'
export * from './clock'
export * from './errors'
export { OutcomeClassifier, computeBackoff, errorKindOf, isRetryable } from './classifier'
export type { RetryDecision, RandomSource } from './classifier'
export { ConcurrencyController, createConcurrencyController } from './concurrency-controller'
export type { Permit } from './concurrency-controller'
export { TimingEngine, createTimingEngine } from './timing-engine'
export type { AttemptResult, FailedAttemptResult } from './timing-engine'
export { RequestExecutor, createRequestExecutor } from './executor'
export type { RequestState } from './executor'
export { expandScenarios } from './scenarios'
export { Runner, createRunner } from './runner'
export type { RunnerEvents, RunnerOptions } from './runner'
