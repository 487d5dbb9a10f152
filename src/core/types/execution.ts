import type { Instant } from '../clock'

export type MessageRole = 'system' | 'user' | 'assistant'

export interface Message {
  role: MessageRole
  content: string
}

export interface GenerationParams {
  maxTokens: number
  temperature?: number
  topP?: number
  stop?: string[]
}

// RequestSpec is one logical request, frozen once the scenario is expanded
export interface RequestSpec {
  readonly id: string
  readonly scenarioId: string
  readonly index: number
  readonly backend: string
  readonly model: string
  readonly messages: readonly Message[]
  readonly params: Readonly<GenerationParams>
  readonly timeoutMs: number
  readonly warmup: boolean
}

// Attempt is one try of a RequestSpec (0-based index)
export interface Attempt {
  readonly index: number
  readonly spec: RequestSpec
  readonly startedAt: Instant
}

export type TransportFailureCode = 'connection' | 'reset' | 'timeout' | 'protocol' | 'unknown'

export type BackendFailure =
  | { kind: 'transport'; code: TransportFailureCode; message: string }
  | { kind: 'http'; status: number; message: string; retryAfterMs?: number }

export interface TokenUsage {
  inputTokens?: number
  outputTokens?: number
  thinkingTokens?: number
  costUsd?: number
}

// Signals a backend yields, in order, for a single attempt
export type BackendSignal =
  | { type: 'dispatched' }
  | { type: 'first_byte' }
  | { type: 'token'; index: number; text?: string }
  | { type: 'completed'; usage?: TokenUsage }
  | { type: 'failed'; failure: BackendFailure }

export type LifecycleEvent = BackendSignal & { readonly at: Instant }

export interface IssueOptions {
  attempt: number
  timeoutMs: number
  signal: AbortSignal
}

/**
 * A remote inference API. `issue` returns a lazy, finite sequence of signals
 * that is consumed exactly once. Transport and protocol problems are reported
 * as a terminal `failed` signal rather than thrown.
 */
export interface Backend {
  readonly id: string
  readonly type: string
  issue(spec: RequestSpec, options: IssueOptions): AsyncIterable<BackendSignal>
  healthCheck?(): Promise<void>
}
