export const ERROR_KINDS = [
  'TransportError',
  'ServerError',
  'RateLimited',
  'ClientError',
  'MalformedEventOrder',
  'RetriesExhausted',
  'Timeout',
] as const

export type ErrorKind = (typeof ERROR_KINDS)[number]

export type OutcomeStatus = 'success' | 'failed' | 'cancelled'

export interface InterTokenSummary {
  count: number
  minNs: number
  maxNs: number
  meanNs: number
}

export interface OutcomeMetrics {
  ttftNs: number
  totalDurationNs: number
  interToken: InterTokenSummary
  interTokenIntervalsNs: readonly number[]
  inputTokens: number
  outputTokens: number
  thinkingTokens?: number
  tokensPerSecond: number
  costUsd?: number
}

// Outcome is the single terminal record of a logical request
export interface Outcome {
  readonly requestId: string
  readonly scenarioId: string
  readonly backend: string
  readonly model: string
  readonly warmup: boolean
  readonly status: OutcomeStatus
  readonly errorKind?: ErrorKind
  readonly lastErrorKind?: ErrorKind
  readonly error?: string
  readonly attempts: number
  readonly backoffsMs: readonly number[]
  readonly metrics?: Readonly<OutcomeMetrics>
}
