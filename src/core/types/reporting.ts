import type { ErrorKind } from './outcome'

export type Termination = 'running' | 'completed' | 'cancelled' | 'deadline' | 'exhausted'

export type AbortReason = Exclude<Termination, 'running' | 'completed'>

export interface DistributionSummary {
  unit: 'ms' | 'tokens/s'
  count: number
  min: number
  max: number
  mean: number
  stdDev: number
  p50: number
  p90: number
  p95: number
  p99: number
  p999: number
}

// Mergeable histogram state; buckets are [index, count] sorted by index
export interface HistogramSnapshot {
  relativeAccuracy: number
  count: number
  zeroCount: number
  sum: number
  min: number
  max: number
  mean: number
  m2: number
  buckets: Array<[number, number]>
}

export interface StatusCounts {
  total: number
  success: number
  failed: number
  cancelled: number
}

export interface RecentError {
  requestId: string
  scenarioId: string
  backend: string
  kind: ErrorKind
  message: string
}

export type MetricName = 'ttft' | 'totalLatency' | 'interTokenLatency' | 'tokensPerSecond'

// Per backend/model pair, keyed `${backend}/${model}`
export interface TargetSummary {
  backend: string
  model: string
  counts: StatusCounts
  distributions: Record<MetricName, DistributionSummary>
  histograms: Record<MetricName, HistogramSnapshot>
}

export interface AggregatedReport {
  runId: string
  startTime: Date
  endTime: Date
  durationMs: number
  termination: Termination
  counts: StatusCounts & {
    failedByKind: Partial<Record<ErrorKind, number>>
  }
  attempts: {
    total: number
    retries: number
  }
  distributions: Record<MetricName, DistributionSummary>
  histograms: Record<MetricName, HistogramSnapshot>
  tokens: {
    input: number
    output: number
    thinking: number
  }
  costUsd: number
  requestsPerSecond: number
  successRate: number
  breakdown: {
    byBackend: Record<string, StatusCounts>
    byTarget: Record<string, TargetSummary>
  }
  recentErrors: RecentError[]
}
