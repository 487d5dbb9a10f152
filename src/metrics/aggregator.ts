import { randomUUID } from 'crypto'
import { MetricHistograms } from './metric-histograms'
import {
  AggregatedReport,
  ERROR_KINDS,
  ErrorKind,
  Outcome,
  RecentError,
  StatusCounts,
  TargetSummary,
  Termination,
} from '../core/types'

export interface MetricsAggregatorOptions {
  runId?: string
  relativeAccuracy?: number
  recentErrorLimit?: number
}

interface TargetState {
  backend: string
  model: string
  counts: StatusCounts
  histograms: MetricHistograms
}

function emptyCounts(): StatusCounts {
  return { total: 0, success: 0, failed: 0, cancelled: 0 }
}

function addCounts(target: StatusCounts, source: StatusCounts): void {
  target.total += source.total
  target.success += source.success
  target.failed += source.failed
  target.cancelled += source.cancelled
}

function bump(counts: StatusCounts, status: Outcome['status']): void {
  counts.total++
  counts[status]++
}

const targetKey = (backend: string, model: string) => `${backend}/${model}`

/**
 * MetricsAggregator folds Outcomes into histograms and counters, overall
 * and per backend/model target. Memory grows with the number of targets and
 * the histogram value range, never with the number of requests.
 */
export class MetricsAggregator {
  readonly runId: string
  private readonly relativeAccuracy: number
  private readonly recentErrorLimit: number
  private histograms: MetricHistograms
  private counts: StatusCounts = emptyCounts()
  private failedByKind = new Map<ErrorKind, number>()
  private attempts = { total: 0, retries: 0 }
  private tokens = { input: 0, output: 0, thinking: 0 }
  private costUsd = 0
  private byBackend = new Map<string, StatusCounts>()
  private byTarget = new Map<string, TargetState>()
  private recentErrors: RecentError[] = []
  private startTime: Date
  private endTime?: Date
  private termination: Termination = 'running'

  constructor(options: MetricsAggregatorOptions = {}) {
    this.runId = options.runId ?? randomUUID()
    this.relativeAccuracy = options.relativeAccuracy ?? 0.01
    this.recentErrorLimit = options.recentErrorLimit ?? 20
    this.histograms = MetricHistograms.create(this.relativeAccuracy)
    this.startTime = new Date()
  }

  /**
   * Rebuilds an aggregator from a report so that reports can be merged
   */
  static fromReport(report: AggregatedReport, options: Omit<MetricsAggregatorOptions, 'runId'> = {}): MetricsAggregator {
    const aggregator = new MetricsAggregator({
      runId: report.runId,
      relativeAccuracy: report.histograms.ttft.relativeAccuracy,
      recentErrorLimit: options.recentErrorLimit,
    })
    aggregator.histograms = MetricHistograms.fromSnapshot(report.histograms)
    aggregator.counts = {
      total: report.counts.total,
      success: report.counts.success,
      failed: report.counts.failed,
      cancelled: report.counts.cancelled,
    }
    for (const [kind, count] of Object.entries(report.counts.failedByKind)) {
      if (isErrorKind(kind) && count !== undefined) aggregator.failedByKind.set(kind, count)
    }
    aggregator.attempts = { ...report.attempts }
    aggregator.tokens = { ...report.tokens }
    aggregator.costUsd = report.costUsd
    aggregator.byBackend = breakdownFrom(report.breakdown.byBackend)
    aggregator.byTarget = targetsFrom(report.breakdown.byTarget)
    aggregator.recentErrors = report.recentErrors.slice(-aggregator.recentErrorLimit)
    aggregator.startTime = toDate(report.startTime)
    aggregator.endTime = toDate(report.endTime)
    aggregator.termination = report.termination
    return aggregator
  }

  /** Restarts the wall-clock window, e.g. when measurement begins after warmup */
  start(): void {
    this.startTime = new Date()
    this.endTime = undefined
    this.termination = 'running'
  }

  complete(termination: Exclude<Termination, 'running'>): void {
    this.endTime = new Date()
    this.termination = termination
  }

  ingest(outcome: Outcome): void {
    this.counts.total++
    bump(this.backendCounts(outcome.backend), outcome.status)
    const target = this.target(outcome.backend, outcome.model)
    bump(target.counts, outcome.status)

    this.attempts.total += outcome.attempts
    this.attempts.retries += Math.max(0, outcome.attempts - 1)

    if (outcome.status === 'success') {
      this.counts.success++
      if (outcome.metrics) {
        const metrics = outcome.metrics
        this.histograms.record(metrics)
        target.histograms.record(metrics)
        this.tokens.input += metrics.inputTokens
        this.tokens.output += metrics.outputTokens
        this.tokens.thinking += metrics.thinkingTokens ?? 0
        this.costUsd += metrics.costUsd ?? 0
      }
      return
    }

    if (outcome.status === 'cancelled') {
      this.counts.cancelled++
      return
    }

    this.counts.failed++
    const kind = outcome.errorKind ?? 'TransportError'
    this.failedByKind.set(kind, (this.failedByKind.get(kind) ?? 0) + 1)
    this.pushError({
      requestId: outcome.requestId,
      scenarioId: outcome.scenarioId,
      backend: outcome.backend,
      kind,
      message: outcome.error ?? kind,
    })
  }

  /**
   * Adds another aggregator's counts into this one. Bucket counts and
   * counters are order-independent; the recent-error list keeps the tail.
   */
  merge(other: MetricsAggregator): this {
    this.histograms.merge(other.histograms)
    addCounts(this.counts, other.counts)
    for (const [kind, count] of other.failedByKind) {
      this.failedByKind.set(kind, (this.failedByKind.get(kind) ?? 0) + count)
    }
    this.attempts.total += other.attempts.total
    this.attempts.retries += other.attempts.retries
    this.tokens.input += other.tokens.input
    this.tokens.output += other.tokens.output
    this.tokens.thinking += other.tokens.thinking
    this.costUsd += other.costUsd
    mergeBreakdown(this.byBackend, other.byBackend)
    for (const [key, target] of other.byTarget) {
      const existing = this.byTarget.get(key)
      if (existing) {
        addCounts(existing.counts, target.counts)
        existing.histograms.merge(target.histograms)
      } else {
        this.byTarget.set(key, { ...target, counts: { ...target.counts }, histograms: target.histograms.copy() })
      }
    }
    other.recentErrors.forEach((error) => this.pushError(error))

    if (other.startTime < this.startTime) this.startTime = other.startTime
    if (other.endTime && (!this.endTime || other.endTime > this.endTime)) this.endTime = other.endTime
    return this
  }

  /**
   * Plain-data copy of the current state; later ingestion does not change it
   */
  snapshot(): AggregatedReport {
    const endTime = this.endTime ? new Date(this.endTime.getTime()) : new Date()
    const durationMs = Math.max(0, endTime.getTime() - this.startTime.getTime())
    const finished = this.counts.success + this.counts.failed
    const failedByKind: Partial<Record<ErrorKind, number>> = {}
    for (const [kind, count] of this.failedByKind) {
      failedByKind[kind] = count
    }

    return {
      runId: this.runId,
      startTime: new Date(this.startTime.getTime()),
      endTime,
      durationMs,
      termination: this.termination,
      counts: {
        ...this.counts,
        failedByKind,
      },
      attempts: { ...this.attempts },
      distributions: this.histograms.summarize(),
      histograms: this.histograms.toSnapshot(),
      tokens: { ...this.tokens },
      costUsd: this.costUsd,
      requestsPerSecond: durationMs > 0 ? this.counts.success / (durationMs / 1000) : 0,
      successRate: finished > 0 ? this.counts.success / finished : 0,
      breakdown: {
        byBackend: copyBreakdown(this.byBackend),
        byTarget: this.targetSummaries(),
      },
      recentErrors: this.recentErrors.map((error) => ({ ...error })),
    }
  }

  isEmpty(): boolean {
    return this.counts.total === 0
  }

  private pushError(error: RecentError): void {
    if (this.recentErrorLimit === 0) return
    this.recentErrors.push(error)
    if (this.recentErrors.length > this.recentErrorLimit) {
      this.recentErrors.shift()
    }
  }

  private backendCounts(backend: string): StatusCounts {
    let counts = this.byBackend.get(backend)
    if (!counts) {
      counts = emptyCounts()
      this.byBackend.set(backend, counts)
    }
    return counts
  }

  private target(backend: string, model: string): TargetState {
    const key = targetKey(backend, model)
    let target = this.byTarget.get(key)
    if (!target) {
      target = { backend, model, counts: emptyCounts(), histograms: MetricHistograms.create(this.relativeAccuracy) }
      this.byTarget.set(key, target)
    }
    return target
  }

  private targetSummaries(): Record<string, TargetSummary> {
    const result: Record<string, TargetSummary> = {}
    for (const key of Array.from(this.byTarget.keys()).sort()) {
      const target = this.byTarget.get(key)
      if (!target) continue
      result[key] = {
        backend: target.backend,
        model: target.model,
        counts: { ...target.counts },
        distributions: target.histograms.summarize(),
        histograms: target.histograms.toSnapshot(),
      }
    }
    return result
  }
}

const ERROR_KIND_SET = new Set<string>(ERROR_KINDS)

function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KIND_SET.has(value)
}

// Reports read back from JSON carry ISO strings instead of Dates
function toDate(value: Date | string): Date {
  return typeof value === 'string' ? new Date(value) : new Date(value.getTime())
}

function mergeBreakdown(target: Map<string, StatusCounts>, source: Map<string, StatusCounts>): void {
  for (const [key, counts] of source) {
    const existing = target.get(key)
    if (existing) {
      addCounts(existing, counts)
    } else {
      target.set(key, { ...counts })
    }
  }
}

function breakdownFrom(source: Record<string, StatusCounts>): Map<string, StatusCounts> {
  const result = new Map<string, StatusCounts>()
  for (const [key, counts] of Object.entries(source)) {
    result.set(key, { ...counts })
  }
  return result
}

function targetsFrom(source: Record<string, TargetSummary>): Map<string, TargetState> {
  const result = new Map<string, TargetState>()
  for (const [key, target] of Object.entries(source)) {
    result.set(key, {
      backend: target.backend,
      model: target.model,
      counts: { ...target.counts },
      histograms: MetricHistograms.fromSnapshot(target.histograms),
    })
  }
  return result
}

function copyBreakdown(source: Map<string, StatusCounts>): Record<string, StatusCounts> {
  const result: Record<string, StatusCounts> = {}
  for (const key of Array.from(source.keys()).sort()) {
    const counts = source.get(key)
    if (counts) result[key] = { ...counts }
  }
  return result
}

/**
 * Merges two report snapshots into a new one
 */
export function mergeReports(a: AggregatedReport, b: AggregatedReport): AggregatedReport {
  const merged = MetricsAggregator.fromReport(a).merge(MetricsAggregator.fromReport(b))
  return merged.snapshot()
}

export function createMetricsAggregator(options?: MetricsAggregatorOptions): MetricsAggregator {
  return new MetricsAggregator(options)
}
