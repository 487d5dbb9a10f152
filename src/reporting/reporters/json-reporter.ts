import { writeFile } from 'fs/promises'
import {
  AggregatedReport,
  DistributionSummary,
  ErrorKind,
  HistogramSnapshot,
  MetricName,
  RecentError,
  StatusCounts,
  TargetSummary,
  Termination,
} from '../../core/types'

export interface JSONReporterOptions {
  includeHistograms?: boolean
  prettyPrint?: boolean
}

// Target histograms follow the top-level includeHistograms option
export type JSONTargetBreakdown = Omit<TargetSummary, 'histograms'> & {
  histograms?: Record<MetricName, HistogramSnapshot>
}

/**
 * JSON schema for machine-readable profiling reports
 */
export interface JSONReport {
  run: {
    id: string
    startTime: string // ISO string
    endTime: string // ISO string
    duration: number // milliseconds
    termination: Termination
    successRate: number
    requestsPerSecond: number
  }

  counts: StatusCounts & {
    failedByKind: Partial<Record<ErrorKind, number>>
  }

  attempts: {
    total: number
    retries: number
  }

  // Latencies in milliseconds, throughput in tokens per second
  distributions: Record<MetricName, DistributionSummary>

  // Mergeable histogram state, only when requested
  histograms?: Record<MetricName, HistogramSnapshot>

  tokens: {
    input: number
    output: number
    thinking: number
  }

  cost: {
    usd: number
  }

  breakdown: {
    byBackend: Record<string, StatusCounts>
    byTarget: Record<string, JSONTargetBreakdown>
  }

  errors: RecentError[]

  meta: {
    version: string
    generatedAt: string // ISO string
    generator: string
  }
}

/**
 * JSON Reporter that outputs machine-readable profiling results
 * for CI tools, dashboards and later merging
 */
export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      includeHistograms: options.includeHistograms ?? false,
      prettyPrint: options.prettyPrint ?? false,
    }
  }

  generate(report: AggregatedReport): string {
    const json = this.createReport(report)

    if (this.options.prettyPrint) {
      return JSON.stringify(json, null, 2)
    }

    return JSON.stringify(json)
  }

  async writeFile(report: AggregatedReport, filePath: string): Promise<void> {
    await writeFile(filePath, this.generate(report), 'utf-8')
  }

  createReport(report: AggregatedReport): JSONReport {
    const json: JSONReport = {
      run: {
        id: report.runId,
        startTime: report.startTime.toISOString(),
        endTime: report.endTime.toISOString(),
        duration: report.durationMs,
        termination: report.termination,
        successRate: report.successRate,
        requestsPerSecond: report.requestsPerSecond,
      },
      counts: report.counts,
      attempts: report.attempts,
      distributions: report.distributions,
      tokens: report.tokens,
      cost: { usd: report.costUsd },
      breakdown: {
        byBackend: report.breakdown.byBackend,
        byTarget: this.createTargets(report.breakdown.byTarget),
      },
      errors: report.recentErrors,
      meta: {
        version: '1.0.0',
        generatedAt: new Date().toISOString(),
        generator: 'inferprobe-json-reporter',
      },
    }

    if (this.options.includeHistograms) {
      json.histograms = report.histograms
    }

    return json
  }

  private createTargets(targets: Record<string, TargetSummary>): Record<string, JSONTargetBreakdown> {
    const result: Record<string, JSONTargetBreakdown> = {}
    for (const [key, target] of Object.entries(targets)) {
      const { histograms, ...summary } = target
      result[key] = this.options.includeHistograms ? { ...summary, histograms } : summary
    }
    return result
  }
}
