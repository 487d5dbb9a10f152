import pc from 'picocolors'
import { AggregatedReport, DistributionSummary, ErrorKind, MetricName, TargetSummary } from '../../core/types'

export interface CLIReporterOptions {
  showColors?: boolean
  showMetrics?: MetricName[]
  maxErrors?: number
  maxMessageLength?: number
}

const METRIC_LABELS: Record<MetricName, string> = {
  ttft: 'TTFT',
  totalLatency: 'Total latency',
  interTokenLatency: 'Inter-token',
  tokensPerSecond: 'Tokens/s',
}

type Color = 'green' | 'red' | 'yellow' | 'blue' | 'dim'

/**
 * CLI Reporter that renders an aggregated run report as a human-readable summary and table
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>
  private colors: ReturnType<typeof pc.createColors>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      showMetrics: options.showMetrics ?? ['ttft', 'totalLatency', 'interTokenLatency', 'tokensPerSecond'],
      maxErrors: options.maxErrors ?? 5,
      maxMessageLength: options.maxMessageLength ?? 100,
    }
    this.colors = pc.createColors(this.options.showColors)
  }

  generate(report: AggregatedReport): string {
    const lines: string[] = []

    lines.push(this.formatHeader(report))
    lines.push('')
    lines.push(...this.formatSummary(report))
    lines.push('')
    lines.push(this.formatTable(report))

    const targets = Object.entries(report.breakdown.byTarget)
    if (targets.length > 1) {
      lines.push('')
      lines.push(this.colorize('By target:', 'blue'))
      lines.push(this.formatTargetTable(targets))
    }

    const failures = this.formatFailures(report)
    if (failures.length > 0) {
      lines.push('')
      lines.push(...failures)
    }

    return lines.join('\n')
  }

  print(report: AggregatedReport): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(report))
  }

  private formatHeader(report: AggregatedReport): string {
    const duration = `${(report.durationMs / 1000).toFixed(1)}s`
    let status: string
    if (report.termination === 'completed') {
      status =
        report.counts.failed === 0
          ? this.colorize('✓ COMPLETED', 'green')
          : this.colorize('! COMPLETED WITH FAILURES', 'yellow')
    } else if (report.termination === 'running') {
      status = this.colorize('… RUNNING', 'blue')
    } else {
      status = this.colorize(`✗ ABORTED (${report.termination})`, 'red')
    }

    return `${status} Inference profile ${report.runId} (${duration})`
  }

  private formatSummary(report: AggregatedReport): string[] {
    const { counts, attempts, tokens } = report
    const lines = [
      `Requests: ${counts.total} total, ${counts.success} succeeded, ${counts.failed} failed, ${counts.cancelled} cancelled` +
        ` (success rate ${(report.successRate * 100).toFixed(1)}%)`,
      `Attempts: ${attempts.total} (${attempts.retries} retries)`,
      `Throughput: ${report.requestsPerSecond.toFixed(2)} req/s`,
    ]

    let tokenLine = `Tokens: ${tokens.input} in, ${tokens.output} out`
    if (tokens.thinking > 0) tokenLine += `, ${tokens.thinking} thinking`
    if (report.costUsd > 0) tokenLine += `, $${report.costUsd.toFixed(4)}`
    lines.push(tokenLine)

    return lines
  }

  private formatTable(report: AggregatedReport): string {
    const headers = ['Metric', 'Count', 'Mean', 'p50', 'p90', 'p99', 'Max']
    const rows = this.options.showMetrics.map((metric) =>
      this.formatDataRow(METRIC_LABELS[metric], report.distributions[metric]),
    )
    const colWidths = this.calculateColumnWidths(headers, rows)

    const lines: string[] = []
    lines.push(this.formatRow(headers, colWidths))
    lines.push(this.formatSeparator(colWidths))
    for (const row of rows) {
      lines.push(this.formatRow(row, colWidths))
    }

    return lines.join('\n')
  }

  // One row per backend/model so targets in a run can be compared side by side
  private formatTargetTable(targets: Array<[string, TargetSummary]>): string {
    const headers = ['Target', 'OK', 'TTFT p50', 'TTFT p99', 'Latency p50', 'Latency p99', 'Tokens/s']
    const rows = targets.map(([key, target]) => {
      const { ttft, totalLatency, tokensPerSecond } = target.distributions
      return [
        key,
        `${target.counts.success}/${target.counts.total}`,
        this.formatStat(ttft, ttft.p50),
        this.formatStat(ttft, ttft.p99),
        this.formatStat(totalLatency, totalLatency.p50),
        this.formatStat(totalLatency, totalLatency.p99),
        this.formatStat(tokensPerSecond, tokensPerSecond.mean),
      ]
    })
    const colWidths = this.calculateColumnWidths(headers, rows)

    const lines = [this.formatRow(headers, colWidths), this.formatSeparator(colWidths)]
    for (const row of rows) {
      lines.push(this.formatRow(row, colWidths))
    }

    return lines.join('\n')
  }

  private formatStat(summary: DistributionSummary, value: number): string {
    return summary.count === 0 ? '-' : this.formatValue(value, summary.unit)
  }

  private formatDataRow(label: string, summary: DistributionSummary): string[] {
    if (summary.count === 0) {
      return [label, '0', '-', '-', '-', '-', '-']
    }
    const values = [summary.mean, summary.p50, summary.p90, summary.p99, summary.max]
    return [label, String(summary.count), ...values.map((value) => this.formatValue(value, summary.unit))]
  }

  private formatValue(value: number, unit: DistributionSummary['unit']): string {
    return unit === 'ms' ? `${value.toFixed(1)}ms` : value.toFixed(1)
  }

  private formatFailures(report: AggregatedReport): string[] {
    const lines: string[] = []
    const byKind = Object.entries(report.counts.failedByKind)
      .filter((entry): entry is [ErrorKind, number] => typeof entry[1] === 'number' && entry[1] > 0)
      .sort((a, b) => b[1] - a[1])

    if (byKind.length > 0) {
      lines.push(this.colorize('Failures by kind:', 'red'))
      for (const [kind, count] of byKind) {
        lines.push(`  • ${kind}: ${count}`)
      }
    }

    const errors = report.recentErrors.slice(-this.options.maxErrors)
    if (errors.length > 0) {
      if (lines.length > 0) lines.push('')
      lines.push(this.colorize('Recent errors:', 'red'))
      for (const error of errors) {
        lines.push(`  • ${error.requestId} [${error.kind}] ${error.backend}: ${this.truncate(error.message)}`)
      }
    }

    return lines
  }

  private calculateColumnWidths(headers: string[], rows: string[][]): number[] {
    const widths = headers.map((header) => header.length)

    for (const row of rows) {
      row.forEach((cell, index) => {
        widths[index] = Math.max(widths[index] || 0, this.stripColors(cell).length)
      })
    }

    return widths.map((width) => Math.max(width, 6)) // Minimum 6 chars
  }

  private formatRow(cells: string[], widths: number[]): string {
    return cells
      .map((cell, index) => {
        const width = widths[index] || 0
        const padding = width - this.stripColors(cell).length
        return cell + ' '.repeat(Math.max(0, padding))
      })
      .join(' | ')
      .trimEnd()
  }

  private formatSeparator(widths: number[]): string {
    return widths.map((width) => '-'.repeat(width)).join('-+-')
  }

  private truncate(message: string): string {
    if (message.length <= this.options.maxMessageLength) {
      return message
    }
    return message.slice(0, this.options.maxMessageLength - 3) + '...'
  }

  private colorize(text: string, color: Color): string {
    return this.colors[color](text)
  }

  private stripColors(text: string): string {
    // eslint-disable-next-line no-control-regex
    return text.replace(/\x1b\[[0-9;]*m/g, '')
  }
}
