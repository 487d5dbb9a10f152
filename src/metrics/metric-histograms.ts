import { LogHistogram } from './histogram'
import { DistributionSummary, HistogramSnapshot, MetricName, OutcomeMetrics } from '../core/types'

export const METRICS: readonly MetricName[] = ['ttft', 'totalLatency', 'interTokenLatency', 'tokensPerSecond']

const NS_PER_MS = 1e6

/**
 * One histogram per reported metric, all at the same relative accuracy.
 * Latencies are recorded in nanoseconds and summarized in milliseconds.
 */
export class MetricHistograms {
  private constructor(private readonly histograms: Record<MetricName, LogHistogram>) {}

  static create(relativeAccuracy: number): MetricHistograms {
    return new MetricHistograms({
      ttft: new LogHistogram(relativeAccuracy),
      totalLatency: new LogHistogram(relativeAccuracy),
      interTokenLatency: new LogHistogram(relativeAccuracy),
      tokensPerSecond: new LogHistogram(relativeAccuracy),
    })
  }

  static fromSnapshot(snapshot: Record<MetricName, HistogramSnapshot>): MetricHistograms {
    return new MetricHistograms({
      ttft: LogHistogram.fromSnapshot(snapshot.ttft),
      totalLatency: LogHistogram.fromSnapshot(snapshot.totalLatency),
      interTokenLatency: LogHistogram.fromSnapshot(snapshot.interTokenLatency),
      tokensPerSecond: LogHistogram.fromSnapshot(snapshot.tokensPerSecond),
    })
  }

  record(metrics: Readonly<OutcomeMetrics>): void {
    this.histograms.ttft.record(metrics.ttftNs)
    this.histograms.totalLatency.record(metrics.totalDurationNs)
    for (const interval of metrics.interTokenIntervalsNs) {
      this.histograms.interTokenLatency.record(interval)
    }
    this.histograms.tokensPerSecond.record(metrics.tokensPerSecond)
  }

  merge(other: MetricHistograms): this {
    for (const metric of METRICS) {
      this.histograms[metric].merge(other.histograms[metric])
    }
    return this
  }

  copy(): MetricHistograms {
    return MetricHistograms.fromSnapshot(this.toSnapshot())
  }

  summarize(): Record<MetricName, DistributionSummary> {
    return {
      ttft: this.histograms.ttft.summarize('ms', NS_PER_MS),
      totalLatency: this.histograms.totalLatency.summarize('ms', NS_PER_MS),
      interTokenLatency: this.histograms.interTokenLatency.summarize('ms', NS_PER_MS),
      tokensPerSecond: this.histograms.tokensPerSecond.summarize('tokens/s'),
    }
  }

  toSnapshot(): Record<MetricName, HistogramSnapshot> {
    return {
      ttft: this.histograms.ttft.toSnapshot(),
      totalLatency: this.histograms.totalLatency.toSnapshot(),
      interTokenLatency: this.histograms.interTokenLatency.toSnapshot(),
      tokensPerSecond: this.histograms.tokensPerSecond.toSnapshot(),
    }
  }
}
