import { DistributionSummary, HistogramSnapshot } from '../core/types'

/**
 * Log-bucketed histogram with bounded relative error. A positive value v is
 * counted in bucket ceil(log_gamma(v)) where gamma = (1 + a) / (1 - a); any
 * quantile read back is within a relative error of `a` of a recorded value.
 * Values <= 0 share a single zero bucket.
 *
 * Mean and variance are tracked exactly with Welford's update so they do
 * not inherit the bucketing error.
 */
export class LogHistogram {
  readonly relativeAccuracy: number
  private readonly gamma: number
  private readonly logGamma: number
  private buckets = new Map<number, number>()
  private zeroCount = 0
  private count = 0
  private sum = 0
  private min = Infinity
  private max = -Infinity
  private mean = 0
  private m2 = 0

  constructor(relativeAccuracy = 0.01) {
    if (!(relativeAccuracy > 0 && relativeAccuracy < 1)) {
      throw new RangeError('relativeAccuracy must be between 0 and 1 (exclusive)')
    }
    this.relativeAccuracy = relativeAccuracy
    this.gamma = (1 + relativeAccuracy) / (1 - relativeAccuracy)
    this.logGamma = Math.log(this.gamma)
  }

  static fromSnapshot(snapshot: HistogramSnapshot): LogHistogram {
    const histogram = new LogHistogram(snapshot.relativeAccuracy)
    histogram.zeroCount = snapshot.zeroCount
    histogram.count = snapshot.count
    histogram.sum = snapshot.sum
    histogram.min = snapshot.count > 0 ? snapshot.min : Infinity
    histogram.max = snapshot.count > 0 ? snapshot.max : -Infinity
    histogram.mean = snapshot.mean
    histogram.m2 = snapshot.m2
    for (const [index, bucketCount] of snapshot.buckets) {
      histogram.buckets.set(index, bucketCount)
    }
    return histogram
  }

  get size(): number {
    return this.count
  }

  get bucketCount(): number {
    return this.buckets.size + (this.zeroCount > 0 ? 1 : 0)
  }

  record(value: number): void {
    if (!Number.isFinite(value)) return

    if (value <= 0) {
      this.zeroCount++
    } else {
      const index = Math.ceil(Math.log(value) / this.logGamma)
      this.buckets.set(index, (this.buckets.get(index) ?? 0) + 1)
    }

    this.count++
    this.sum += value
    this.min = Math.min(this.min, value)
    this.max = Math.max(this.max, value)
    const delta = value - this.mean
    this.mean += delta / this.count
    this.m2 += delta * (value - this.mean)
  }

  quantile(q: number): number {
    if (this.count === 0) return 0
    if (q <= 0) return this.min
    if (q >= 1) return this.max

    const rank = q * (this.count - 1)
    if (rank < this.zeroCount) return Math.max(this.min, 0)

    let cumulative = this.zeroCount
    for (const index of this.sortedIndices()) {
      cumulative += this.buckets.get(index) ?? 0
      if (cumulative > rank) {
        return this.clamp(this.bucketValue(index))
      }
    }
    return this.max
  }

  stdDev(): number {
    return this.count > 0 ? Math.sqrt(this.m2 / this.count) : 0
  }

  // Adds other's counts into this histogram
  merge(other: LogHistogram): this {
    if (other.relativeAccuracy !== this.relativeAccuracy) {
      throw new Error(
        `Cannot merge histograms with different accuracy (${this.relativeAccuracy} vs ${other.relativeAccuracy})`,
      )
    }
    if (other.count === 0) return this

    for (const [index, bucketCount] of other.buckets) {
      this.buckets.set(index, (this.buckets.get(index) ?? 0) + bucketCount)
    }

    const total = this.count + other.count
    const delta = other.mean - this.mean
    this.m2 = this.m2 + other.m2 + (delta * delta * this.count * other.count) / total
    this.mean = (this.mean * this.count + other.mean * other.count) / total
    this.zeroCount += other.zeroCount
    this.count = total
    this.sum += other.sum
    this.min = Math.min(this.min, other.min)
    this.max = Math.max(this.max, other.max)
    return this
  }

  toSnapshot(): HistogramSnapshot {
    return {
      relativeAccuracy: this.relativeAccuracy,
      count: this.count,
      zeroCount: this.zeroCount,
      sum: this.sum,
      min: this.count > 0 ? this.min : 0,
      max: this.count > 0 ? this.max : 0,
      mean: this.mean,
      m2: this.m2,
      buckets: this.sortedIndices().map((index): [number, number] => [index, this.buckets.get(index) ?? 0]),
    }
  }

  summarize(unit: DistributionSummary['unit'], scale = 1): DistributionSummary {
    const scaled = (value: number) => (this.count > 0 ? value / scale : 0)
    return {
      unit,
      count: this.count,
      min: scaled(this.min),
      max: scaled(this.max),
      mean: scaled(this.mean),
      stdDev: scaled(this.stdDev()),
      p50: scaled(this.quantile(0.5)),
      p90: scaled(this.quantile(0.9)),
      p95: scaled(this.quantile(0.95)),
      p99: scaled(this.quantile(0.99)),
      p999: scaled(this.quantile(0.999)),
    }
  }

  private sortedIndices(): number[] {
    return Array.from(this.buckets.keys()).sort((a, b) => a - b)
  }

  // Midpoint of the bucket (gamma^(i-1), gamma^i] in relative terms
  private bucketValue(index: number): number {
    return (2 * Math.pow(this.gamma, index)) / (this.gamma + 1)
  }

  private clamp(value: number): number {
    return Math.min(this.max, Math.max(this.min, value))
  }
}
