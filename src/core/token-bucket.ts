import { Clock, Instant } from './clock'

/**
 * Token bucket refilled continuously at `ratePerSecond`, holding at most
 * `capacity` tokens. Starts full.
 */
export class TokenBucket {
  private tokens: number
  private lastRefill: Instant

  constructor(
    private readonly ratePerSecond: number,
    private readonly capacity: number,
    private readonly clock: Clock,
  ) {
    if (!(ratePerSecond > 0)) {
      throw new RangeError('Token bucket rate must be positive')
    }
    if (!(capacity >= 1)) {
      throw new RangeError('Token bucket capacity must be at least 1')
    }
    this.tokens = capacity
    this.lastRefill = clock.now()
  }

  tryTake(): boolean {
    this.refill()
    if (this.tokens >= 1) {
      this.tokens -= 1
      return true
    }
    return false
  }

  available(): number {
    this.refill()
    return this.tokens
  }

  // Milliseconds until one whole token is available (0 when one is)
  msUntilAvailable(): number {
    this.refill()
    if (this.tokens >= 1) return 0
    return Math.max(1, Math.ceil(((1 - this.tokens) / this.ratePerSecond) * 1000))
  }

  private refill(): void {
    const now = this.clock.now()
    const elapsed = Number(now - this.lastRefill)
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.ratePerSecond) / 1e9)
      this.lastRefill = now
    }
  }
}
