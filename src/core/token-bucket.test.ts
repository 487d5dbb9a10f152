import { describe, it, expect } from '@jest/globals'
import { ManualClock } from './clock'
import { TokenBucket } from './token-bucket'

describe('TokenBucket', () => {
  it('should start full and allow a burst of capacity', () => {
    const clock = new ManualClock()
    const bucket = new TokenBucket(5, 3, clock)

    expect(bucket.tryTake()).toBe(true)
    expect(bucket.tryTake()).toBe(true)
    expect(bucket.tryTake()).toBe(true)
    expect(bucket.tryTake()).toBe(false)
  })

  it('should refill continuously at the configured rate', () => {
    const clock = new ManualClock()
    const bucket = new TokenBucket(5, 1, clock)

    expect(bucket.tryTake()).toBe(true)
    clock.advanceMs(100)
    expect(bucket.tryTake()).toBe(false)
    expect(bucket.msUntilAvailable()).toBe(100)

    clock.advanceMs(100)
    expect(bucket.tryTake()).toBe(true)
  })

  it('should never exceed capacity', () => {
    const clock = new ManualClock()
    const bucket = new TokenBucket(10, 2, clock)

    clock.advanceMs(60_000)

    expect(bucket.available()).toBe(2)
  })

  it('should report zero wait when a token is available', () => {
    const bucket = new TokenBucket(1, 1, new ManualClock())

    expect(bucket.msUntilAvailable()).toBe(0)
  })

  it('should reject invalid parameters', () => {
    const clock = new ManualClock()

    expect(() => new TokenBucket(0, 1, clock)).toThrow('rate must be positive')
    expect(() => new TokenBucket(1, 0, clock)).toThrow('capacity must be at least 1')
  })
})
