import { ClockUnavailableError } from './errors'

// Nanoseconds on a monotonic timeline; only differences are meaningful
export type Instant = bigint

export interface Clock {
  now(): Instant
}

export class MonotonicClock implements Clock {
  now(): Instant {
    return process.hrtime.bigint()
  }
}

/**
 * Returns the process-wide monotonic clock. There is no fallback to wall
 * time: if the high-resolution source is missing the run cannot be timed.
 */
export function createClock(): Clock {
  if (typeof process === 'undefined' || typeof process.hrtime?.bigint !== 'function') {
    throw new ClockUnavailableError('process.hrtime.bigint() is not available in this runtime')
  }
  return new MonotonicClock()
}

// Clock that only moves when told to
export class ManualClock implements Clock {
  private current: Instant

  constructor(start: Instant = 0n) {
    this.current = start
  }

  now(): Instant {
    return this.current
  }

  advanceNs(ns: number | bigint): void {
    const delta = BigInt(ns)
    if (delta < 0n) {
      throw new RangeError('ManualClock cannot move backwards')
    }
    this.current += delta
  }

  advanceMs(ms: number): void {
    this.advanceNs(msToNs(ms))
  }
}

export function elapsedNs(from: Instant, to: Instant): number {
  return Number(to - from)
}

export function nsToMs(ns: number): number {
  return ns / 1e6
}

export function msToNs(ms: number): number {
  return Math.round(ms * 1e6)
}
