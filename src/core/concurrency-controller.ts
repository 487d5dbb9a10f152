import { EventEmitter } from 'events'
import { Clock, Instant } from './clock'
import { CancelledError } from './errors'
import { TokenBucket } from './token-bucket'
import { RateLimit } from './types'
import { logger } from '../logger'

export interface ConcurrencyControllerEvents {
  admitted: (info: { permitId: number; at: Instant; inFlight: number }) => void
  released: (info: { permitId: number; inFlight: number }) => void
}

export interface ConcurrencyControllerConfig {
  maxInFlight: number
  rateLimit?: RateLimit
  clock: Clock
}

export interface Permit {
  readonly id: number
  readonly admittedAt: Instant
  release(): void
}

interface Waiter {
  resolve: (permit: Permit) => void
  reject: (error: Error) => void
  signal?: AbortSignal
  onAbort?: () => void
}

/**
 * Admission control for attempts: at most `maxInFlight` permits are held at
 * once and, with a rate limit, permits are issued no faster than the token
 * bucket refills. Waiters are served strictly in arrival order.
 */
export class ConcurrencyController extends EventEmitter {
  private readonly config: ConcurrencyControllerConfig
  private readonly bucket?: TokenBucket
  private queue: Waiter[] = []
  private inFlight = 0
  private admittedTotal = 0
  private peakInFlight = 0
  private nextPermitId = 1
  private wakeTimer?: NodeJS.Timeout
  private closed = false

  constructor(config: ConcurrencyControllerConfig) {
    super()
    if (!Number.isInteger(config.maxInFlight) || config.maxInFlight < 1) {
      throw new RangeError('maxInFlight must be a positive integer')
    }
    this.config = config
    if (config.rateLimit) {
      this.bucket = new TokenBucket(config.rateLimit.requestsPerSecond, config.rateLimit.burst, config.clock)
    }
  }

  acquire(signal?: AbortSignal): Promise<Permit> {
    if (this.closed) {
      return Promise.reject(new CancelledError('Concurrency controller is closed'))
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Admission cancelled'))
    }

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal }

      if (signal) {
        waiter.onAbort = () => {
          this.removeWaiter(waiter)
          reject(new CancelledError('Admission cancelled'))
        }
        signal.addEventListener('abort', waiter.onAbort, { once: true })
      }

      this.queue.push(waiter)
      this.drain()
    })
  }

  async withPermit<T>(fn: (permit: Permit) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal)
    try {
      return await fn(permit)
    } finally {
      permit.release()
    }
  }

  getStatus() {
    return {
      inFlight: this.inFlight,
      waiting: this.queue.length,
      admitted: this.admittedTotal,
      peakInFlight: this.peakInFlight,
    }
  }

  // Rejects every waiter; permits already held stay valid until released
  close(): void {
    this.closed = true
    this.clearWakeTimer()
    const waiters = this.queue
    this.queue = []
    for (const waiter of waiters) {
      this.detach(waiter)
      waiter.reject(new CancelledError('Concurrency controller is closed'))
    }
  }

  private drain(): void {
    while (this.queue.length > 0 && this.inFlight < this.config.maxInFlight) {
      if (this.bucket && !this.bucket.tryTake()) {
        this.scheduleWake(this.bucket.msUntilAvailable())
        return
      }

      const waiter = this.queue.shift()
      if (!waiter) return
      this.detach(waiter)

      this.inFlight++
      this.admittedTotal++
      this.peakInFlight = Math.max(this.peakInFlight, this.inFlight)

      const permit = this.createPermit()
      this.emit('admitted', { permitId: permit.id, at: permit.admittedAt, inFlight: this.inFlight })
      waiter.resolve(permit)
    }
  }

  private createPermit(): Permit {
    const id = this.nextPermitId++
    let released = false

    return {
      id,
      admittedAt: this.config.clock.now(),
      release: () => {
        if (released) return
        released = true
        this.inFlight--
        this.emit('released', { permitId: id, inFlight: this.inFlight })
        this.drain()
      },
    }
  }

  private scheduleWake(delayMs: number): void {
    if (this.wakeTimer) return
    logger.debug(`Rate limit reached, next admission in ${delayMs}ms`)
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = undefined
      this.drain()
    }, delayMs)
  }

  private clearWakeTimer(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer)
      this.wakeTimer = undefined
    }
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.queue.indexOf(waiter)
    if (index !== -1) {
      this.queue.splice(index, 1)
    }
    if (this.queue.length === 0) {
      this.clearWakeTimer()
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort)
    }
  }
}

export function createConcurrencyController(config: ConcurrencyControllerConfig): ConcurrencyController {
  return new ConcurrencyController(config)
}
