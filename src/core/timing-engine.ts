import { Clock, Instant, elapsedNs } from './clock'
import { Attempt, Backend, BackendFailure, BackendSignal, LifecycleEvent, OutcomeMetrics, TokenUsage } from './types'
import { logger } from '../logger'

export type AttemptResult =
  | { kind: 'completed'; metrics: OutcomeMetrics }
  | { kind: 'failed'; failure: BackendFailure; elapsedNs: number }
  | { kind: 'timeout'; timeoutMs: number; elapsedNs: number }
  | { kind: 'malformed'; reason: string; elapsedNs: number }

export type FailedAttemptResult = Exclude<AttemptResult, { kind: 'completed' }>

export interface RunAttemptOptions {
  timeoutMs: number
}

const TIMED_OUT: unique symbol = Symbol('timed-out')

type Phase = 'idle' | 'dispatched' | 'streaming' | 'terminal'

/**
 * Validates the order of stamped events for one attempt and derives its
 * timings. Returns a violation message instead of throwing.
 */
class Timeline {
  private phase: Phase = 'idle'
  private dispatchedAt?: Instant
  private firstByteAt?: Instant
  private lastTokenAt?: Instant
  private tokenCount = 0
  private intervals: number[] = []
  private intervalMinNs = Infinity
  private intervalMaxNs = 0
  private intervalSumNs = 0
  private terminal?: LifecycleEvent

  push(event: LifecycleEvent): string | undefined {
    if (this.phase === 'terminal') {
      return `"${event.type}" received after the terminal event`
    }

    switch (event.type) {
      case 'dispatched':
        if (this.phase !== 'idle') return '"dispatched" received more than once'
        this.dispatchedAt = event.at
        this.phase = 'dispatched'
        return undefined

      case 'first_byte':
        if (this.phase === 'idle') return '"first_byte" received before "dispatched"'
        if (this.phase === 'streaming') return '"first_byte" received more than once'
        this.firstByteAt = event.at
        this.phase = 'streaming'
        return undefined

      case 'token':
        if (this.phase !== 'streaming') return `token ${event.index} received before "first_byte"`
        if (event.index !== this.tokenCount) {
          return `token index ${event.index} out of order, expected ${this.tokenCount}`
        }
        if (this.lastTokenAt !== undefined) {
          this.recordInterval(elapsedNs(this.lastTokenAt, event.at))
        }
        this.lastTokenAt = event.at
        this.tokenCount++
        return undefined

      case 'completed':
        if (this.phase !== 'streaming') return '"completed" received before "first_byte"'
        this.terminal = event
        this.phase = 'terminal'
        return undefined

      case 'failed':
        this.terminal = event
        this.phase = 'terminal'
        return undefined
    }
  }

  get terminalEvent(): LifecycleEvent | undefined {
    return this.terminal
  }

  metrics(completedAt: Instant, usage: TokenUsage | undefined): OutcomeMetrics {
    const dispatchedAt = this.dispatchedAt ?? completedAt
    const totalDurationNs = elapsedNs(dispatchedAt, completedAt)
    const outputTokens = usage?.outputTokens ?? this.tokenCount
    const intervals = this.intervals

    return {
      ttftNs: elapsedNs(dispatchedAt, this.firstByteAt ?? completedAt),
      totalDurationNs,
      interToken: {
        count: intervals.length,
        minNs: intervals.length > 0 ? this.intervalMinNs : 0,
        maxNs: this.intervalMaxNs,
        meanNs: intervals.length > 0 ? this.intervalSumNs / intervals.length : 0,
      },
      interTokenIntervalsNs: Object.freeze(intervals.slice()),
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens,
      thinkingTokens: usage?.thinkingTokens,
      tokensPerSecond: totalDurationNs > 0 ? outputTokens / (totalDurationNs / 1e9) : 0,
      costUsd: usage?.costUsd,
    }
  }

  // Running stats; a long stream has too many intervals to spread into Math.min
  private recordInterval(intervalNs: number): void {
    this.intervals.push(intervalNs)
    this.intervalSumNs += intervalNs
    if (intervalNs < this.intervalMinNs) this.intervalMinNs = intervalNs
    if (intervalNs > this.intervalMaxNs) this.intervalMaxNs = intervalNs
  }

  elapsedSinceDispatch(from: Instant, now: Instant): number {
    return elapsedNs(this.dispatchedAt ?? from, now)
  }
}

/**
 * Drives a backend's signal stream for one attempt, stamping every signal
 * with the clock as soon as it is observed.
 */
export class TimingEngine {
  constructor(private readonly clock: Clock) {}

  async runAttempt(backend: Backend, attempt: Attempt, options: RunAttemptOptions): Promise<AttemptResult> {
    const abort = new AbortController()
    const timeline = new Timeline()
    const startedAt = attempt.startedAt
    let timer: NodeJS.Timeout | undefined
    let iterator: AsyncIterator<BackendSignal> | undefined

    const timedOut = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => {
        abort.abort(new Error(`Attempt timed out after ${options.timeoutMs}ms`))
        resolve(TIMED_OUT)
      }, options.timeoutMs)
    })

    try {
      iterator = backend
        .issue(attempt.spec, { attempt: attempt.index, timeoutMs: options.timeoutMs, signal: abort.signal })
        [Symbol.asyncIterator]()

      for (;;) {
        const next = await Promise.race([iterator.next(), timedOut])
        const at = this.clock.now()

        if (next === TIMED_OUT) {
          this.close(iterator, attempt)
          return { kind: 'timeout', timeoutMs: options.timeoutMs, elapsedNs: elapsedNs(startedAt, at) }
        }

        if (next.done) {
          return this.finish(timeline, startedAt, at)
        }

        const violation = timeline.push({ ...next.value, at })
        if (violation) {
          logger.debug(`Malformed event stream for ${attempt.spec.id} (attempt ${attempt.index}): ${violation}`)
          this.close(iterator, attempt)
          return { kind: 'malformed', reason: violation, elapsedNs: timeline.elapsedSinceDispatch(startedAt, at) }
        }
      }
    } catch (error) {
      // Backends should report failures as signals; a throw is treated as a transport failure
      const at = this.clock.now()
      const message = error instanceof Error ? error.message : String(error)
      logger.debug(`Backend ${backend.id} threw during ${attempt.spec.id}: ${message}`)
      return {
        kind: 'failed',
        failure: { kind: 'transport', code: 'unknown', message },
        elapsedNs: timeline.elapsedSinceDispatch(startedAt, at),
      }
    } finally {
      clearTimeout(timer)
    }
  }

  private finish(timeline: Timeline, startedAt: Instant, at: Instant): AttemptResult {
    const terminal = timeline.terminalEvent

    if (!terminal) {
      return {
        kind: 'malformed',
        reason: 'stream ended without a terminal event',
        elapsedNs: timeline.elapsedSinceDispatch(startedAt, at),
      }
    }

    if (terminal.type === 'failed') {
      return {
        kind: 'failed',
        failure: terminal.failure,
        elapsedNs: timeline.elapsedSinceDispatch(startedAt, terminal.at),
      }
    }

    const usage = terminal.type === 'completed' ? terminal.usage : undefined
    return { kind: 'completed', metrics: timeline.metrics(terminal.at, usage) }
  }

  // The backend may be suspended on I/O; closing must not hold up the result
  private close(iterator: AsyncIterator<BackendSignal>, attempt: Attempt): void {
    if (!iterator.return) return
    iterator.return().catch((error: unknown) => {
      logger.debug(`Closing the stream for ${attempt.spec.id} failed:`, error)
    })
  }
}

export function createTimingEngine(clock: Clock): TimingEngine {
  return new TimingEngine(clock)
}
