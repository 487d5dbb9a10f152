import { EventEmitter } from 'events'
import { Clock } from './clock'
import { OutcomeClassifier, RetryDecision } from './classifier'
import { ConcurrencyController, Permit } from './concurrency-controller'
import { CancelledError } from './errors'
import { AttemptResult, FailedAttemptResult, TimingEngine } from './timing-engine'
import { Attempt, Backend, ErrorKind, Outcome, OutcomeMetrics, RequestSpec } from './types'
import { sleep } from './utils/sleep'
import { logger } from '../logger'

export type RequestState = 'pending' | 'admitted' | 'in_flight' | 'retrying' | 'succeeded' | 'failed' | 'cancelled'

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  pending: ['admitted', 'cancelled'],
  admitted: ['in_flight', 'cancelled'],
  in_flight: ['succeeded', 'retrying', 'failed', 'cancelled'],
  retrying: ['admitted', 'cancelled'],
  succeeded: [],
  failed: [],
  cancelled: [],
}

export interface RequestExecutorEvents {
  stateChange: (spec: RequestSpec, from: RequestState, to: RequestState) => void
  attemptStart: (attempt: Attempt) => void
  attemptFailed: (spec: RequestSpec, attempt: number, kind: ErrorKind, decision: RetryDecision) => void
  retry: (spec: RequestSpec, attempt: number, delayMs: number) => void
}

export interface RequestExecutorDeps {
  controller: ConcurrencyController
  timingEngine: TimingEngine
  classifier: OutcomeClassifier
  clock: Clock
  resolveBackend: (id: string) => Backend
}

function describeFailure(result: FailedAttemptResult): string {
  switch (result.kind) {
    case 'failed':
      return result.failure.kind === 'http'
        ? `HTTP ${result.failure.status}: ${result.failure.message}`
        : `${result.failure.code}: ${result.failure.message}`
    case 'timeout':
      return `Timed out after ${result.timeoutMs}ms`
    case 'malformed':
      return `Malformed event stream: ${result.reason}`
  }
}

/**
 * Drives one logical request to exactly one Outcome: admission, attempt,
 * classification and backoff, repeated until a terminal state is reached.
 */
export class RequestExecutor extends EventEmitter {
  constructor(private readonly deps: RequestExecutorDeps) {
    super()
  }

  async execute(spec: RequestSpec, signal: AbortSignal): Promise<Outcome> {
    const backend = this.deps.resolveBackend(spec.backend)
    const backoffsMs: number[] = []
    let state: RequestState = 'pending'
    let attemptIndex = 0
    let attemptsMade = 0
    let lastKind: ErrorKind | undefined
    let lastMessage: string | undefined

    const transition = (to: RequestState): void => {
      if (!TRANSITIONS[state].includes(to)) {
        throw new Error(`Invalid transition ${state} -> ${to} for ${spec.id}`)
      }
      const from = state
      state = to
      this.emit('stateChange', spec, from, to)
    }

    const finish = (
      status: Outcome['status'],
      details: { errorKind?: ErrorKind; metrics?: OutcomeMetrics } = {},
    ): Outcome => {
      transition(status === 'success' ? 'succeeded' : status)
      return freezeOutcome({
        requestId: spec.id,
        scenarioId: spec.scenarioId,
        backend: spec.backend,
        model: spec.model,
        warmup: spec.warmup,
        status,
        errorKind: details.errorKind,
        lastErrorKind: status === 'success' ? undefined : lastKind,
        error: status === 'success' ? undefined : lastMessage,
        attempts: attemptsMade,
        backoffsMs,
        metrics: details.metrics,
      })
    }

    for (;;) {
      let permit: Permit
      try {
        permit = await this.deps.controller.acquire(signal)
      } catch (error) {
        if (error instanceof CancelledError) return finish('cancelled')
        throw error
      }
      transition('admitted')

      const attempt: Attempt = Object.freeze({ index: attemptIndex, spec, startedAt: this.deps.clock.now() })
      let result: AttemptResult
      try {
        transition('in_flight')
        attemptsMade++
        this.emit('attemptStart', attempt)
        result = await this.deps.timingEngine.runAttempt(backend, attempt, { timeoutMs: spec.timeoutMs })
      } finally {
        permit.release()
      }

      if (result.kind === 'completed') {
        return finish('success', { metrics: result.metrics })
      }

      const decision = this.deps.classifier.classify(result, attemptIndex)
      const kind = decision.action === 'give_up' ? (decision.lastKind ?? decision.kind) : decision.kind
      lastKind = kind
      lastMessage = describeFailure(result)
      this.emit('attemptFailed', spec, attemptIndex, kind, decision)

      if (decision.action === 'give_up') {
        logger.debug(`${spec.id} failed permanently: ${decision.kind} (${lastMessage})`)
        return finish('failed', { errorKind: decision.kind })
      }

      if (signal.aborted) {
        return finish('cancelled')
      }

      transition('retrying')
      backoffsMs.push(decision.afterMs)
      this.emit('retry', spec, attemptIndex + 1, decision.afterMs)

      try {
        await sleep(decision.afterMs, signal)
      } catch (error) {
        if (error instanceof CancelledError) return finish('cancelled')
        throw error
      }
      attemptIndex++
    }
  }
}

function freezeOutcome(outcome: Outcome): Outcome {
  const copy: Outcome = {
    ...outcome,
    backoffsMs: Object.freeze(outcome.backoffsMs.slice()),
    metrics: outcome.metrics ? Object.freeze({ ...outcome.metrics }) : undefined,
  }
  return Object.freeze(copy)
}

export function createRequestExecutor(deps: RequestExecutorDeps): RequestExecutor {
  return new RequestExecutor(deps)
}
