import { FailedAttemptResult } from './timing-engine'
import { BackendFailure, ErrorKind, RetryPolicy } from './types'

export type RetryDecision =
  | { action: 'retry'; afterMs: number; kind: ErrorKind }
  | { action: 'give_up'; kind: ErrorKind; lastKind?: ErrorKind }

export type RandomSource = () => number

const RETRYABLE = new Set<ErrorKind>(['TransportError', 'ServerError', 'RateLimited'])

export function errorKindOf(result: FailedAttemptResult): ErrorKind {
  switch (result.kind) {
    case 'timeout':
      return 'Timeout'
    case 'malformed':
      return 'MalformedEventOrder'
    case 'failed':
      return failureKind(result.failure)
  }
}

function failureKind(failure: BackendFailure): ErrorKind {
  if (failure.kind === 'transport') return 'TransportError'
  if (failure.status === 429) return 'RateLimited'
  if (failure.status >= 500) return 'ServerError'
  return 'ClientError'
}

export function isRetryable(kind: ErrorKind): boolean {
  return RETRYABLE.has(kind)
}

/**
 * min(maxBackoff, initial * multiplier^attempt), scaled by a factor drawn
 * uniformly from [1 - jitter, 1 + jitter]
 */
export function computeBackoff(policy: RetryPolicy, attemptIndex: number, random: RandomSource = Math.random): number {
  const base = Math.min(policy.maxBackoffMs, policy.initialBackoffMs * Math.pow(policy.multiplier, attemptIndex))
  const factor = 1 - policy.jitter + 2 * policy.jitter * random()
  return Math.max(0, Math.round(base * factor))
}

export class OutcomeClassifier {
  constructor(
    private readonly policy: RetryPolicy,
    private readonly random: RandomSource = Math.random,
  ) {}

  classify(result: FailedAttemptResult, attemptIndex: number): RetryDecision {
    const kind = errorKindOf(result)

    if (!isRetryable(kind)) {
      return { action: 'give_up', kind }
    }

    if (attemptIndex + 1 >= this.policy.maxAttempts) {
      return { action: 'give_up', kind: 'RetriesExhausted', lastKind: kind }
    }

    let afterMs = computeBackoff(this.policy, attemptIndex, this.random)
    if (result.kind === 'failed' && result.failure.kind === 'http' && result.failure.retryAfterMs !== undefined) {
      afterMs = Math.max(afterMs, result.failure.retryAfterMs)
    }

    return { action: 'retry', afterMs, kind }
  }
}
