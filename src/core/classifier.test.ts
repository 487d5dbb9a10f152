import { describe, it, expect } from '@jest/globals'
import { OutcomeClassifier, computeBackoff, errorKindOf } from './classifier'
import { FailedAttemptResult } from './timing-engine'
import { RetryPolicy } from './types'

const policy: RetryPolicy = {
  maxAttempts: 3,
  initialBackoffMs: 100,
  maxBackoffMs: 1000,
  multiplier: 2,
  jitter: 0,
}

const http = (status: number, retryAfterMs?: number): FailedAttemptResult => ({
  kind: 'failed',
  failure: { kind: 'http', status, message: `status ${status}`, retryAfterMs },
  elapsedNs: 0,
})

describe('errorKindOf', () => {
  it.each([
    [http(429), 'RateLimited'],
    [http(500), 'ServerError'],
    [http(503), 'ServerError'],
    [http(401), 'ClientError'],
    [http(404), 'ClientError'],
    [{ kind: 'failed', failure: { kind: 'transport', code: 'reset', message: 'reset' }, elapsedNs: 0 }, 'TransportError'],
    [{ kind: 'timeout', timeoutMs: 10, elapsedNs: 0 }, 'Timeout'],
    [{ kind: 'malformed', reason: 'x', elapsedNs: 0 }, 'MalformedEventOrder'],
  ] satisfies Array<[FailedAttemptResult, string]>)('should classify %j as %s', (result, kind) => {
    expect(errorKindOf(result)).toBe(kind)
  })
})

describe('computeBackoff', () => {
  it('should grow exponentially and cap at the maximum', () => {
    expect(computeBackoff(policy, 0)).toBe(100)
    expect(computeBackoff(policy, 1)).toBe(200)
    expect(computeBackoff(policy, 3)).toBe(800)
    expect(computeBackoff(policy, 4)).toBe(1000)
  })

  it('should spread the delay across the jitter range', () => {
    const jittered = { ...policy, jitter: 0.5 }

    expect(computeBackoff(jittered, 0, () => 0)).toBe(50)
    expect(computeBackoff(jittered, 0, () => 0.5)).toBe(100)
    expect(computeBackoff(jittered, 0, () => 1)).toBe(150)
  })
})

describe('OutcomeClassifier', () => {
  const classifier = new OutcomeClassifier(policy)

  it('should retry server errors with backoff', () => {
    expect(classifier.classify(http(503), 0)).toEqual({ action: 'retry', afterMs: 100, kind: 'ServerError' })
    expect(classifier.classify(http(503), 1)).toEqual({ action: 'retry', afterMs: 200, kind: 'ServerError' })
  })

  it('should give up once attempts are exhausted', () => {
    expect(classifier.classify(http(503), 2)).toEqual({
      action: 'give_up',
      kind: 'RetriesExhausted',
      lastKind: 'ServerError',
    })
  })

  it('should never retry client errors', () => {
    expect(classifier.classify(http(401), 0)).toEqual({ action: 'give_up', kind: 'ClientError' })
  })

  it('should never retry malformed streams or timeouts', () => {
    expect(classifier.classify({ kind: 'malformed', reason: 'x', elapsedNs: 0 }, 0)).toEqual({
      action: 'give_up',
      kind: 'MalformedEventOrder',
    })
    expect(classifier.classify({ kind: 'timeout', timeoutMs: 5, elapsedNs: 0 }, 0)).toEqual({
      action: 'give_up',
      kind: 'Timeout',
    })
  })

  it('should honor a longer retry-after hint on rate limiting', () => {
    expect(classifier.classify(http(429, 750), 0)).toEqual({ action: 'retry', afterMs: 750, kind: 'RateLimited' })
    expect(classifier.classify(http(429, 10), 0)).toEqual({ action: 'retry', afterMs: 100, kind: 'RateLimited' })
  })

  it('should give up immediately with a single attempt', () => {
    const single = new OutcomeClassifier({ ...policy, maxAttempts: 1 })

    expect(single.classify(http(500), 0)).toEqual({ action: 'give_up', kind: 'RetriesExhausted', lastKind: 'ServerError' })
  })
})
