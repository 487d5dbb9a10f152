import { describe, it, expect } from '@jest/globals'
import { SimulatedBackend, estimateTokens, seededRandom } from './simulated'
import { BackendSignal, RequestSpec } from '../core/types'

const spec: RequestSpec = {
  id: 'req-0',
  scenarioId: 'chat',
  index: 0,
  backend: 'simulated',
  model: 'sim-model',
  messages: [{ role: 'user', content: 'twelve chars' }],
  params: { maxTokens: 3 },
  timeoutMs: 1000,
  warmup: false,
}

const collect = async (backend: SimulatedBackend, signal = new AbortController().signal) => {
  const signals: BackendSignal[] = []
  for await (const item of backend.issue(spec, { attempt: 0, timeoutMs: 1000, signal })) {
    signals.push(item)
  }
  return signals
}

describe('SimulatedBackend', () => {
  it('should stream a well-ordered response capped at maxTokens', async () => {
    const backend = new SimulatedBackend('simulated', { ttftMs: 0, interTokenMs: 0, outputTokens: 10, jitter: 0 })

    const signals = await collect(backend)

    expect(signals.map((item) => item.type)).toEqual(['dispatched', 'first_byte', 'token', 'token', 'token', 'completed'])
    expect(signals[signals.length - 1]).toEqual({ type: 'completed', usage: { inputTokens: 3, outputTokens: 3 } })
  })

  it('should inject failures with the configured status', async () => {
    const backend = new SimulatedBackend('simulated', {
      ttftMs: 0,
      jitter: 0,
      failureRate: 1,
      failureStatus: 429,
      retryAfterMs: 250,
    })

    const signals = await collect(backend)

    expect(signals).toEqual([
      { type: 'dispatched' },
      {
        type: 'failed',
        failure: { kind: 'http', status: 429, message: 'Simulated failure (429)', retryAfterMs: 250 },
      },
    ])
  })

  it('should report cost when a per-token price is set', async () => {
    const backend = new SimulatedBackend('simulated', { ttftMs: 0, interTokenMs: 0, jitter: 0, costPerToken: 0.5 })

    const signals = await collect(backend)

    expect(signals[signals.length - 1]).toEqual({
      type: 'completed',
      usage: { inputTokens: 3, outputTokens: 3, costUsd: 3 },
    })
  })

  it('should stop with a transport failure when aborted', async () => {
    const backend = new SimulatedBackend('simulated', { ttftMs: 10_000, jitter: 0 })
    const abort = new AbortController()
    setTimeout(() => abort.abort(), 10)

    const signals = await collect(backend, abort.signal)

    expect(signals).toEqual([
      { type: 'dispatched' },
      { type: 'failed', failure: { kind: 'transport', code: 'timeout', message: 'Request aborted' } },
    ])
  })

  it('should be deterministic for a fixed seed', () => {
    const a = seededRandom(42)
    const b = seededRandom(42)
    const values = [a(), a(), a()]

    expect([b(), b(), b()]).toEqual(values)
    values.forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    })
  })

  it('should reject invalid options', () => {
    expect(() => new SimulatedBackend('simulated', { failureRate: 2 })).toThrow()
  })
})

describe('estimateTokens', () => {
  it('should count roughly four characters per token', () => {
    expect(estimateTokens('')).toBe(0)
    expect(estimateTokens('abcd')).toBe(1)
    expect(estimateTokens('abcde')).toBe(2)
  })
})
