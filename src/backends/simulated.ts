import { z } from 'zod'
import { Backend, BackendSignal, IssueOptions, RequestSpec } from '../core/types'
import { CancelledError } from '../core/errors'
import { sleep } from '../core/utils/sleep'
import type { ResolvedBackendDefinition } from './registry'

export const SimulatedOptionsSchema = z.object({
  ttftMs: z.number().nonnegative().default(150),
  interTokenMs: z.number().nonnegative().default(20),
  outputTokens: z.number().int().nonnegative().default(64),
  jitter: z.number().min(0).max(1).default(0.1),
  failureRate: z.number().min(0).max(1).default(0),
  failureStatus: z.number().int().min(400).max(599).default(503),
  retryAfterMs: z.number().int().nonnegative().optional(),
  costPerToken: z.number().nonnegative().optional(),
  seed: z.number().int().optional(),
})

export type SimulatedOptions = z.infer<typeof SimulatedOptionsSchema>

// Small seeded PRNG (mulberry32) so simulated runs can be replayed
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

/**
 * Backend that streams synthetic tokens with configurable latency and
 * failure injection. No network is involved.
 */
export class SimulatedBackend implements Backend {
  readonly type = 'simulated'
  private readonly options: SimulatedOptions
  private readonly random: () => number

  constructor(
    readonly id: string,
    options: z.input<typeof SimulatedOptionsSchema> = {},
  ) {
    this.options = SimulatedOptionsSchema.parse(options)
    this.random = this.options.seed !== undefined ? seededRandom(this.options.seed) : Math.random
  }

  async *issue(spec: RequestSpec, { signal }: IssueOptions): AsyncGenerator<BackendSignal> {
    const { options } = this
    const outputTokens = Math.min(options.outputTokens, spec.params.maxTokens)
    const inputTokens = spec.messages.reduce((sum, message) => sum + estimateTokens(message.content), 0)

    yield { type: 'dispatched' }

    if (!(await this.pause(options.ttftMs, signal))) {
      yield { type: 'failed', failure: { kind: 'transport', code: 'timeout', message: 'Request aborted' } }
      return
    }

    if (options.failureRate > 0 && this.random() < options.failureRate) {
      yield {
        type: 'failed',
        failure: {
          kind: 'http',
          status: options.failureStatus,
          message: `Simulated failure (${options.failureStatus})`,
          retryAfterMs: options.retryAfterMs,
        },
      }
      return
    }

    yield { type: 'first_byte' }

    for (let index = 0; index < outputTokens; index++) {
      if (index > 0 && !(await this.pause(options.interTokenMs, signal))) {
        yield { type: 'failed', failure: { kind: 'transport', code: 'timeout', message: 'Request aborted' } }
        return
      }
      yield { type: 'token', index, text: ` tok${index}` }
    }

    yield {
      type: 'completed',
      usage: {
        inputTokens,
        outputTokens,
        costUsd: options.costPerToken !== undefined ? options.costPerToken * (inputTokens + outputTokens) : undefined,
      },
    }
  }

  // Resolves false when the attempt was aborted while waiting
  private async pause(baseMs: number, signal: AbortSignal): Promise<boolean> {
    const { jitter } = this.options
    const ms = baseMs * (1 - jitter + 2 * jitter * this.random())
    if (ms <= 0) return !signal.aborted
    try {
      await sleep(ms, signal)
      return true
    } catch (error) {
      if (error instanceof CancelledError) return false
      throw error
    }
  }
}

export function createSimulatedBackend(definition: ResolvedBackendDefinition): SimulatedBackend {
  return new SimulatedBackend(definition.id, SimulatedOptionsSchema.parse(definition.options))
}
