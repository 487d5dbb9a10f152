import { z } from 'zod'
import {
  Backend,
  BackendFailure,
  BackendSignal,
  IssueOptions,
  RequestSpec,
  TokenUsage,
  TransportFailureCode,
} from '../core/types'
import { logger } from '../logger'
import { SseParser } from './sse'
import type { ResolvedBackendDefinition } from './registry'

export const OpenAICompatibleOptionsSchema = z.object({
  baseUrl: z.string().url('baseUrl must be a valid URL'),
  apiKey: z.string().optional(),
  path: z.string().default('/chat/completions'),
  headers: z.record(z.string(), z.string()).default({}),
  includeUsage: z.boolean().default(true),
})

export type OpenAICompatibleOptions = z.infer<typeof OpenAICompatibleOptionsSchema>

const ChatChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).partial().nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .nullish(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      completion_tokens_details: z.object({ reasoning_tokens: z.number().optional() }).nullish(),
    })
    .nullish(),
})

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
})

type Fetch = typeof fetch

/**
 * Parses a Retry-After header given as seconds or as an HTTP date
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000)
  }
  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - now)
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined
  const cause: unknown = error.cause
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  return undefined
}

export function toTransportFailure(error: unknown): BackendFailure {
  const message = error instanceof Error ? error.message : String(error)
  let code: TransportFailureCode = 'unknown'

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    code = 'timeout'
  } else {
    switch (errorCode(error)) {
      case 'ECONNRESET':
      case 'UND_ERR_SOCKET':
        code = 'reset'
        break
      case 'ECONNREFUSED':
      case 'ENOTFOUND':
      case 'EAI_AGAIN':
      case 'UND_ERR_CONNECT_TIMEOUT':
        code = 'connection'
        break
    }
  }

  return { kind: 'transport', code, message }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function describeHttpError(status: number, statusText: string, body: string): string {
  const parsed = ErrorBodySchema.safeParse(parseJson(body))
  if (parsed.success) return parsed.data.error.message
  const snippet = body.length > 200 ? `${body.slice(0, 200)}...` : body
  return snippet || statusText || `HTTP ${status}`
}

/**
 * Streams chat completions from any server speaking the OpenAI wire format
 */
export class OpenAICompatibleBackend implements Backend {
  readonly type = 'openai-compatible'
  private readonly options: OpenAICompatibleOptions

  constructor(
    readonly id: string,
    options: z.input<typeof OpenAICompatibleOptionsSchema>,
    private readonly fetchImpl: Fetch = fetch,
  ) {
    this.options = OpenAICompatibleOptionsSchema.parse(options)
  }

  async *issue(spec: RequestSpec, { signal }: IssueOptions): AsyncGenerator<BackendSignal> {
    const body = {
      model: spec.model,
      messages: spec.messages,
      stream: true,
      max_tokens: spec.params.maxTokens,
      ...(spec.params.temperature !== undefined ? { temperature: spec.params.temperature } : {}),
      ...(spec.params.topP !== undefined ? { top_p: spec.params.topP } : {}),
      ...(spec.params.stop ? { stop: spec.params.stop } : {}),
      ...(this.options.includeUsage ? { stream_options: { include_usage: true } } : {}),
    }

    yield { type: 'dispatched' }

    let response: Response
    try {
      response = await this.fetchImpl(this.url(this.options.path), {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(body),
        signal,
      })
    } catch (error) {
      yield { type: 'failed', failure: toTransportFailure(error) }
      return
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '')
      yield {
        type: 'failed',
        failure: {
          kind: 'http',
          status: response.status,
          message: describeHttpError(response.status, response.statusText, text),
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        },
      }
      return
    }

    if (!response.body) {
      yield { type: 'failed', failure: { kind: 'transport', code: 'protocol', message: 'Response has no body' } }
      return
    }

    const reader = response.body.getReader()
    const read = () =>
      reader.read().then(
        (result) => ({ ok: true as const, result }),
        (error: unknown) => ({ ok: false as const, error }),
      )
    const decoder = new TextDecoder('utf-8')
    const parser = new SseParser()
    let firstByte = false
    let index = 0
    let usage: TokenUsage | undefined

    try {
      for (;;) {
        const next = await read()
        if (!next.ok) {
          yield { type: 'failed', failure: toTransportFailure(next.error) }
          return
        }
        const chunk = next.result

        const events = chunk.done ? parser.push(decoder.decode()).concat(parser.end()) : []
        if (!chunk.done) {
          if (!firstByte) {
            firstByte = true
            yield { type: 'first_byte' }
          }
          events.push(...parser.push(decoder.decode(chunk.value, { stream: true })))
        }

        for (const data of events) {
          if (data === '[DONE]') {
            yield { type: 'completed', usage }
            return
          }

          const parsed = this.parseChunk(data)
          if (!parsed) {
            yield {
              type: 'failed',
              failure: {
                kind: 'transport',
                code: 'protocol',
                message: `Invalid stream chunk: ${data.slice(0, 200)}`,
              },
            }
            return
          }

          for (const choice of parsed.choices ?? []) {
            const content = choice.delta?.content
            if (content) {
              yield { type: 'token', index: index++, text: content }
            }
          }
          if (parsed.usage) {
            usage = {
              inputTokens: parsed.usage.prompt_tokens,
              outputTokens: parsed.usage.completion_tokens,
              thinkingTokens: parsed.usage.completion_tokens_details?.reasoning_tokens,
            }
          }
        }

        if (chunk.done) break
      }
    } finally {
      // Frees the connection when the consumer stops early; a no-op once the body is drained
      reader.cancel().catch((error: unknown) => logger.debug(`Cancelling the response body failed:`, error))
    }

    if (!firstByte) {
      yield {
        type: 'failed',
        failure: { kind: 'transport', code: 'protocol', message: 'Stream closed before any data' },
      }
      return
    }
    // Some servers close the stream without a [DONE] marker
    yield { type: 'completed', usage }
  }

  async healthCheck(): Promise<void> {
    const response = await this.fetchImpl(this.url('/models'), { headers: this.headers() })
    if (!response.ok) {
      const text = await response.text().catch(() => '')
      throw new Error(`Health check failed: ${describeHttpError(response.status, response.statusText, text)}`)
    }
    logger.debug(`Backend ${this.id} is reachable at ${this.options.baseUrl}`)
  }

  private url(path: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'text/event-stream',
      ...this.options.headers,
    }
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`
    return headers
  }

  private parseChunk(data: string): z.infer<typeof ChatChunkSchema> | undefined {
    const parsed = ChatChunkSchema.safeParse(parseJson(data))
    return parsed.success ? parsed.data : undefined
  }
}

export function createOpenAICompatibleBackend(definition: ResolvedBackendDefinition): OpenAICompatibleBackend {
  return new OpenAICompatibleBackend(definition.id, OpenAICompatibleOptionsSchema.parse(definition.options))
}
