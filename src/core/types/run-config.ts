import { z } from 'zod'
import { builtInBackends } from '../../backends/builtins'
import { BackendDefinitionSchema } from './backend'

export const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
})

export const GenerationParamsSchema = z.object({
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().gt(0).max(1).optional(),
  stop: z.array(z.string()).optional(),
})

// Scenario is a prompt template that expands into logical requests
export const ScenarioSchema = z
  .object({
    id: z.string().min(1, 'Scenario id is required'),
    backend: z.string().min(1, 'Scenario backend is required'),
    model: z.string().min(1, 'Scenario model is required'),
    prompt: z.string().optional(),
    messages: z.array(MessageSchema).optional(),
    params: GenerationParamsSchema.default({}),
    weight: z.number().int().positive().default(1),
  })
  .refine((scenario) => scenario.prompt !== undefined || (scenario.messages?.length ?? 0) > 0, {
    message: 'Scenario needs a prompt or at least one message',
    path: ['prompt'],
  })

export type Scenario = z.infer<typeof ScenarioSchema>

export const RetryPolicySchema = z
  .object({
    maxAttempts: z.number().int().positive().default(3),
    initialBackoffMs: z.number().nonnegative().default(100),
    maxBackoffMs: z.number().nonnegative().default(5000),
    multiplier: z.number().min(1).default(2),
    jitter: z.number().min(0).max(1).default(0.1),
  })
  .refine((policy) => policy.maxBackoffMs >= policy.initialBackoffMs, {
    message: 'maxBackoffMs must be greater than or equal to initialBackoffMs',
    path: ['maxBackoffMs'],
  })

export type RetryPolicy = z.infer<typeof RetryPolicySchema>

export const RateLimitSchema = z.object({
  requestsPerSecond: z.number().positive(),
  burst: z.number().int().positive().default(1),
})

export type RateLimit = z.infer<typeof RateLimitSchema>

// Output configuration for reports
export const OutputConfigSchema = z.object({
  dir: z.string().default('./inferprobe-results'),
  formats: z.array(z.enum(['cli', 'json'])).default(['cli']),
  filename: z.string().optional(),
  includeHistograms: z.boolean().default(false),
})

export type OutputConfig = z.infer<typeof OutputConfigSchema>

const RunConfigObjectSchema = z.object({
  iterations: z.number().int().positive().default(10),
  concurrency: z.number().int().positive().default(1),
  workers: z.number().int().positive().optional(), // Worker-pool size, defaults to concurrency
  rateLimit: RateLimitSchema.optional(),
  warmup: z.number().int().nonnegative().default(0),
  retry: RetryPolicySchema.default({}),
  timeoutMs: z.number().int().positive().default(120000),
  deadlineMs: z.number().int().positive().optional(),
  abortAfterConsecutiveFailures: z.number().int().positive().optional(),
  snapshotIntervalMs: z.number().int().positive().optional(),
  histogramAccuracy: z.number().gt(0).lt(1).default(0.01),
  recentErrorLimit: z.number().int().nonnegative().default(20),
  scenarios: z.array(ScenarioSchema).min(1, 'At least one scenario is required'),
  backends: z.record(z.string(), BackendDefinitionSchema).optional(),
  output: OutputConfigSchema.optional(),
})

/**
 * Builds the run configuration schema. Scenario backends must be built in,
 * defined under `backends`, or listed in `extraBackends` (instances supplied
 * programmatically).
 */
export function createRunConfigSchema(extraBackends: readonly string[] = []) {
  return RunConfigObjectSchema.superRefine((config, ctx) => {
    if (config.workers !== undefined && config.workers < config.concurrency) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'workers must be greater than or equal to concurrency',
        path: ['workers'],
      })
    }

    const known = new Set([...Object.keys(builtInBackends), ...extraBackends])
    Object.values(config.backends ?? {}).forEach((definition) => known.add(definition.id))

    config.scenarios.forEach((scenario, index) => {
      if (!known.has(scenario.backend)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown backend "${scenario.backend}"`,
          path: ['scenarios', index, 'backend'],
        })
      }
    })
  })
}

// Main configuration object
export const RunConfigSchema = createRunConfigSchema()

export type RunConfig = z.infer<typeof RunConfigSchema>
export type RunConfigInput = z.input<typeof RunConfigSchema>
