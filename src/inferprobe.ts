import { createRunner, Runner } from './core/runner'
import validateRunConfig from './core/config/validate'
import type { AggregatedReport, RunConfig, RunConfigInput } from './core/types'
import type { RunOptions } from './api'

type ScenarioInput = RunConfigInput['scenarios'][number]

/**
 * Examples:
 * ```ts
 * // Simulated backend, no network
 * const report = await run({ prompt: 'Hello', iterations: 20 })
 *
 * // Several scenarios against a local server
 * const report = await run({
 *   backends: { local: { id: 'local', extends: 'openai', options: { baseUrl: 'http://localhost:8000/v1' } } },
 *   scenarios: [
 *     createScenario('Say hi', { backend: 'local', model: 'llama-3-8b' }),
 *     createScenario('Write a haiku', { backend: 'local', model: 'llama-3-8b', weight: 3 }),
 *   ],
 *   concurrency: 4,
 *   onRequestComplete: (outcome) => console.log(outcome.requestId, outcome.status),
 * })
 * ```
 */
export async function run(options: RunOptions): Promise<AggregatedReport> {
  const config = validateConfig(options)

  const runner = createRunner(config, {
    quiet: options.quiet,
    backends: options.instances,
    signal: options.signal,
  })

  setupCallbacks(runner, options)

  try {
    return await runner.run()
  } finally {
    await runner.stop()
  }
}

/**
 * Create a scenario from a prompt
 */
export function createScenario(
  prompt: string,
  options: Partial<Omit<ScenarioInput, 'prompt'>> = {},
): ScenarioInput {
  return {
    ...options,
    id: options.id ?? `scenario-${prompt.slice(0, 24).trim().toLowerCase().replace(/[^a-z0-9]+/g, '-')}`,
    backend: options.backend ?? 'simulated',
    model: options.model ?? 'simulated-model',
    prompt,
  }
}

/**
 * Validate and convert options to a RunConfig
 */
export function validateConfig(options: RunOptions): RunConfig {
  return validateRunConfig(convertOptionsToConfig(options), Object.keys(options.instances ?? {}))
}

function convertOptionsToConfig(options: RunOptions): Record<string, unknown> {
  const {
    prompt,
    backend,
    model,
    instances: _instances,
    signal: _signal,
    onStart: _onStart,
    onRequestComplete: _onRequestComplete,
    onRequestFailed: _onRequestFailed,
    onSnapshot: _onSnapshot,
    onComplete: _onComplete,
    quiet: _quiet,
    ...config
  } = options

  if (config.scenarios || prompt === undefined) {
    return { ...config }
  }

  const prompts = Array.isArray(prompt) ? prompt : [prompt]
  return {
    ...config,
    scenarios: prompts.map((text, index) => createScenario(text, { id: `prompt-${index}`, backend, model })),
  }
}

/**
 * Set up event callbacks from options
 */
function setupCallbacks(runner: Runner, options: RunOptions): void {
  if (options.onStart) {
    runner.on('runStart', options.onStart)
  }

  if (options.onRequestComplete) {
    runner.on('requestComplete', options.onRequestComplete)
  }

  if (options.onRequestFailed) {
    runner.on('requestFailed', options.onRequestFailed)
  }

  if (options.onSnapshot) {
    runner.on('snapshot', options.onSnapshot)
  }

  if (options.onComplete) {
    runner.on('runComplete', options.onComplete)
  }
}
