import { Message, RequestSpec, RunConfig, Scenario } from './types'

export interface ExpandOptions {
  runId: string
  count: number
  warmup?: boolean
}

function messagesOf(scenario: Scenario): readonly Message[] {
  const messages =
    scenario.messages && scenario.messages.length > 0
      ? scenario.messages
      : [{ role: 'user' as const, content: scenario.prompt ?? '' }]
  return Object.freeze(messages.map((message) => Object.freeze({ ...message })))
}

/**
 * Lazily expands the configured scenarios into `count` frozen RequestSpecs,
 * interleaving scenarios by weight (weights 2 and 1 give a, a, b, a, a, b, ...)
 */
export function* expandScenarios(config: RunConfig, options: ExpandOptions): Generator<RequestSpec> {
  const { runId, count, warmup = false } = options
  const prepared = config.scenarios.map((scenario) => ({
    scenario,
    messages: messagesOf(scenario),
    params: Object.freeze({ ...scenario.params }),
  }))

  const rotation: number[] = []
  prepared.forEach((entry, position) => {
    for (let i = 0; i < entry.scenario.weight; i++) rotation.push(position)
  })

  for (let index = 0; index < count; index++) {
    const entry = prepared[rotation[index % rotation.length] ?? 0]
    if (!entry) return

    yield Object.freeze({
      id: `${runId}-${warmup ? 'warmup' : 'req'}-${index}`,
      scenarioId: entry.scenario.id,
      index,
      backend: entry.scenario.backend,
      model: entry.scenario.model,
      messages: entry.messages,
      params: entry.params,
      timeoutMs: config.timeoutMs,
      warmup,
    })
  }
}
