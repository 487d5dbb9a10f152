import type { BackendDefinition } from '../core/types/backend'

export const builtInBackends: Record<string, BackendDefinition> = {
  simulated: {
    id: 'simulated',
    name: 'Simulated stream',
    type: 'simulated',
    options: {
      ttftMs: 150,
      interTokenMs: 20,
      outputTokens: 64,
      jitter: 0.1,
    },
  },

  openai: {
    id: 'openai',
    name: 'OpenAI',
    type: 'openai-compatible',
    options: {
      baseUrl: 'https://api.openai.com/v1',
      apiKey: '${OPENAI_API_KEY}',
    },
  },
}
