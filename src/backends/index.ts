export { builtInBackends } from './builtins'
export {
  BackendRegistry,
  BackendRegistryError,
  defaultFactories,
  type BackendFactory,
  type ResolvedBackendDefinition,
} from './registry'
export {
  SimulatedBackend,
  SimulatedOptionsSchema,
  createSimulatedBackend,
  estimateTokens,
  seededRandom,
  type SimulatedOptions,
} from './simulated'
export {
  OpenAICompatibleBackend,
  OpenAICompatibleOptionsSchema,
  createOpenAICompatibleBackend,
  parseRetryAfter,
  type OpenAICompatibleOptions,
} from './openai-compatible'
export { SseParser } from './sse'
