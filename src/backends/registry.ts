import type { Backend, BackendDefinition, BackendType } from '../core/types'
import { deepMerge } from '../core/utils/deep-merge'
import { resolveEnvInOptions, validateBackendEnv } from '../core/utils/resolve-env'
import { builtInBackends } from './builtins'
import { createOpenAICompatibleBackend } from './openai-compatible'
import { createSimulatedBackend } from './simulated'

export class BackendRegistryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BackendRegistryError'
  }
}

export interface ResolvedBackendDefinition {
  id: string
  name?: string
  type: BackendType
  options: Record<string, unknown>
}

export type BackendFactory = (definition: ResolvedBackendDefinition) => Backend

export const defaultFactories: Record<BackendType, BackendFactory> = {
  simulated: createSimulatedBackend,
  'openai-compatible': createOpenAICompatibleBackend,
}

export class BackendRegistry {
  private definitions = new Map<string, BackendDefinition>()

  constructor(
    customBackends: Record<string, BackendDefinition> = {},
    private readonly factories: Record<BackendType, BackendFactory> = defaultFactories,
  ) {
    Object.values(builtInBackends).forEach((definition) => {
      this.definitions.set(definition.id, definition)
    })

    // Override with custom backends
    Object.values(customBackends).forEach((definition) => {
      this.definitions.set(definition.id, definition)
    })
  }

  getDefinition(id: string): ResolvedBackendDefinition {
    const resolved = this.resolveDefinition(id, new Set())
    if (!resolved) {
      throw new BackendRegistryError(`Backend not found: ${id}`)
    }
    if (!resolved.type) {
      throw new BackendRegistryError(`Backend ${id} has no type`)
    }
    return { id: resolved.id, name: resolved.name, type: resolved.type, options: resolved.options ?? {} }
  }

  hasBackend(id: string): boolean {
    return this.definitions.has(id)
  }

  listBackends(): BackendDefinition[] {
    return Array.from(this.definitions.values())
  }

  /**
   * Checks the `${VAR}` references in a backend's options without resolving them
   */
  validateEnv(id: string): { valid: boolean; missingVars: string[] } {
    return validateBackendEnv(this.getDefinition(id).options)
  }

  create(id: string): Backend {
    const definition = this.getDefinition(id)
    const factory = this.factories[definition.type]
    return factory({ ...definition, options: resolveEnvInOptions(definition.options) })
  }

  private resolveDefinition(id: string, visiting: Set<string>): BackendDefinition | null {
    if (visiting.has(id)) {
      throw new BackendRegistryError(`Circular dependency detected: ${Array.from(visiting).join(' -> ')} -> ${id}`)
    }

    const definition = this.definitions.get(id)
    if (!definition) {
      return null
    }

    if (!definition.extends) {
      return definition
    }

    visiting.add(id)
    const base = this.resolveDefinition(definition.extends, visiting)
    visiting.delete(id)

    if (!base) {
      throw new BackendRegistryError(`Base backend not found: ${definition.extends} (extended by ${id})`)
    }

    return {
      ...base,
      ...definition,
      type: definition.type ?? base.type,
      extends: undefined,
      options: deepMerge(base.options ?? {}, definition.options ?? {}),
    }
  }
}
