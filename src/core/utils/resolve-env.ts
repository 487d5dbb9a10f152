import { isPlainObject } from './deep-merge'

const ENV_REFERENCE = /\$\{([^}]+)\}/g

/**
 * Resolves environment variable references in strings
 * Supports ${VAR_NAME} syntax
 */
export function resolveEnvVars(value: string): string {
  return value.replace(ENV_REFERENCE, (_, varName: string) => {
    const envValue = process.env[varName]

    if (envValue === undefined) {
      throw new Error(`Environment variable "${varName}" is not defined (referenced in backend configuration)`)
    }

    return envValue
  })
}

/**
 * Resolves references in every string of a backend options object, recursing
 * into nested objects and arrays
 */
export function resolveEnvInOptions(options: Record<string, unknown>): Record<string, unknown> {
  const resolved: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(options)) {
    resolved[key] = resolveValue(value)
  }

  return resolved
}

function resolveValue(value: unknown): unknown {
  if (typeof value === 'string') return resolveEnvVars(value)
  if (Array.isArray(value)) return value.map(resolveValue)
  if (isPlainObject(value)) return resolveEnvInOptions(value)
  return value
}

/**
 * Lists variables referenced in `value` that are not set, without resolving
 */
export function findMissingEnvVars(value: string): string[] {
  const missingVars: string[] = []

  for (const match of value.matchAll(ENV_REFERENCE)) {
    const varName = match[1]
    if (varName !== undefined && process.env[varName] === undefined) {
      missingVars.push(varName)
    }
  }

  return missingVars
}

/**
 * Validates that all environment variables referenced in backend options are available
 */
export function validateBackendEnv(options: Record<string, unknown> | undefined): {
  valid: boolean
  missingVars: string[]
} {
  const missingVars: string[] = []

  const visit = (value: unknown): void => {
    if (typeof value === 'string') {
      missingVars.push(...findMissingEnvVars(value))
    } else if (Array.isArray(value)) {
      value.forEach(visit)
    } else if (isPlainObject(value)) {
      Object.values(value).forEach(visit)
    }
  }
  visit(options ?? {})

  const uniqueMissingVars = [...new Set(missingVars)]

  return {
    valid: uniqueMissingVars.length === 0,
    missingVars: uniqueMissingVars,
  }
}
