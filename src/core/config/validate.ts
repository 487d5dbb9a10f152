import { ZodError } from 'zod'
import { RunConfig, createRunConfigSchema } from '../types'
import { ConfigValidationError } from './errors'

/**
 * Validates a raw configuration object, applying defaults
 * @param extraBackends ids of backend instances supplied outside the configuration
 * @throws ConfigValidationError if validation fails
 */
export default function validateConfig(config: unknown, extraBackends: readonly string[] = []): RunConfig {
  try {
    return createRunConfigSchema(extraBackends).parse(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError('Configuration validation failed', error.issues)
    }
    throw error
  }
}
