/* eslint-disable no-console */

import { ConfigLoadError, ConfigValidationError } from '../core/config/errors'

/**
 * Prints a command failure to stderr and marks the process as failed
 */
export function reportCommandError(error: unknown): void {
  if (error instanceof ConfigLoadError) {
    console.error('❌ Failed to load configuration:')
    console.error(error.message)
  } else if (error instanceof ConfigValidationError) {
    console.error('❌ Configuration validation failed:')
    console.error(error.getErrorSummary())
  } else if (error instanceof Error) {
    console.error(`❌ ${error.message}`)
  } else {
    console.error('❌ Unexpected error:', error)
  }
  process.exitCode = 1
}
