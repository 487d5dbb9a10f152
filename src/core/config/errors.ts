import { ZodIssue } from 'zod'

/**
 * The merged configuration (defaults, file, env, CLI) failed the run schema
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[],
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }

  /** One `path: message` line per issue; issues on the whole config have no path prefix */
  getErrorSummary(): string {
    return this.issues.map((issue) => `${formatPath(issue.path)}${issue.message}`).join('\n')
  }

  /** Paths of the offending fields, e.g. `scenarios.0.backend` */
  get paths(): string[] {
    return this.issues.map((issue) => issue.path.map(String).join('.'))
  }
}

/**
 * A config file was found (or named) but could not be read or evaluated
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ConfigLoadError'
  }
}

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? `${path.map(String).join('.')}: ` : ''
}
