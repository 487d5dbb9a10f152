/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: boolean
  quiet?: boolean
}

export interface PrintConfigArgs extends BaseArgs {
  format?: string
}

export interface RunArgs extends BaseArgs {
  iterations?: number
  concurrency?: number
  'rate-limit'?: number
  burst?: number
  warmup?: number
  timeout?: number
  'max-attempts'?: number
  scenario?: string[]
  format?: 'cli' | 'json'
  output?: string
}

export interface ValidateArgs extends BaseArgs {
  'skip-health'?: boolean
}
