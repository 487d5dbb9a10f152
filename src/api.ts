/**
 * Basic usage:
 * ```ts
 * import { run } from 'inferprobe'
 *
 * const report = await run({
 *   prompt: 'Summarise the plot of Hamlet in two sentences.',
 *   backend: 'openai',
 *   model: 'gpt-4o-mini',
 *   iterations: 50,
 *   concurrency: 8,
 * })
 * console.log(report.distributions.ttft.p99)
 * ```
 */

import type { AggregatedReport, Backend, ErrorKind, Outcome, RequestSpec, RunConfigInput } from './core/types'

export interface RunOptions extends Omit<RunConfigInput, 'scenarios'> {
  /** Full scenario list; takes precedence over `prompt` */
  scenarios?: RunConfigInput['scenarios']

  /** Prompt(s) to profile, one scenario each */
  prompt?: string | string[]

  /** Backend used by `prompt` scenarios (default: 'simulated') */
  backend?: string

  /** Model used by `prompt` scenarios (default: 'simulated-model') */
  model?: string

  /** Backend instances by id, used instead of building them from definitions */
  instances?: Record<string, Backend>

  /** Cancels the run when aborted; the returned promise then rejects with RunAbortedError */
  signal?: AbortSignal

  /** Progress callbacks */
  onStart?: (iterations: number) => void
  onRequestComplete?: (outcome: Outcome) => void
  onRequestFailed?: (spec: RequestSpec, attempt: number, kind: ErrorKind, willRetry: boolean) => void
  onSnapshot?: (report: AggregatedReport) => void
  onComplete?: (report: AggregatedReport) => void

  /** Suppress non-essential output */
  quiet?: boolean
}
