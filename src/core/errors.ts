import type { AbortReason, AggregatedReport } from './types/reporting'

export class ClockUnavailableError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ClockUnavailableError'
  }
}

// Raised inside the pipeline when admission or a backoff wait is abandoned
export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

export class RunAbortedError extends Error {
  constructor(
    public readonly reason: AbortReason,
    public readonly report: AggregatedReport,
  ) {
    super(`Run aborted: ${reason}`)
    this.name = 'RunAbortedError'
  }
}
