import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import { Clock, createClock } from './clock'
import { OutcomeClassifier, RandomSource, RetryDecision } from './classifier'
import { ConcurrencyController, createConcurrencyController } from './concurrency-controller'
import { RunAbortedError } from './errors'
import { RequestExecutor, createRequestExecutor } from './executor'
import { expandScenarios } from './scenarios'
import { createTimingEngine } from './timing-engine'
import { AbortReason, AggregatedReport, Backend, ErrorKind, Outcome, RequestSpec, RunConfig } from './types'
import { BackendRegistry } from '../backends/registry'
import { MetricsAggregator } from '../metrics/aggregator'
import { logger } from '../logger'

export interface RunnerEvents {
  runStart: (iterations: number) => void
  warmupStart: (count: number) => void
  warmupComplete: (report: AggregatedReport) => void
  requestStart: (spec: RequestSpec) => void
  requestComplete: (outcome: Outcome) => void
  requestFailed: (spec: RequestSpec, attempt: number, kind: ErrorKind, willRetry: boolean) => void
  requestRetry: (spec: RequestSpec, attempt: number, delayMs: number) => void
  snapshot: (report: AggregatedReport) => void
  runComplete: (report: AggregatedReport) => void
  runError: (error: Error) => void
}

export interface RunnerOptions {
  quiet?: boolean
  /** Backend instances by id; these take precedence over the registry */
  backends?: Record<string, Backend>
  clock?: Clock
  random?: RandomSource
  signal?: AbortSignal
}

/**
 * Runner expands the configured scenarios into logical requests and drives
 * them through a worker pool that shares one concurrency controller, one
 * executor and one aggregator
 */
export class Runner extends EventEmitter {
  readonly runId: string
  private config: RunConfig
  private quiet: boolean
  private clock: Clock
  private controller: ConcurrencyController
  private executor: RequestExecutor
  private registry: BackendRegistry
  private backends = new Map<string, Backend>()
  private aggregator: MetricsAggregator
  private aborter = new AbortController()
  private abortReason?: AbortReason
  private externalSignal?: AbortSignal
  private isRunning = false
  private hasRun = false

  constructor(config: RunConfig, options: RunnerOptions = {}) {
    super()
    this.config = config
    this.quiet = options.quiet ?? false
    this.clock = options.clock ?? createClock()
    this.runId = randomUUID()
    this.externalSignal = options.signal

    for (const [id, backend] of Object.entries(options.backends ?? {})) {
      this.backends.set(id, backend)
    }
    this.registry = new BackendRegistry(config.backends)

    this.controller = createConcurrencyController({
      maxInFlight: config.concurrency,
      rateLimit: config.rateLimit,
      clock: this.clock,
    })

    this.executor = createRequestExecutor({
      controller: this.controller,
      timingEngine: createTimingEngine(this.clock),
      classifier: new OutcomeClassifier(config.retry, options.random),
      clock: this.clock,
      resolveBackend: (id) => this.resolveBackend(id),
    })

    this.aggregator = this.createAggregator(this.runId)

    this.setupEventForwarding()
  }

  /**
   * Run warmup and then the measured requests. A Runner runs once. Resolves with the final
   * report; rejects with RunAbortedError (carrying the partial report) when
   * the run is cancelled, hits its deadline or exhausts its failure budget.
   */
  async run(): Promise<AggregatedReport> {
    if (this.isRunning) {
      throw new Error('Runner is already running')
    }
    // The aggregator and abort state belong to a single run
    if (this.hasRun) {
      throw new Error('Runner has already run; create a new Runner for another run')
    }
    this.isRunning = true
    this.hasRun = true

    let deadlineTimer: NodeJS.Timeout | undefined
    let snapshotTimer: NodeJS.Timeout | undefined
    const onExternalAbort = () => this.cancel()

    try {
      this.prepareBackends()

      if (this.externalSignal?.aborted) {
        this.cancel()
      }
      this.externalSignal?.addEventListener('abort', onExternalAbort, { once: true })

      if (this.config.deadlineMs !== undefined) {
        deadlineTimer = setTimeout(() => this.abort('deadline'), this.config.deadlineMs)
      }

      if (!this.quiet) {
        logger.info(
          `Starting run ${this.runId}: ${this.config.iterations} request(s), concurrency ${this.config.concurrency}` +
            (this.config.rateLimit ? `, ${this.config.rateLimit.requestsPerSecond} req/s` : ''),
        )
      }
      this.emit('runStart', this.config.iterations)

      if (this.config.warmup > 0 && !this.aborter.signal.aborted) {
        this.emit('warmupStart', this.config.warmup)
        const warmup = this.createAggregator(`${this.runId}-warmup`)
        const warmupSpecs = expandScenarios(this.config, {
          runId: this.runId,
          count: this.config.warmup,
          warmup: true,
        })
        await this.drive(warmupSpecs, warmup)
        warmup.complete(this.abortReason ?? 'completed')
        logger.debug(`Warmup finished: ${warmup.snapshot().counts.success}/${this.config.warmup} succeeded`)
        this.emit('warmupComplete', warmup.snapshot())
      }

      this.aggregator.start()
      if (this.config.snapshotIntervalMs !== undefined) {
        snapshotTimer = setInterval(
          () => this.emit('snapshot', this.aggregator.snapshot()),
          this.config.snapshotIntervalMs,
        )
      }

      if (!this.aborter.signal.aborted) {
        await this.drive(
          expandScenarios(this.config, { runId: this.runId, count: this.config.iterations }),
          this.aggregator,
        )
      }

      this.aggregator.complete(this.abortReason ?? 'completed')
      const report = this.aggregator.snapshot()

      if (this.abortReason) {
        throw new RunAbortedError(this.abortReason, report)
      }

      if (!this.quiet) {
        logger.info(
          `Run completed: ${report.counts.success} succeeded, ${report.counts.failed} failed in ${report.durationMs}ms`,
        )
      }
      this.emit('runComplete', report)

      return report
    } catch (error) {
      const runError = error instanceof Error ? error : new Error(String(error))
      if (runError instanceof RunAbortedError) {
        logger.warn(`Run aborted (${runError.reason}) after ${runError.report.counts.total} request(s)`)
      } else {
        logger.error('Run failed:', runError)
      }
      this.emit('runError', runError)
      throw runError
    } finally {
      clearTimeout(deadlineTimer)
      clearInterval(snapshotTimer)
      this.externalSignal?.removeEventListener('abort', onExternalAbort)
      this.isRunning = false
    }
  }

  /**
   * Cancel the run: waiting and backing-off requests end as cancelled,
   * in-flight attempts finish
   */
  cancel(): void {
    this.abort('cancelled')
  }

  async stop(): Promise<void> {
    this.cancel()
    this.controller.close()
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      abortReason: this.abortReason,
      ...this.controller.getStatus(),
    }
  }

  getAggregator(): MetricsAggregator {
    return this.aggregator
  }

  private abort(reason: AbortReason): void {
    if (this.abortReason) return
    this.abortReason = reason
    logger.debug(`Aborting run ${this.runId}: ${reason}`)
    this.aborter.abort(new Error(`Run aborted: ${reason}`))
  }

  /**
   * Pulls specs from the shared iterator with `workers` concurrent loops.
   * A worker stops pulling once the run is aborted; specs already pulled
   * still produce an Outcome.
   */
  private async drive(specs: Iterator<RequestSpec>, aggregator: MetricsAggregator): Promise<void> {
    const signal = this.aborter.signal
    const workerCount = this.config.workers ?? this.config.concurrency
    const failureLimit = this.config.abortAfterConsecutiveFailures
    let consecutiveFailures = 0

    const worker = async (): Promise<void> => {
      while (!signal.aborted) {
        const next = specs.next()
        if (next.done) return
        const spec = next.value

        this.emit('requestStart', spec)
        const outcome = await this.executor.execute(spec, signal)
        aggregator.ingest(outcome)
        this.emit('requestComplete', outcome)

        if (outcome.status === 'failed') {
          consecutiveFailures++
          if (failureLimit !== undefined && consecutiveFailures >= failureLimit) {
            logger.warn(`${consecutiveFailures} consecutive requests failed, aborting run`)
            this.abort('exhausted')
          }
        } else if (outcome.status === 'success') {
          consecutiveFailures = 0
        }
      }
    }

    await Promise.all(Array.from({ length: workerCount }, () => worker()))
  }

  private resolveBackend(id: string): Backend {
    const existing = this.backends.get(id)
    if (existing) return existing

    const backend = this.registry.create(id)
    this.backends.set(id, backend)
    return backend
  }

  // Builds every backend the scenarios use so that configuration errors surface before any request
  private prepareBackends(): void {
    const ids = new Set(this.config.scenarios.map((scenario) => scenario.backend))
    for (const id of ids) {
      if (this.backends.has(id)) continue

      const envCheck = this.registry.validateEnv(id)
      if (!envCheck.valid) {
        throw new Error(
          `Missing required environment variables for backend "${id}": ${envCheck.missingVars.join(', ')}`,
        )
      }
      this.resolveBackend(id)
    }
  }

  private createAggregator(runId: string): MetricsAggregator {
    return new MetricsAggregator({
      runId,
      relativeAccuracy: this.config.histogramAccuracy,
      recentErrorLimit: this.config.recentErrorLimit,
    })
  }

  /**
   * Set up event forwarding from executor to runner
   */
  private setupEventForwarding(): void {
    this.executor.on('attemptFailed', (spec: RequestSpec, attempt: number, kind: ErrorKind, decision: RetryDecision) => {
      logger.debug(`${spec.id} attempt ${attempt} failed with ${kind}`)
      this.emit('requestFailed', spec, attempt, kind, decision.action === 'retry')
    })

    this.executor.on('retry', (spec: RequestSpec, attempt: number, delayMs: number) => {
      this.emit('requestRetry', spec, attempt, delayMs)
    })
  }
}

export function createRunner(config: RunConfig, options?: RunnerOptions): Runner {
  return new Runner(config, options)
}
