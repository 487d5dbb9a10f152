/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { mkdir } from 'fs/promises'
import { dirname, resolve } from 'path'
import { nsToMs } from '../../core/clock'
import { loadConfig } from '../../core/config'
import { RunAbortedError } from '../../core/errors'
import { Runner, createRunner } from '../../core/runner'
import type { AggregatedReport, ErrorKind, Outcome, RequestSpec, RunConfig } from '../../core/types'
import { CLIReporter, JSONReporter } from '../../reporting'
import { logger } from '../../logger'
import { reportCommandError } from '../report-error'
import type { BaseArgs, RunArgs } from '../types'

export const runCommand: CommandModule<BaseArgs, RunArgs> = {
  command: 'run',
  describe: 'Profile the configured scenarios against their backends',
  builder: (yargs) => {
    return yargs
      .option('iterations', {
        alias: 'n',
        type: 'number',
        describe: 'Number of measured requests',
      })
      .option('concurrency', {
        type: 'number',
        describe: 'Maximum requests in flight',
      })
      .option('rate-limit', {
        type: 'number',
        describe: 'Maximum request admissions per second',
      })
      .option('burst', {
        type: 'number',
        describe: 'Token bucket capacity for --rate-limit',
      })
      .option('warmup', {
        type: 'number',
        describe: 'Unmeasured requests to send first',
      })
      .option('timeout', {
        type: 'number',
        describe: 'Per-attempt timeout in milliseconds',
      })
      .option('max-attempts', {
        type: 'number',
        describe: 'Attempts per request, including the first',
      })
      .option('scenario', {
        type: 'string',
        array: true,
        describe: 'Run only the specified scenario(s) (by id)',
      })
      .option('format', {
        type: 'string',
        choices: ['cli', 'json'] as const,
        describe: 'Report format written to stdout',
      })
      .option('output', {
        alias: 'o',
        type: 'string',
        describe: 'Also write the JSON report to this file',
      })
      .example('$0 run', 'Profile every configured scenario')
      .example('$0 run -n 200 --concurrency 16', 'Send 200 requests, 16 at a time')
      .example('$0 run --rate-limit 5 --burst 10', 'Admit at most 5 requests per second')
      .example('$0 run --scenario short-chat --format json', 'Profile one scenario and print JSON')
  },
  handler: async (argv) => {
    try {
      process.exitCode = await runProfile(argv)
    } catch (error) {
      reportCommandError(error)
    }
  },
}

/**
 * Builds the config overrides carried by command-line flags
 */
export function cliOverrides(args: RunArgs): Record<string, unknown> {
  const overrides: Record<string, unknown> = {
    iterations: args.iterations,
    concurrency: args.concurrency,
    warmup: args.warmup,
    timeoutMs: args.timeout,
  }

  if (args['max-attempts'] !== undefined) {
    overrides.retry = { maxAttempts: args['max-attempts'] }
  }
  if (args['rate-limit'] !== undefined || args.burst !== undefined) {
    overrides.rateLimit = { requestsPerSecond: args['rate-limit'], burst: args.burst }
  }

  return overrides
}

function filterScenarios(config: RunConfig, ids: string[] | undefined): RunConfig {
  if (!ids || ids.length === 0) return config

  const scenarios = config.scenarios.filter((scenario) => ids.includes(scenario.id))
  if (scenarios.length === 0) {
    throw new Error(`No scenarios match ${ids.map((id) => `"${id}"`).join(', ')}`)
  }
  return { ...config, scenarios }
}

async function runProfile(args: RunArgs): Promise<number> {
  logger.info('Loading configuration...')
  const loaded = await loadConfig({
    configPath: args.config,
    cliArgs: cliOverrides(args),
  })
  const config = filterScenarios(loaded, args.scenario)

  const runner = createRunner(config, { quiet: args.quiet })
  setupProgressHandlers(runner, args.quiet)

  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, cancelling run...`)
    runner.cancel()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  let report: AggregatedReport
  let aborted = false
  try {
    report = await runner.run()
  } catch (error) {
    if (!(error instanceof RunAbortedError)) throw error
    report = error.report
    aborted = true
  } finally {
    process.removeListener('SIGINT', onSignal)
    process.removeListener('SIGTERM', onSignal)
  }

  const formats = config.output?.formats ?? ['cli']
  const format = args.format ?? (formats.includes('cli') ? 'cli' : 'json')
  const jsonReporter = new JSONReporter({
    prettyPrint: true,
    includeHistograms: config.output?.includeHistograms ?? false,
  })

  if (format === 'json') {
    console.log(jsonReporter.generate(report))
  } else {
    new CLIReporter({ showColors: process.stdout.isTTY === true }).print(report)
  }

  const reportPath = args.output
    ? resolve(args.output)
    : config.output && formats.includes('json')
      ? resolve(config.output.dir, config.output.filename ?? `inferprobe-${report.runId}.json`)
      : undefined
  if (reportPath) {
    await mkdir(dirname(reportPath), { recursive: true })
    await jsonReporter.writeFile(report, reportPath)
    logger.info(`JSON report written to ${reportPath}`)
  }

  return aborted || report.counts.failed > 0 ? 1 : 0
}

/**
 * Set up progress handlers for the runner
 */
function setupProgressHandlers(runner: Runner, quiet?: boolean): void {
  if (quiet) return

  let finished = 0

  runner.on('runStart', (iterations: number) => {
    logger.info(`🚀 Starting ${iterations} request(s)`)
  })

  runner.on('warmupStart', (count: number) => {
    logger.info(`🔥 Warming up with ${count} request(s)`)
  })

  runner.on('requestStart', (spec: RequestSpec) => {
    logger.debug(`⏳ ${spec.id} (${spec.scenarioId} → ${spec.backend}/${spec.model})`)
  })

  runner.on('requestComplete', (outcome: Outcome) => {
    if (outcome.warmup) return
    finished++
    if (outcome.status === 'success') {
      const ttftNs = outcome.metrics?.ttftNs
      logger.debug(`✅ ${outcome.requestId} TTFT ${ttftNs !== undefined ? `${nsToMs(ttftNs).toFixed(1)}ms` : 'n/a'}`)
    } else if (outcome.status === 'failed') {
      logger.warn(`❌ ${outcome.requestId} failed: ${outcome.error ?? outcome.errorKind}`)
    }
    if (finished % 50 === 0) {
      logger.info(`${finished} request(s) finished`)
    }
  })

  runner.on('requestFailed', (spec: RequestSpec, attempt: number, kind: ErrorKind, willRetry: boolean) => {
    if (willRetry) {
      logger.debug(`🔄 ${spec.id} attempt ${attempt + 1} failed with ${kind}, retrying`)
    }
  })

  runner.on('runComplete', (report: AggregatedReport) => {
    logger.info(`🏁 Run completed: ${report.counts.success} succeeded, ${report.counts.failed} failed`)
  })
}
