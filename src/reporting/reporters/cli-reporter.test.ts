import { describe, it, expect } from '@jest/globals'
import { CLIReporter } from './cli-reporter'
import { createReportFixture, distribution, targetSummary } from '../../testing/report-fixture'

describe('CLIReporter', () => {
  describe('generate', () => {
    it('should render the header and summary lines', () => {
      const reporter = new CLIReporter({ showColors: false })

      const lines = reporter.generate(createReportFixture()).split('\n')

      expect(lines.slice(0, 7)).toEqual([
        '! COMPLETED WITH FAILURES Inference profile run-1 (5.0s)',
        '',
        'Requests: 10 total, 8 succeeded, 2 failed, 0 cancelled (success rate 80.0%)',
        'Attempts: 14 (4 retries)',
        'Throughput: 1.60 req/s',
        'Tokens: 80 in, 512 out',
        '',
      ])
    })

    it('should render a distribution table', () => {
      const reporter = new CLIReporter({ showColors: false })

      const lines = reporter.generate(createReportFixture()).split('\n')

      expect(lines.slice(7, 13)).toEqual([
        'Metric        | Count  | Mean     | p50      | p90      | p99      | Max',
        '--------------+--------+----------+----------+----------+----------+---------',
        'TTFT          | 8      | 150.4ms  | 140.0ms  | 220.0ms  | 250.0ms  | 250.0ms',
        'Total latency | 8      | 1100.0ms | 1050.0ms | 1400.0ms | 1500.0ms | 1500.0ms',
        'Inter-token   | 400    | 20.0ms   | 19.0ms   | 30.0ms   | 39.0ms   | 40.0ms',
        'Tokens/s      | 8      | 50.0     | 50.0     | 58.0     | 60.0     | 60.0',
      ])
    })

    it('should compare targets side by side when a run covers several', () => {
      const reporter = new CLIReporter({ showColors: false })
      const report = createReportFixture()
      report.breakdown.byTarget = {
        'openai/gpt-test': targetSummary(
          'openai',
          'gpt-test',
          { total: 5, success: 5, failed: 0, cancelled: 0 },
          {
            ttft: distribution({ count: 5, p50: 120, p99: 300 }),
            totalLatency: distribution({ count: 5, p50: 900, p99: 1500 }),
            tokensPerSecond: distribution({ count: 5, mean: 42.5 }, 'tokens/s'),
          },
        ),
        'simulated/sim-model': targetSummary(
          'simulated',
          'sim-model',
          { total: 5, success: 3, failed: 2, cancelled: 0 },
          {
            ttft: distribution({ count: 3, p50: 20, p99: 35.5 }),
            totalLatency: distribution({ count: 3, p50: 200, p99: 260 }),
            tokensPerSecond: distribution({ count: 3, mean: 150 }, 'tokens/s'),
          },
        ),
        'remote/down-model': targetSummary('remote', 'down-model', { total: 2, success: 0, failed: 2, cancelled: 0 }),
      }

      const lines = reporter.generate(report).split('\n')

      expect(lines.slice(13, 20)).toEqual([
        '',
        'By target:',
        'Target              | OK     | TTFT p50 | TTFT p99 | Latency p50 | Latency p99 | Tokens/s',
        '--------------------+--------+----------+----------+-------------+-------------+---------',
        'openai/gpt-test     | 5/5    | 120.0ms  | 300.0ms  | 900.0ms     | 1500.0ms    | 42.5',
        'simulated/sim-model | 3/5    | 20.0ms   | 35.5ms   | 200.0ms     | 260.0ms     | 150.0',
        'remote/down-model   | 0/2    | -        | -        | -           | -           | -',
      ])
      expect(lines[20]).toBe('')
      expect(lines[21]).toBe('Failures by kind:')
    })

    it('should leave out the target table for a single target', () => {
      const reporter = new CLIReporter({ showColors: false })

      expect(reporter.generate(createReportFixture())).not.toContain('By target:')
    })

    it('should list failures by kind and recent errors', () => {
      const reporter = new CLIReporter({ showColors: false })

      const lines = reporter.generate(createReportFixture()).split('\n')

      expect(lines.slice(13)).toEqual([
        '',
        'Failures by kind:',
        '  • ServerError: 2',
        '',
        'Recent errors:',
        '  • run-1-req-3 [ServerError] simulated: HTTP 503: Simulated failure (503)',
        '  • run-1-req-7 [ServerError] simulated: HTTP 503: Simulated failure (503)',
      ])
    })

    it('should report a clean run without a failure section', () => {
      const reporter = new CLIReporter({ showColors: false })
      const report = createReportFixture({
        counts: { total: 4, success: 4, failed: 0, cancelled: 0, failedByKind: {} },
        recentErrors: [],
        costUsd: 0.01234,
        tokens: { input: 10, output: 20, thinking: 5 },
      })

      const output = reporter.generate(report)

      expect(output.split('\n')[0]).toBe('✓ COMPLETED Inference profile run-1 (5.0s)')
      expect(output).toContain('Tokens: 10 in, 20 out, 5 thinking, $0.0123')
      expect(output).not.toContain('Failures by kind:')
    })

    it('should mark aborted runs', () => {
      const reporter = new CLIReporter({ showColors: false })

      const output = reporter.generate(createReportFixture({ termination: 'deadline' }))

      expect(output.split('\n')[0]).toBe('✗ ABORTED (deadline) Inference profile run-1 (5.0s)')
    })

    it('should show dashes for metrics without samples', () => {
      const reporter = new CLIReporter({ showColors: false, showMetrics: ['ttft'] })
      const report = createReportFixture()
      report.distributions.ttft = distribution()

      const lines = reporter.generate(report).split('\n')

      expect(lines[9]).toBe('TTFT   | 0      | -      | -      | -      | -      | -')
      expect(lines).toHaveLength(17)
    })

    it('should truncate long error messages', () => {
      const reporter = new CLIReporter({ showColors: false, maxMessageLength: 12 })

      const output = reporter.generate(createReportFixture())

      expect(output).toContain('  • run-1-req-3 [ServerError] simulated: HTTP 503:...')
    })

    it('should limit the number of recent errors shown', () => {
      const reporter = new CLIReporter({ showColors: false, maxErrors: 1 })

      const output = reporter.generate(createReportFixture())

      expect(output).not.toContain('run-1-req-3')
      expect(output).toContain('run-1-req-7')
    })
  })

  describe('colorization', () => {
    it('should apply colors when enabled', () => {
      const reporter = new CLIReporter({ showColors: true })

      const output = reporter.generate(createReportFixture())

      // eslint-disable-next-line no-control-regex
      expect(output).toMatch(/\x1b\[[0-9;]*m/)
    })

    it('should not apply colors when disabled', () => {
      const reporter = new CLIReporter({ showColors: false })

      const output = reporter.generate(createReportFixture())

      // eslint-disable-next-line no-control-regex
      expect(output).not.toMatch(/\x1b\[[0-9;]*m/)
    })
  })
})
