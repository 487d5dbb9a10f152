import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals'
import { writeFile, mkdir, rm } from 'fs/promises'
import { join } from 'path'
import { runCli } from '../cli'
import { captureOutput } from './capture-output'

jest.mock('../../logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
  setLogLevel: jest.fn(),
}))

const TEST_DIR = join(__dirname, '../../../tmp/cli-print-config-tests')

describe('print-config command', () => {
  beforeEach(async () => {
    await mkdir(TEST_DIR, { recursive: true })

    await writeFile(
      join(TEST_DIR, 'probe.config.json'),
      JSON.stringify({
        iterations: 20,
        backends: {
          fast: {
            id: 'fast',
            name: 'Fast simulator',
            extends: 'simulated',
            options: { ttftMs: 5, jitter: 0 },
          },
        },
        scenarios: [{ id: 'chat', backend: 'fast', model: 'sim-model', prompt: 'hi' }],
      }),
    )

    await writeFile(join(TEST_DIR, 'invalid.config.json'), JSON.stringify({ iterations: -1 }))
  })

  afterEach(async () => {
    process.exitCode = undefined
    await rm(TEST_DIR, { recursive: true, force: true })
  })

  it('should print the resolved configuration with its backends', async () => {
    const capture = captureOutput()

    try {
      await runCli(['print-config', '--config', join(TEST_DIR, 'probe.config.json')])

      const output = JSON.parse(capture.getLogs())
      expect(output.iterations).toBe(20)
      expect(output.concurrency).toBe(1)
      expect(output._resolvedBackends).toEqual({
        fast: {
          id: 'fast',
          name: 'Fast simulator',
          type: 'simulated',
          options: { ttftMs: 5, interTokenMs: 20, outputTokens: 64, jitter: 0 },
        },
      })
      expect(capture.getErrors()).toBe('✅ Configuration is valid')
    } finally {
      capture.restore()
    }
  })

  it('should stay silent on stderr in quiet mode', async () => {
    const capture = captureOutput()

    try {
      await runCli(['print-config', '--config', join(TEST_DIR, 'probe.config.json'), '--quiet'])

      expect(capture.getErrors()).toBe('')
    } finally {
      capture.restore()
    }
  })

  it('should report validation failures', async () => {
    const capture = captureOutput()

    try {
      await runCli(['print-config', '--config', join(TEST_DIR, 'invalid.config.json')])

      expect(capture.getLogs()).toBe('')
      expect(capture.getErrors()).toBe(
        '❌ Configuration validation failed:\niterations: Number must be greater than 0',
      )
      expect(process.exitCode).toBe(1)
    } finally {
      capture.restore()
    }
  })

  it('should report a missing config file', async () => {
    const capture = captureOutput()

    try {
      await runCli(['print-config', '--config', join(TEST_DIR, 'missing.json')])

      expect(capture.getErrors()).toContain('❌ Failed to load configuration:')
      expect(process.exitCode).toBe(1)
    } finally {
      capture.restore()
    }
  })
})
