import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals'
import { writeFile, mkdir, rm } from 'fs/promises'
import { join } from 'path'
import { runCli } from '../cli'
import { captureOutput } from './capture-output'

jest.mock('../../logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
  setLogLevel: jest.fn(),
}))

const TEST_DIR = join(__dirname, '../../../tmp/cli-validate-tests')
const SIMULATED_CONFIG = join(TEST_DIR, 'simulated.config.json')
const REMOTE_CONFIG = join(TEST_DIR, 'remote.config.json')

describe('validate command', () => {
  beforeEach(async () => {
    await mkdir(TEST_DIR, { recursive: true })

    await writeFile(
      SIMULATED_CONFIG,
      JSON.stringify({ scenarios: [{ id: 'chat', backend: 'simulated', model: 'sim-model', prompt: 'hi' }] }),
    )

    await writeFile(
      REMOTE_CONFIG,
      JSON.stringify({
        backends: {
          remote: {
            id: 'remote',
            type: 'openai-compatible',
            options: { baseUrl: 'http://localhost:8000/v1', apiKey: '${INFERPROBE_CLI_TEST_KEY}' },
          },
        },
        scenarios: [{ id: 'chat', backend: 'remote', model: 'test-model', prompt: 'hi' }],
      }),
    )
  })

  afterEach(async () => {
    process.exitCode = undefined
    delete process.env.INFERPROBE_CLI_TEST_KEY
    await rm(TEST_DIR, { recursive: true, force: true })
  })

  it('should accept a configuration whose backends need no health check', async () => {
    const capture = captureOutput()

    try {
      await runCli(['validate', '--config', SIMULATED_CONFIG])

      expect(capture.getLogs()).toBe('✔ simulated (simulated)')
      expect(capture.getErrors()).toBe('✅ Configuration is valid')
      expect(process.exitCode).toBeUndefined()
    } finally {
      capture.restore()
    }
  })

  it('should report missing environment variables', async () => {
    const capture = captureOutput()

    try {
      await runCli(['validate', '--config', REMOTE_CONFIG])

      expect(capture.getErrors()).toBe('❌ remote: missing environment variables INFERPROBE_CLI_TEST_KEY')
      expect(process.exitCode).toBe(1)
    } finally {
      capture.restore()
    }
  })

  it('should skip health checks when asked', async () => {
    process.env.INFERPROBE_CLI_TEST_KEY = 'test-secret'
    const capture = captureOutput()

    try {
      await runCli(['validate', '--config', REMOTE_CONFIG, '--skip-health', '--quiet'])

      expect(capture.getLogs()).toBe('✔ remote (openai-compatible)')
      expect(capture.getErrors()).toBe('')
    } finally {
      capture.restore()
    }
  })
})
