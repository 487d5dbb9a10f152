import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { RunConfig } from '../types'
import { deepMerge, isPlainObject } from '../utils/deep-merge'
import validateConfig from './validate'
import { ConfigLoadError } from './errors'

export const CONFIG_FILENAMES = ['probe.config.js', 'probe.config.cjs', 'probe.config.json']

export function createDefaultConfig(): Record<string, unknown> {
  return {
    scenarios: [
      {
        id: 'default',
        backend: 'simulated',
        model: 'simulated-model',
        prompt: 'Explain what time to first token measures in one paragraph.',
      },
    ],
  }
}

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  cliArgs?: Record<string, unknown>
}

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Default config (lowest priority)
 * 2. Config file (probe.config.{js,cjs,json})
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RunConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'PROBE_', cliArgs = {} } = options

  let config = createDefaultConfig()

  const fileConfig = await loadConfigFile(cwd, configPath)
  if (fileConfig) {
    config = deepMerge(config, fileConfig)
  }

  const envConfig = loadConfigFromEnv(envPrefix)
  if (Object.keys(envConfig).length > 0) {
    config = deepMerge(config, envConfig)
  }

  if (Object.keys(cliArgs).length > 0) {
    config = deepMerge(config, cliArgs)
  }

  return validateConfig(config)
}

async function findConfigFile(cwd: string): Promise<string | null> {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = join(cwd, filename)
    const exists = await access(filePath).then(
      () => true,
      () => false,
    )
    if (exists) return filePath
  }
  return null
}

/**
 * Loads configuration from a JSON or CommonJS file
 */
async function loadConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown> | null> {
  const targetPath = configPath ? resolve(cwd, configPath) : await findConfigFile(cwd)
  if (!targetPath) {
    return null
  }

  let loaded: unknown
  try {
    if (targetPath.endsWith('.json')) {
      const content = await readFile(targetPath, 'utf-8')
      loaded = JSON.parse(content)
    } else {
      const configModule: unknown = await import(targetPath)
      loaded = isPlainObject(configModule) && configModule.default !== undefined ? configModule.default : configModule
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
      targetPath,
      { cause: error },
    )
  }

  if (!isPlainObject(loaded)) {
    throw new ConfigLoadError(`Config file ${targetPath} must export an object`, targetPath)
  }
  return loaded
}

function loadConfigFromEnv(prefix: string): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  // Map environment variables to config properties
  const envMappings = {
    [`${prefix}ITERATIONS`]: 'iterations',
    [`${prefix}CONCURRENCY`]: 'concurrency',
    [`${prefix}WORKERS`]: 'workers',
    [`${prefix}RATE_LIMIT`]: 'rateLimit.requestsPerSecond',
    [`${prefix}BURST`]: 'rateLimit.burst',
    [`${prefix}WARMUP`]: 'warmup',
    [`${prefix}TIMEOUT`]: 'timeoutMs',
    [`${prefix}DEADLINE`]: 'deadlineMs',
    [`${prefix}MAX_ATTEMPTS`]: 'retry.maxAttempts',
    [`${prefix}OUTPUT_DIR`]: 'output.dir',
    [`${prefix}OUTPUT_FORMATS`]: 'output.formats',
  }
  const listPaths = new Set(['output.formats'])

  Object.entries(envMappings).forEach(([envVar, configPath]) => {
    const value = process.env[envVar]
    if (value === undefined || value === '') return

    const parsed = listPaths.has(configPath) && !value.startsWith('[') ? splitList(value) : parseEnvValue(value)
    setNestedValue(config, configPath, parsed)
  })

  return config
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
}

/**
 * Parses environment variable values to appropriate types
 */
export function parseEnvValue(value: string): unknown {
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    return Number(value)
  }

  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      return value
    }
  }

  return value
}

/**
 * Sets a nested value in an object using dot notation
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.')
  let current = obj

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i]
    if (!key) continue

    const next = current[key]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }

  const finalKey = keys[keys.length - 1]
  if (finalKey) {
    current[finalKey] = value
  }
}
