/* eslint-disable no-console */

import { loadConfig } from '../core/config'
import { BackendRegistry, type ResolvedBackendDefinition } from '../backends/registry'
import { reportCommandError } from './report-error'
import type { BaseArgs, PrintConfigArgs } from './types'
import type { CommandModule } from 'yargs'

export const printConfigCommand: CommandModule<BaseArgs, PrintConfigArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  builder: (yargs) => {
    return yargs.option('format', {
      alias: 'f',
      type: 'string',
      choices: ['json'] as const,
      default: 'json',
      describe: 'Output format for the configuration',
    })
  },
  handler: async (argv) => {
    try {
      const config = await loadConfig({
        cwd: process.cwd(),
        configPath: argv.config,
      })

      const registry = new BackendRegistry(config.backends)
      const resolvedBackends: Record<string, ResolvedBackendDefinition> = {}
      let failed = false

      new Set(config.scenarios.map((scenario) => scenario.backend)).forEach((backendId) => {
        try {
          resolvedBackends[backendId] = registry.getDefinition(backendId)
        } catch (error) {
          failed = true
          console.error(
            `❌ Failed to resolve backend "${backendId}":`,
            error instanceof Error ? error.message : String(error),
          )
        }
      })

      const output = {
        ...config,
        _resolvedBackends: resolvedBackends,
      }

      console.log(JSON.stringify(output, null, 2))

      if (failed) {
        process.exitCode = 1
      } else if (!argv.quiet) {
        console.error('✅ Configuration is valid')
      }
    } catch (error) {
      reportCommandError(error)
    }
  },
}
