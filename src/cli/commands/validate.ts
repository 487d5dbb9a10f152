/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import { BackendRegistry } from '../../backends/registry'
import { logger } from '../../logger'
import { reportCommandError } from '../report-error'
import type { BaseArgs, ValidateArgs } from '../types'

export const validateCommand: CommandModule<BaseArgs, ValidateArgs> = {
  command: 'validate',
  describe: 'Check the configuration and that every backend it uses is usable',
  builder: (yargs) => {
    return yargs
      .option('skip-health', {
        type: 'boolean',
        default: false,
        describe: 'Do not contact backends that support a health check',
      })
      .example('$0 validate', 'Validate the configuration and ping remote backends')
  },
  handler: async (argv) => {
    try {
      const ok = await validateBackends(argv)
      if (!ok) {
        process.exitCode = 1
      } else if (!argv.quiet) {
        console.error('✅ Configuration is valid')
      }
    } catch (error) {
      reportCommandError(error)
    }
  },
}

async function validateBackends(args: ValidateArgs): Promise<boolean> {
  const config = await loadConfig({ configPath: args.config })
  const registry = new BackendRegistry(config.backends)
  const backendIds = Array.from(new Set(config.scenarios.map((scenario) => scenario.backend)))
  let ok = true

  for (const backendId of backendIds) {
    const envCheck = registry.validateEnv(backendId)
    if (!envCheck.valid) {
      ok = false
      console.error(`❌ ${backendId}: missing environment variables ${envCheck.missingVars.join(', ')}`)
      continue
    }

    const backend = registry.create(backendId)
    if (!backend.healthCheck || args['skip-health']) {
      console.log(`✔ ${backendId} (${backend.type})`)
      continue
    }

    try {
      logger.debug(`Checking health of backend ${backendId}`)
      await backend.healthCheck()
      console.log(`✔ ${backendId} (${backend.type}) is reachable`)
    } catch (error) {
      ok = false
      console.error(`❌ ${backendId}: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  return ok
}
