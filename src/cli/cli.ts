import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { setLogLevel } from '../logger'
import { printConfigCommand } from './print-config'
import { runCommand } from './commands/run'
import { validateCommand } from './commands/validate'

export function createCli() {
  return yargs(hideBin(process.argv))
    .scriptName('inferprobe')
    .usage('$0 <command> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to configuration file',
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Enable verbose logging',
      global: true,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      describe: 'Suppress non-essential output',
      global: true,
    })
    .middleware((argv) => {
      if (argv.verbose) setLogLevel('debug')
      else if (argv.quiet) setLogLevel('warn')
    })
    .command(runCommand)
    .command(validateCommand)
    .command(printConfigCommand)
    .demandCommand(1, 'You need to specify a command')
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv?: string[]) {
  const cli = createCli()

  if (argv) {
    return cli.parseAsync(argv)
  }

  return cli.parseAsync()
}
