export { CLIReporter, type CLIReporterOptions } from './cli-reporter'
export { JSONReporter, type JSONReporterOptions, type JSONReport, type JSONTargetBreakdown } from './json-reporter'
