export {
  CLIReporter,
  type CLIReporterOptions,
  JSONReporter,
  type JSONReporterOptions,
  type JSONReport,
  type JSONTargetBreakdown,
} from './reporters'
