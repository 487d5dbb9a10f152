export { LogHistogram } from './histogram'
export {
  MetricsAggregator,
  createMetricsAggregator,
  mergeReports,
  type MetricsAggregatorOptions,
} from './aggregator'
export { MetricHistograms } from './metric-histograms'
