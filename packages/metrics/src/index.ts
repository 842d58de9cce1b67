export {
  DEFAULT_METRICS_ENGINE_CONFIG,
  type DeliveryRatingConfig,
  type LowerBoundTiers,
  type MetricsEngineConfig,
  type UpperBoundTiers,
} from "./config.js";
export { computeAuthorStats } from "./domain/author-stats.js";
export {
  computeChangeFailureRate,
  computeLeadTimeHours,
  computeMttrHours,
  computePeriodMetrics,
  computeReviewLatencyHours,
  countFilesTouched,
} from "./domain/delivery-metrics.js";
export { computeMetricDelta, computeMetricDeltas } from "./domain/metric-deltas.js";
export { rateDeliveryPerformance } from "./domain/delivery-ratings.js";
export { buildReviewInfluence } from "./domain/review-influence.js";
export {
  computeMetricsSummary,
  type ComputeMetricsSummaryInput,
  type MetricsSummary,
} from "./application/compute-period-metrics.js";
