export { DEFAULT_RISK_DETECTOR_CONFIG } from "./config.js";
export type { ChurnSpikeConfig, OutlierAuthorConfig, RiskDetectorConfig } from "./config.js";
export { detectAfterHours, type AfterHoursFlag } from "./domain/after-hours.js";
export {
  detectChurnSpikes,
  resolveChurnThresholds,
  type ChurnSpikeFlag,
  type ChurnSpikeResult,
} from "./domain/churn-spikes.js";
export {
  aggregateAuthorChurn,
  detectOutlierAuthors,
  type AuthorChurn,
  type OutlierAuthorFlag,
  type OutlierAuthorResult,
} from "./domain/outlier-authors.js";
export { evaluatePeriodRisk, type EvaluatePeriodRiskInput } from "./application/evaluate-period-risk.js";
