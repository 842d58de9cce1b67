import { periodDurationDays } from "@deliverypulse/activity";
import type {
  AuthorStats,
  DeliveryRatings,
  MetricDeltas,
  PeriodActivity,
  PeriodMetrics,
  ReviewInfluence,
} from "@deliverypulse/core";
import { DEFAULT_METRICS_ENGINE_CONFIG, type MetricsEngineConfig } from "../config.js";
import { computeAuthorStats } from "../domain/author-stats.js";
import { rateDeliveryPerformance } from "../domain/delivery-ratings.js";
import { computePeriodMetrics } from "../domain/delivery-metrics.js";
import { computeMetricDeltas } from "../domain/metric-deltas.js";
import { buildReviewInfluence } from "../domain/review-influence.js";

export type ComputeMetricsSummaryInput = {
  activity: PeriodActivity;
  riskyCommitShas?: ReadonlySet<string>;
  previous?: PeriodMetrics;
  config?: Partial<MetricsEngineConfig>;
};

export type MetricsSummary = {
  authorStats: readonly AuthorStats[];
  metrics: PeriodMetrics;
  deltas: MetricDeltas | null;
  ratings: DeliveryRatings;
  reviewInfluence: readonly ReviewInfluence[];
};

const mergeConfig = (overrides: Partial<MetricsEngineConfig> | undefined): MetricsEngineConfig => {
  if (overrides === undefined) {
    return DEFAULT_METRICS_ENGINE_CONFIG;
  }

  return {
    ratings: {
      ...DEFAULT_METRICS_ENGINE_CONFIG.ratings,
      ...overrides.ratings,
    },
  };
};

export const computeMetricsSummary = (input: ComputeMetricsSummaryInput): MetricsSummary => {
  const config = mergeConfig(input.config);
  const { period, commits, pullRequests } = input.activity;

  const metrics = computePeriodMetrics(commits, pullRequests);
  return {
    authorStats: computeAuthorStats(commits, input.riskyCommitShas ?? new Set<string>()),
    metrics,
    deltas: input.previous === undefined ? null : computeMetricDeltas(metrics, input.previous),
    ratings: rateDeliveryPerformance(metrics, periodDurationDays(period), config.ratings),
    reviewInfluence: buildReviewInfluence(pullRequests),
  };
};
