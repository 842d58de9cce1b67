import type {
  DeliveryRatings,
  PerformanceRating,
  PeriodMetrics,
  RatedIndicator,
} from "@deliverypulse/core";
import type { DeliveryRatingConfig, LowerBoundTiers, UpperBoundTiers } from "../config.js";

const DAYS_PER_WEEK = 7;

const ratingRank: Readonly<Record<PerformanceRating, number>> = {
  elite: 4,
  high: 3,
  medium: 2,
  low: 1,
};

const rateLowerIsBetter = (value: number | null, tiers: UpperBoundTiers): RatedIndicator => {
  if (value === null) {
    return { rating: "insufficient_data", value };
  }

  if (value <= tiers.elite) {
    return { rating: "elite", value };
  }
  if (value <= tiers.high) {
    return { rating: "high", value };
  }
  if (value <= tiers.medium) {
    return { rating: "medium", value };
  }
  return { rating: "low", value };
};

const rateHigherIsBetter = (value: number, tiers: LowerBoundTiers): RatedIndicator => {
  if (value >= tiers.elite) {
    return { rating: "elite", value };
  }
  if (value >= tiers.high) {
    return { rating: "high", value };
  }
  if (value >= tiers.medium) {
    return { rating: "medium", value };
  }
  return { rating: "low", value };
};

const overallRating = (indicators: readonly RatedIndicator[]): DeliveryRatings["overall"] => {
  const ranks: number[] = [];
  for (const indicator of indicators) {
    if (indicator.rating !== "insufficient_data") {
      ranks.push(ratingRank[indicator.rating]);
    }
  }

  if (ranks.length === 0) {
    return "insufficient_data";
  }

  const averageRank = ranks.reduce((total, rank) => total + rank, 0) / ranks.length;
  if (averageRank >= 3.5) {
    return "elite";
  }
  if (averageRank >= 2.5) {
    return "high";
  }
  if (averageRank >= 1.5) {
    return "medium";
  }
  return "low";
};

/**
 * Four-keys ratings. Deploy frequency is scaled to deploys per week from the
 * period length so daily and monthly periods rate on the same scale.
 */
export const rateDeliveryPerformance = (
  metrics: PeriodMetrics,
  periodDays: number,
  config: DeliveryRatingConfig,
): DeliveryRatings => {
  const weeks = periodDays / DAYS_PER_WEEK;
  const deploysPerWeek = weeks > 0 ? metrics.deployFrequency / weeks : 0;

  const deploymentFrequency = rateHigherIsBetter(deploysPerWeek, config.deploysPerWeek);
  const leadTime = rateLowerIsBetter(metrics.leadTimeHours, config.leadTimeHours);
  const changeFailureRate = rateLowerIsBetter(metrics.changeFailureRate, config.changeFailureRatePercent);
  const meanTimeToRecovery = rateLowerIsBetter(metrics.mttrHours, config.mttrHours);

  return {
    deploymentFrequency,
    leadTime,
    changeFailureRate,
    meanTimeToRecovery,
    overall: overallRating([deploymentFrequency, leadTime, changeFailureRate, meanTimeToRecovery]),
  };
};
