/**
 * Upper bounds (inclusive) for the elite, high and medium tiers; anything
 * beyond the medium bound rates low.
 */
export type UpperBoundTiers = {
  elite: number;
  high: number;
  medium: number;
};

/**
 * Lower bounds (inclusive) for tiers where higher is better.
 */
export type LowerBoundTiers = {
  elite: number;
  high: number;
  medium: number;
};

export type DeliveryRatingConfig = {
  deploysPerWeek: LowerBoundTiers;
  leadTimeHours: UpperBoundTiers;
  changeFailureRatePercent: UpperBoundTiers;
  mttrHours: UpperBoundTiers;
};

export type MetricsEngineConfig = {
  ratings: DeliveryRatingConfig;
};

export const DEFAULT_METRICS_ENGINE_CONFIG: MetricsEngineConfig = {
  ratings: {
    // Daily deploys are elite, weekly high, monthly medium.
    deploysPerWeek: { elite: 7, high: 1, medium: 0.25 },
    // One day, one week, one month.
    leadTimeHours: { elite: 24, high: 168, medium: 720 },
    changeFailureRatePercent: { elite: 5, high: 10, medium: 15 },
    mttrHours: { elite: 1, high: 24, medium: 168 },
  },
};
