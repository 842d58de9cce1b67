export type ChurnSpikeConfig = {
  fixedThreshold: number;
  /** Minimum commits in the period before the statistical threshold applies. */
  statisticalMinCommits: number;
  stdDevMultiplier: number;
};

export type OutlierAuthorConfig = {
  minAuthors: number;
  stdDevMultiplier: number;
};

export type RiskDetectorConfig = {
  churnSpike: ChurnSpikeConfig;
  outlierAuthor: OutlierAuthorConfig;
};

export const DEFAULT_RISK_DETECTOR_CONFIG: RiskDetectorConfig = {
  churnSpike: {
    fixedThreshold: 100,
    statisticalMinCommits: 5,
    stdDevMultiplier: 2,
  },
  outlierAuthor: {
    minAuthors: 2,
    stdDevMultiplier: 1,
  },
};
