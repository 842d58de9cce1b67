export type Granularity = "daily" | "weekly" | "monthly";

/**
 * Half-open interval `[startMs, endMs)` in epoch milliseconds.
 */
export type Period = {
  startMs: number;
  endMs: number;
  granularity: Granularity;
};

export type CommitCategory = "fix" | "feat" | "refactor" | "other";

export type CommitEvent = {
  sha: string;
  authorId: string;
  timestampMs: number;
  additions: number;
  deletions: number;
  filesChanged: number;
  filePaths: readonly string[];
  message: string;
  category: CommitCategory;
  isAfterHours: boolean;
};

export type CiOutcome = "pass" | "fail" | "unknown";

export type PullRequestEvent = {
  number: number;
  authorId: string;
  createdAtMs: number;
  mergedAtMs: number | null;
  additions: number;
  deletions: number;
  filesChanged: number;
  ciOutcome: CiOutcome;
  reviewTimestampsMs: readonly number[];
  reviewers: readonly string[];
};

export type PeriodActivity = {
  period: Period;
  commits: readonly CommitEvent[];
  pullRequests: readonly PullRequestEvent[];
};

export type IngestionCounts = {
  acceptedCommits: number;
  acceptedPullRequests: number;
  droppedMalformedCommits: number;
  droppedMalformedPullRequests: number;
  droppedOutOfRangeCommits: number;
  droppedOutOfRangePullRequests: number;
};

export type CategoryCounts = Readonly<Record<CommitCategory, number>>;

export type AuthorStats = {
  authorId: string;
  commitCount: number;
  totalAdditions: number;
  totalDeletions: number;
  totalChurn: number;
  averageChurnPerCommit: number;
  filesChanged: number;
  riskyCommitCount: number;
  afterHoursCommitCount: number;
  categoryCounts: CategoryCounts;
};

export type PeriodMetrics = {
  totalCommits: number;
  totalAdditions: number;
  totalDeletions: number;
  totalChurn: number;
  filesTouched: number;
  leadTimeHours: number | null;
  deployFrequency: number;
  changeFailureRate: number | null;
  mttrHours: number | null;
  reviewLatencyHours: number | null;
  mergedPullRequests: number;
  openPullRequests: number;
  ciEvaluatedPullRequests: number;
  failedPullRequests: number;
};

export type HistoricalPeriodMetrics = {
  period: Period;
  metrics: PeriodMetrics;
};

export type MetricDelta = {
  current: number | null;
  previous: number | null;
  delta: number | null;
  percentChange: number | null;
};

export type MetricDeltas = {
  totalCommits: MetricDelta;
  totalChurn: MetricDelta;
  leadTimeHours: MetricDelta;
  deployFrequency: MetricDelta;
  changeFailureRate: MetricDelta;
  mttrHours: MetricDelta;
};

export type PerformanceRating = "elite" | "high" | "medium" | "low";

export type RatedIndicator = {
  rating: PerformanceRating | "insufficient_data";
  value: number | null;
};

export type DeliveryRatings = {
  deploymentFrequency: RatedIndicator;
  leadTime: RatedIndicator;
  changeFailureRate: RatedIndicator;
  meanTimeToRecovery: RatedIndicator;
  overall: PerformanceRating | "insufficient_data";
};

export type ReviewInfluence = {
  reviewerId: string;
  reviewedAuthors: readonly string[];
  reviewedPullRequests: number;
};

export type RiskCheck = "churn_spike" | "after_hours" | "outlier_author";

export type RiskFlag =
  | {
      check: "churn_spike";
      commitSha: string;
      authorId: string;
      churn: number;
      threshold: number;
    }
  | {
      check: "after_hours";
      commitSha: string;
      authorId: string;
      timestampMs: number;
    }
  | {
      check: "outlier_author";
      authorId: string;
      churn: number;
      threshold: number;
    };

export type ChurnThresholds = {
  fixed: number;
  statistical: number | null;
  effective: number;
};

export type RiskSummary = {
  riskyCommitPercentage: number;
  afterHoursPercentage: number;
  churnThresholds: ChurnThresholds;
  outlierAuthorThreshold: number | null;
  riskyCommitShas: readonly string[];
  afterHoursCommitShas: readonly string[];
  outlierAuthorIds: readonly string[];
  flags: readonly RiskFlag[];
};

export type ForecastMetric = "churn" | "leadTime";

export type ForecastDirection = "increasing" | "decreasing" | "flat";

export type ForecastConfidence = "high" | "medium" | "low";

export type ForecastResult = {
  metric: ForecastMetric;
  period: Period;
  prediction: number;
  lastObserved: number;
  direction: ForecastDirection;
  confidence: ForecastConfidence;
  historyLength: number;
  method: "holt_linear" | "naive_last_value";
  smoothing: { alpha: number; beta: number; sse: number } | null;
};

export type ForecastOutcome =
  | ({ available: true } & ForecastResult)
  | {
      available: false;
      metric: ForecastMetric;
      period: Period;
      historyLength: number;
      reason: "insufficient_data";
    };

export type PerformanceReport = {
  schemaVersion: string;
  generatedAt: string;
  period: Period;
  metrics: PeriodMetrics;
  authors: Readonly<Record<string, AuthorStats>>;
  risk: RiskSummary;
  forecasts: readonly ForecastOutcome[];
  deltas: MetricDeltas | null;
  ratings: DeliveryRatings;
  reviewInfluence: readonly ReviewInfluence[];
  ingestion: IngestionCounts;
};
