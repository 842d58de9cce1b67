import type { CommitEvent, RiskSummary } from "@deliverypulse/core";
import { DEFAULT_RISK_DETECTOR_CONFIG, type RiskDetectorConfig } from "../config.js";
import { detectAfterHours } from "../domain/after-hours.js";
import { detectChurnSpikes } from "../domain/churn-spikes.js";
import { percentageOf } from "../domain/math.js";
import { aggregateAuthorChurn, detectOutlierAuthors } from "../domain/outlier-authors.js";

export type EvaluatePeriodRiskInput = {
  commits: readonly CommitEvent[];
  config?: Partial<RiskDetectorConfig>;
};

const mergeConfig = (overrides: Partial<RiskDetectorConfig> | undefined): RiskDetectorConfig => {
  if (overrides === undefined) {
    return DEFAULT_RISK_DETECTOR_CONFIG;
  }

  return {
    churnSpike: {
      ...DEFAULT_RISK_DETECTOR_CONFIG.churnSpike,
      ...overrides.churnSpike,
    },
    outlierAuthor: {
      ...DEFAULT_RISK_DETECTOR_CONFIG.outlierAuthor,
      ...overrides.outlierAuthor,
    },
  };
};

export const evaluatePeriodRisk = (input: EvaluatePeriodRiskInput): RiskSummary => {
  const config = mergeConfig(input.config);
  const { commits } = input;

  const churnSpikes = detectChurnSpikes(commits, config.churnSpike);
  const afterHours = detectAfterHours(commits);
  const outliers = detectOutlierAuthors(aggregateAuthorChurn(commits), config.outlierAuthor);

  // Zero commits means no risk observed, so both percentages read 0.
  return {
    riskyCommitPercentage: percentageOf(churnSpikes.flags.length, commits.length),
    afterHoursPercentage: percentageOf(afterHours.length, commits.length),
    churnThresholds: churnSpikes.thresholds,
    outlierAuthorThreshold: outliers.threshold,
    riskyCommitShas: churnSpikes.flags.map((flag) => flag.commitSha),
    afterHoursCommitShas: afterHours.map((flag) => flag.commitSha),
    outlierAuthorIds: outliers.flags.map((flag) => flag.authorId),
    flags: [...churnSpikes.flags, ...afterHours, ...outliers.flags],
  };
};
