import type { ChurnThresholds, CommitEvent, RiskFlag } from "@deliverypulse/core";
import type { ChurnSpikeConfig } from "../config.js";
import { average, commitChurn, standardDeviation } from "./math.js";

export type ChurnSpikeFlag = Extract<RiskFlag, { check: "churn_spike" }>;

export type ChurnSpikeResult = {
  thresholds: ChurnThresholds;
  flags: readonly ChurnSpikeFlag[];
};

export const resolveChurnThresholds = (
  commits: readonly CommitEvent[],
  config: ChurnSpikeConfig,
): ChurnThresholds => {
  if (commits.length < config.statisticalMinCommits) {
    return { fixed: config.fixedThreshold, statistical: null, effective: config.fixedThreshold };
  }

  const churns = commits.map(commitChurn);
  const statistical = average(churns) + config.stdDevMultiplier * standardDeviation(churns);

  return {
    fixed: config.fixedThreshold,
    statistical,
    effective: Math.min(config.fixedThreshold, statistical),
  };
};

/**
 * A commit is a spike when its churn is strictly above the lower of the fixed
 * and statistical thresholds.
 */
export const detectChurnSpikes = (
  commits: readonly CommitEvent[],
  config: ChurnSpikeConfig,
): ChurnSpikeResult => {
  const thresholds = resolveChurnThresholds(commits, config);
  const flags: ChurnSpikeFlag[] = [];

  for (const commit of commits) {
    const churn = commitChurn(commit);
    if (churn > thresholds.effective) {
      flags.push({
        check: "churn_spike",
        commitSha: commit.sha,
        authorId: commit.authorId,
        churn,
        threshold: thresholds.effective,
      });
    }
  }

  return { thresholds, flags };
};
