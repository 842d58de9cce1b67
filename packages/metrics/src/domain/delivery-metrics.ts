import type { CommitEvent, PeriodMetrics, PullRequestEvent } from "@deliverypulse/core";
import { hoursBetween, meanOrNull, percentageOrNull } from "./statistics.js";

export const computeLeadTimeHours = (pullRequests: readonly PullRequestEvent[]): number | null => {
  const leadTimes: number[] = [];
  for (const pullRequest of pullRequests) {
    if (pullRequest.mergedAtMs !== null) {
      leadTimes.push(hoursBetween(pullRequest.createdAtMs, pullRequest.mergedAtMs));
    }
  }

  return meanOrNull(leadTimes);
};

export const computeReviewLatencyHours = (pullRequests: readonly PullRequestEvent[]): number | null => {
  const latencies: number[] = [];
  for (const pullRequest of pullRequests) {
    const firstReview = pullRequest.reviewTimestampsMs[0];
    if (firstReview !== undefined) {
      latencies.push(hoursBetween(pullRequest.createdAtMs, firstReview));
    }
  }

  return meanOrNull(latencies);
};

/**
 * Percentage of CI-evaluated pull requests that failed. Pull requests with an
 * unknown outcome are not evaluated; with none evaluated the rate is undefined.
 */
export const computeChangeFailureRate = (pullRequests: readonly PullRequestEvent[]): number | null => {
  let failed = 0;
  let evaluated = 0;
  for (const pullRequest of pullRequests) {
    if (pullRequest.ciOutcome === "unknown") {
      continue;
    }

    evaluated += 1;
    if (pullRequest.ciOutcome === "fail") {
      failed += 1;
    }
  }

  return percentageOrNull(failed, evaluated);
};

/**
 * Mean hours between each fix commit and the nearest earlier non-fix commit by
 * the same author in the period.
 */
export const computeMttrHours = (commits: readonly CommitEvent[]): number | null => {
  const ordered = [...commits].sort((a, b) => a.timestampMs - b.timestampMs || a.sha.localeCompare(b.sha));
  const lastNonFixByAuthor = new Map<string, number>();
  const recoveries: number[] = [];

  for (const commit of ordered) {
    if (commit.category !== "fix") {
      lastNonFixByAuthor.set(commit.authorId, commit.timestampMs);
      continue;
    }

    const precedingMs = lastNonFixByAuthor.get(commit.authorId);
    if (precedingMs !== undefined) {
      recoveries.push(hoursBetween(precedingMs, commit.timestampMs));
    }
  }

  return meanOrNull(recoveries);
};

// Commits that report a file count but no paths cannot be deduplicated; their
// files are counted as distinct.
export const countFilesTouched = (commits: readonly CommitEvent[]): number => {
  const paths = new Set<string>();
  let unnamedFiles = 0;

  for (const commit of commits) {
    if (commit.filePaths.length === 0) {
      unnamedFiles += commit.filesChanged;
      continue;
    }

    for (const filePath of commit.filePaths) {
      paths.add(filePath);
    }
  }

  return paths.size + unnamedFiles;
};

export const computePeriodMetrics = (
  commits: readonly CommitEvent[],
  pullRequests: readonly PullRequestEvent[],
): PeriodMetrics => {
  let totalAdditions = 0;
  let totalDeletions = 0;
  for (const commit of commits) {
    totalAdditions += commit.additions;
    totalDeletions += commit.deletions;
  }

  const mergedPullRequests = pullRequests.filter((pullRequest) => pullRequest.mergedAtMs !== null).length;
  const ciEvaluated = pullRequests.filter((pullRequest) => pullRequest.ciOutcome !== "unknown");

  return {
    totalCommits: commits.length,
    totalAdditions,
    totalDeletions,
    totalChurn: totalAdditions + totalDeletions,
    filesTouched: countFilesTouched(commits),
    leadTimeHours: computeLeadTimeHours(pullRequests),
    deployFrequency: mergedPullRequests,
    changeFailureRate: computeChangeFailureRate(pullRequests),
    mttrHours: computeMttrHours(commits),
    reviewLatencyHours: computeReviewLatencyHours(pullRequests),
    mergedPullRequests,
    openPullRequests: pullRequests.length - mergedPullRequests,
    ciEvaluatedPullRequests: ciEvaluated.length,
    failedPullRequests: ciEvaluated.filter((pullRequest) => pullRequest.ciOutcome === "fail").length,
  };
};
