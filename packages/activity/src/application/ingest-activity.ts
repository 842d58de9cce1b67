import type {
  CommitEvent,
  IngestionCounts,
  Period,
  PeriodActivity,
  PullRequestEvent,
} from "@deliverypulse/core";
import {
  DEFAULT_ACTIVITY_CONFIG,
  type ActivityConfig,
  type HarvestedActivity,
} from "../domain/activity-types.js";
import { periodContains } from "../domain/period.js";
import {
  parseHarvestedCommit,
  parseHarvestedPullRequest,
  type MalformedReason,
} from "../parsing/harvest-record-parser.js";

export type IngestActivityInput = {
  period: Period;
  activity: HarvestedActivity;
  config?: Partial<ActivityConfig>;
};

export type IngestionResult = {
  activity: PeriodActivity;
  counts: IngestionCounts;
};

export type DroppedRecordKind = "commit" | "pull_request";

export type IngestionProgressEvent =
  | { stage: "ingestion_started"; commits: number; pullRequests: number }
  | {
      stage: "record_dropped";
      kind: DroppedRecordKind;
      index: number;
      reason: MalformedReason | "out_of_period";
    }
  | { stage: "ingestion_completed"; counts: IngestionCounts };

const mergeConfig = (overrides: Partial<ActivityConfig> | undefined): ActivityConfig => {
  if (overrides === undefined) {
    return DEFAULT_ACTIVITY_CONFIG;
  }

  return {
    workday: {
      ...DEFAULT_ACTIVITY_CONFIG.workday,
      ...overrides.workday,
    },
    categoryKeywords: {
      ...DEFAULT_ACTIVITY_CONFIG.categoryKeywords,
      ...overrides.categoryKeywords,
    },
  };
};

// A merged pull request counts as a delivery in the period it was merged in.
const pullRequestAnchor = (pullRequest: PullRequestEvent): number =>
  pullRequest.mergedAtMs ?? pullRequest.createdAtMs;

export const ingestActivity = (
  input: IngestActivityInput,
  onProgress?: (event: IngestionProgressEvent) => void,
): IngestionResult => {
  const config = mergeConfig(input.config);
  const { period, activity } = input;

  onProgress?.({
    stage: "ingestion_started",
    commits: activity.commits.length,
    pullRequests: activity.pullRequests.length,
  });

  const commits: CommitEvent[] = [];
  let droppedMalformedCommits = 0;
  let droppedOutOfRangeCommits = 0;
  const seenShas = new Set<string>();

  activity.commits.forEach((record, index) => {
    const parsed = parseHarvestedCommit(record, config);
    if (!parsed.ok) {
      droppedMalformedCommits += 1;
      onProgress?.({ stage: "record_dropped", kind: "commit", index, reason: parsed.reason });
      return;
    }

    // The first record with a given sha wins.
    if (seenShas.has(parsed.event.sha)) {
      droppedMalformedCommits += 1;
      onProgress?.({ stage: "record_dropped", kind: "commit", index, reason: "duplicate_sha" });
      return;
    }
    seenShas.add(parsed.event.sha);

    if (!periodContains(period, parsed.event.timestampMs)) {
      droppedOutOfRangeCommits += 1;
      onProgress?.({ stage: "record_dropped", kind: "commit", index, reason: "out_of_period" });
      return;
    }

    commits.push(parsed.event);
  });

  const pullRequests: PullRequestEvent[] = [];
  let droppedMalformedPullRequests = 0;
  let droppedOutOfRangePullRequests = 0;
  const seenNumbers = new Set<number>();

  activity.pullRequests.forEach((record, index) => {
    const parsed = parseHarvestedPullRequest(record);
    if (!parsed.ok) {
      droppedMalformedPullRequests += 1;
      onProgress?.({ stage: "record_dropped", kind: "pull_request", index, reason: parsed.reason });
      return;
    }

    if (seenNumbers.has(parsed.event.number)) {
      droppedMalformedPullRequests += 1;
      onProgress?.({
        stage: "record_dropped",
        kind: "pull_request",
        index,
        reason: "duplicate_number",
      });
      return;
    }
    seenNumbers.add(parsed.event.number);

    if (!periodContains(period, pullRequestAnchor(parsed.event))) {
      droppedOutOfRangePullRequests += 1;
      onProgress?.({ stage: "record_dropped", kind: "pull_request", index, reason: "out_of_period" });
      return;
    }

    pullRequests.push(parsed.event);
  });

  commits.sort((a, b) => a.timestampMs - b.timestampMs || a.sha.localeCompare(b.sha));
  pullRequests.sort((a, b) => a.number - b.number);

  const counts: IngestionCounts = {
    acceptedCommits: commits.length,
    acceptedPullRequests: pullRequests.length,
    droppedMalformedCommits,
    droppedMalformedPullRequests,
    droppedOutOfRangeCommits,
    droppedOutOfRangePullRequests,
  };
  onProgress?.({ stage: "ingestion_completed", counts });

  return {
    activity: {
      period,
      commits: Object.freeze(commits),
      pullRequests: Object.freeze(pullRequests),
    },
    counts,
  };
};
