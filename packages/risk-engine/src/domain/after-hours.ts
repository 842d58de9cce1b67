import type { CommitEvent, RiskFlag } from "@deliverypulse/core";

export type AfterHoursFlag = Extract<RiskFlag, { check: "after_hours" }>;

export const detectAfterHours = (commits: readonly CommitEvent[]): readonly AfterHoursFlag[] =>
  commits
    .filter((commit) => commit.isAfterHours)
    .map((commit): AfterHoursFlag => ({
      check: "after_hours",
      commitSha: commit.sha,
      authorId: commit.authorId,
      timestampMs: commit.timestampMs,
    }));
