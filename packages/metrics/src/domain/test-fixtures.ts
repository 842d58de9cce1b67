import type { CommitEvent, PullRequestEvent } from "@deliverypulse/core";

export const at = (day: number, hour: number, minute = 0): number =>
  Date.UTC(2024, 2, day, hour, minute);

export const commit = (overrides: Partial<CommitEvent> & Pick<CommitEvent, "sha">): CommitEvent => ({
  authorId: "alice",
  timestampMs: at(5, 10),
  additions: 0,
  deletions: 0,
  filesChanged: 0,
  filePaths: [],
  message: "",
  category: "other",
  isAfterHours: false,
  ...overrides,
});

export const pullRequest = (
  overrides: Partial<PullRequestEvent> & Pick<PullRequestEvent, "number">,
): PullRequestEvent => ({
  authorId: "alice",
  createdAtMs: at(5, 10),
  mergedAtMs: null,
  additions: 0,
  deletions: 0,
  filesChanged: 0,
  ciOutcome: "unknown",
  reviewTimestampsMs: [],
  reviewers: [],
  ...overrides,
});
