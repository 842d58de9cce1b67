import type { CommitCategory } from "@deliverypulse/core";

/**
 * Raw commit as handed over by a harvest collaborator. Fields are unchecked
 * until ingestion validates them.
 */
export type HarvestedCommit = {
  sha?: unknown;
  author?: unknown;
  timestamp?: unknown;
  additions?: unknown;
  deletions?: unknown;
  filesChanged?: unknown;
  files?: unknown;
  message?: unknown;
};

export type HarvestedReview = {
  reviewer?: unknown;
  submittedAt?: unknown;
};

export type HarvestedPullRequest = {
  number?: unknown;
  author?: unknown;
  createdAt?: unknown;
  mergedAt?: unknown;
  additions?: unknown;
  deletions?: unknown;
  filesChanged?: unknown;
  ciStatus?: unknown;
  reviews?: unknown;
};

export type HarvestedActivity = {
  commits: readonly HarvestedCommit[];
  pullRequests: readonly HarvestedPullRequest[];
};

export type WorkdayWindow = {
  startHour: number;
  endHour: number;
  timeZone: string;
};

export type CategoryKeywords = Readonly<Record<Exclude<CommitCategory, "other">, readonly string[]>>;

export type ActivityConfig = {
  workday: WorkdayWindow;
  categoryKeywords: CategoryKeywords;
};

export const DEFAULT_ACTIVITY_CONFIG: ActivityConfig = {
  workday: {
    startHour: 9,
    endHour: 18,
    timeZone: "UTC",
  },
  categoryKeywords: {
    fix: ["fix", "fixes", "fixed", "bug", "bugfix", "hotfix", "revert", "patch"],
    feat: ["feat", "feature", "add", "adds", "added", "implement", "implements"],
    refactor: ["refactor", "refactors", "cleanup", "restructure", "rename", "simplify"],
  },
};
