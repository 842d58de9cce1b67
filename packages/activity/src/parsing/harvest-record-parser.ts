import type { CiOutcome, CommitEvent, PullRequestEvent } from "@deliverypulse/core";
import { isAfterHours } from "../domain/after-hours.js";
import { classifyCommitMessage } from "../domain/commit-classification.js";
import type {
  ActivityConfig,
  HarvestedCommit,
  HarvestedPullRequest,
} from "../domain/activity-types.js";

export type MalformedReason =
  | "missing_sha"
  | "missing_author"
  | "missing_number"
  | "duplicate_sha"
  | "duplicate_number"
  | "invalid_timestamp"
  | "invalid_merged_timestamp"
  | "merged_before_created"
  | "invalid_line_counts";

export type ParsedRecord<T> = { ok: true; event: T } | { ok: false; reason: MalformedReason };

const PASS_STATUSES = new Set(["pass", "passed", "success", "succeeded"]);
const FAIL_STATUSES = new Set(["fail", "failed", "failure", "error"]);

export const parseTimestamp = (value: unknown): number | null => {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isFinite(time) ? time : null;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }

  return null;
};

// Absent counts read as zero; anything present must be a non-negative integer.
const parseLineCount = (value: unknown): number | null => {
  if (value === undefined || value === null) {
    return 0;
  }

  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    return null;
  }

  return value;
};

const parseIdentity = (value: unknown): string | null => {
  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }

  return value;
};

const parseFilePaths = (value: unknown): readonly string[] => {
  if (!Array.isArray(value)) {
    return [];
  }

  const entries: readonly unknown[] = value;
  const paths: string[] = [];
  for (const entry of entries) {
    if (typeof entry === "string" && entry.length > 0) {
      paths.push(entry);
    }
  }

  return [...new Set(paths)];
};

export const normalizeCiStatus = (value: unknown): CiOutcome => {
  if (typeof value !== "string") {
    return "unknown";
  }

  const normalized = value.trim().toLowerCase();
  if (PASS_STATUSES.has(normalized)) {
    return "pass";
  }

  if (FAIL_STATUSES.has(normalized)) {
    return "fail";
  }

  return "unknown";
};

export const parseHarvestedCommit = (
  record: HarvestedCommit,
  config: ActivityConfig,
): ParsedRecord<CommitEvent> => {
  const sha = parseIdentity(record.sha);
  if (sha === null) {
    return { ok: false, reason: "missing_sha" };
  }

  const authorId = parseIdentity(record.author);
  if (authorId === null) {
    return { ok: false, reason: "missing_author" };
  }

  const timestampMs = parseTimestamp(record.timestamp);
  if (timestampMs === null) {
    return { ok: false, reason: "invalid_timestamp" };
  }

  const filePaths = parseFilePaths(record.files);
  const additions = parseLineCount(record.additions);
  const deletions = parseLineCount(record.deletions);
  const filesChanged =
    record.filesChanged === undefined || record.filesChanged === null
      ? filePaths.length
      : parseLineCount(record.filesChanged);

  if (additions === null || deletions === null || filesChanged === null) {
    return { ok: false, reason: "invalid_line_counts" };
  }

  const message = typeof record.message === "string" ? record.message : "";

  return {
    ok: true,
    event: Object.freeze({
      sha,
      authorId,
      timestampMs,
      additions,
      deletions,
      filesChanged,
      filePaths: Object.freeze(filePaths),
      message,
      category: classifyCommitMessage(message, config.categoryKeywords),
      isAfterHours: isAfterHours(timestampMs, config.workday),
    }),
  };
};

const parseReviews = (
  value: unknown,
  createdAtMs: number,
): { timestamps: readonly number[]; reviewers: readonly string[] } => {
  if (!Array.isArray(value)) {
    return { timestamps: [], reviewers: [] };
  }

  const entries: readonly unknown[] = value;
  const timestamps: number[] = [];
  const reviewers = new Set<string>();

  for (const entry of entries) {
    if (typeof entry !== "object" || entry === null) {
      continue;
    }

    const submittedAt: unknown = "submittedAt" in entry ? entry.submittedAt : undefined;
    const reviewer: unknown = "reviewer" in entry ? entry.reviewer : undefined;

    const timestamp = parseTimestamp(submittedAt);
    if (timestamp !== null && timestamp >= createdAtMs) {
      timestamps.push(timestamp);
    }

    const reviewerId = parseIdentity(reviewer);
    if (reviewerId !== null) {
      reviewers.add(reviewerId);
    }
  }

  return {
    timestamps: timestamps.sort((a, b) => a - b),
    reviewers: [...reviewers].sort((a, b) => a.localeCompare(b)),
  };
};

export const parseHarvestedPullRequest = (
  record: HarvestedPullRequest,
): ParsedRecord<PullRequestEvent> => {
  const number = record.number;
  if (typeof number !== "number" || !Number.isInteger(number) || number <= 0) {
    return { ok: false, reason: "missing_number" };
  }

  const authorId = parseIdentity(record.author);
  if (authorId === null) {
    return { ok: false, reason: "missing_author" };
  }

  const createdAtMs = parseTimestamp(record.createdAt);
  if (createdAtMs === null) {
    return { ok: false, reason: "invalid_timestamp" };
  }

  let mergedAtMs: number | null = null;
  if (record.mergedAt !== undefined && record.mergedAt !== null) {
    mergedAtMs = parseTimestamp(record.mergedAt);
    if (mergedAtMs === null) {
      return { ok: false, reason: "invalid_merged_timestamp" };
    }

    if (mergedAtMs < createdAtMs) {
      return { ok: false, reason: "merged_before_created" };
    }
  }

  const additions = parseLineCount(record.additions);
  const deletions = parseLineCount(record.deletions);
  const filesChanged = parseLineCount(record.filesChanged);
  if (additions === null || deletions === null || filesChanged === null) {
    return { ok: false, reason: "invalid_line_counts" };
  }

  const reviews = parseReviews(record.reviews, createdAtMs);

  return {
    ok: true,
    event: Object.freeze({
      number,
      authorId,
      createdAtMs,
      mergedAtMs,
      additions,
      deletions,
      filesChanged,
      ciOutcome: normalizeCiStatus(record.ciStatus),
      reviewTimestampsMs: Object.freeze(reviews.timestamps),
      reviewers: Object.freeze(reviews.reviewers),
    }),
  };
};
