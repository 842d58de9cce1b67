import type {
  HarvestedActivity,
  HarvestedCommit,
  HarvestedPullRequest,
} from "@deliverypulse/activity";
import type { Granularity, HistoricalPeriodMetrics, PeriodMetrics } from "@deliverypulse/core";
import { computePeriodMetrics } from "@deliverypulse/metrics";

const GRANULARITIES: readonly Granularity[] = ["daily", "weekly", "monthly"];

const COUNT_FIELDS = [
  "totalCommits",
  "totalAdditions",
  "totalDeletions",
  "totalChurn",
  "filesTouched",
  "deployFrequency",
  "mergedPullRequests",
  "openPullRequests",
  "ciEvaluatedPullRequests",
  "failedPullRequests",
] as const satisfies readonly (keyof PeriodMetrics)[];

const NULLABLE_FIELDS = [
  "leadTimeHours",
  "changeFailureRate",
  "mttrHours",
  "reviewLatencyHours",
] as const satisfies readonly (keyof PeriodMetrics)[];

const parseJson = (raw: string, errorCode: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new Error(errorCode, { cause: error });
  }
};

const isRecord = (value: unknown): value is object => typeof value === "object" && value !== null;

const readField = (record: object, key: string): unknown => {
  const descriptor = Object.getOwnPropertyDescriptor(record, key);
  const value: unknown = descriptor?.value;
  return value;
};

const readArray = (record: object, key: string): readonly unknown[] => {
  const value = readField(record, key);
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw new Error("invalid_activity_document");
  }

  const entries: readonly unknown[] = value;
  return entries;
};

// Non-object entries pass through as empty records so ingestion counts them
// as malformed.
const toHarvestedCommit = (entry: unknown): HarvestedCommit => {
  if (!isRecord(entry)) {
    return {};
  }

  return {
    sha: readField(entry, "sha"),
    author: readField(entry, "author"),
    timestamp: readField(entry, "timestamp"),
    additions: readField(entry, "additions"),
    deletions: readField(entry, "deletions"),
    filesChanged: readField(entry, "filesChanged"),
    files: readField(entry, "files"),
    message: readField(entry, "message"),
  };
};

const toHarvestedPullRequest = (entry: unknown): HarvestedPullRequest => {
  if (!isRecord(entry)) {
    return {};
  }

  return {
    number: readField(entry, "number"),
    author: readField(entry, "author"),
    createdAt: readField(entry, "createdAt"),
    mergedAt: readField(entry, "mergedAt"),
    additions: readField(entry, "additions"),
    deletions: readField(entry, "deletions"),
    filesChanged: readField(entry, "filesChanged"),
    ciStatus: readField(entry, "ciStatus"),
    reviews: readField(entry, "reviews"),
  };
};

/**
 * Reads a harvested activity export: `{ "commits": [...], "pullRequests": [...] }`.
 * Record contents are validated later by ingestion.
 */
export const parseActivityDocument = (raw: string): HarvestedActivity => {
  const document = parseJson(raw, "invalid_activity_document");
  if (!isRecord(document) || Array.isArray(document)) {
    throw new Error("invalid_activity_document");
  }

  return {
    commits: readArray(document, "commits").map(toHarvestedCommit),
    pullRequests: readArray(document, "pullRequests").map(toHarvestedPullRequest),
  };
};

const isGranularity = (value: unknown): value is Granularity =>
  GRANULARITIES.some((granularity) => granularity === value);

const parseHistoricalMetrics = (record: object): PeriodMetrics => {
  const metrics: PeriodMetrics = { ...computePeriodMetrics([], []) };

  for (const field of COUNT_FIELDS) {
    const value = readField(record, field);
    if (typeof value === "number" && Number.isFinite(value)) {
      metrics[field] = value;
    }
  }

  for (const field of NULLABLE_FIELDS) {
    const value = readField(record, field);
    if (typeof value === "number" && Number.isFinite(value)) {
      metrics[field] = value;
    }
  }

  return metrics;
};

/**
 * Reads earlier period metrics: an array of `{ period, metrics }` entries. A
 * JSON report written by this tool has that shape, so saved reports can be
 * fed back in as history. Missing counts read as 0 and missing durations and
 * rates as null.
 */
export const parseHistoryDocument = (raw: string): readonly HistoricalPeriodMetrics[] => {
  const document = parseJson(raw, "invalid_history_document");
  if (!Array.isArray(document)) {
    throw new Error("invalid_history_document");
  }

  const entries: readonly unknown[] = document;
  return entries.map((entry) => {
    if (!isRecord(entry)) {
      throw new Error("invalid_history_document");
    }

    const period = readField(entry, "period");
    const metrics = readField(entry, "metrics");
    if (!isRecord(period) || !isRecord(metrics)) {
      throw new Error("invalid_history_document");
    }

    const startMs = readField(period, "startMs");
    const endMs = readField(period, "endMs");
    const granularity = readField(period, "granularity");
    if (
      typeof startMs !== "number" ||
      typeof endMs !== "number" ||
      endMs <= startMs ||
      !isGranularity(granularity)
    ) {
      throw new Error("invalid_history_document");
    }

    return {
      period: { startMs, endMs, granularity },
      metrics: parseHistoricalMetrics(metrics),
    };
  });
};
