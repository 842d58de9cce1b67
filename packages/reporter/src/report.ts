import type {
  AuthorStats,
  DeliveryRatings,
  ForecastOutcome,
  IngestionCounts,
  MetricDeltas,
  PerformanceReport,
  Period,
  PeriodMetrics,
  ReviewInfluence,
  RiskSummary,
} from "@deliverypulse/core";
import { RECONCILIATION_TOLERANCE, REPORT_SCHEMA_VERSION, ReportConsistencyError } from "./domain.js";

export type AssembleReportInput = {
  period: Period;
  authorStats: readonly AuthorStats[];
  metrics: PeriodMetrics;
  risk: RiskSummary;
  forecasts: readonly ForecastOutcome[];
  ratings: DeliveryRatings;
  ingestion: IngestionCounts;
  deltas?: MetricDeltas | null;
  reviewInfluence?: readonly ReviewInfluence[];
  generatedAt?: string;
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }

  Object.freeze(value);
  return value;
};

const reconcile = (
  label: string,
  authorTotal: number,
  periodTotal: number,
): string | null =>
  Math.abs(authorTotal - periodTotal) > RECONCILIATION_TOLERANCE
    ? `${label}: authors=${authorTotal} period=${periodTotal}`
    : null;

export const verifyReconciliation = (authorStats: readonly AuthorStats[], metrics: PeriodMetrics): void => {
  let commitCount = 0;
  let additions = 0;
  let deletions = 0;
  let churn = 0;
  for (const stats of authorStats) {
    commitCount += stats.commitCount;
    additions += stats.totalAdditions;
    deletions += stats.totalDeletions;
    churn += stats.totalChurn;
  }

  const mismatches = [
    reconcile("commitCount", commitCount, metrics.totalCommits),
    reconcile("additions", additions, metrics.totalAdditions),
    reconcile("deletions", deletions, metrics.totalDeletions),
    reconcile("churn", churn, metrics.totalChurn),
  ].filter((mismatch): mismatch is string => mismatch !== null);

  if (mismatches.length > 0) {
    throw new ReportConsistencyError(`author stats do not sum to period metrics (${mismatches.join("; ")})`);
  }
};

/**
 * Merges analysis output into an immutable report. Performs no computation
 * beyond the author-to-period reconciliation check.
 */
export const assembleReport = (input: AssembleReportInput): PerformanceReport => {
  verifyReconciliation(input.authorStats, input.metrics);

  const authors: Record<string, AuthorStats> = {};
  for (const stats of [...input.authorStats].sort((a, b) => a.authorId.localeCompare(b.authorId))) {
    authors[stats.authorId] = { ...stats, categoryCounts: { ...stats.categoryCounts } };
  }

  return deepFreeze<PerformanceReport>({
    schemaVersion: REPORT_SCHEMA_VERSION,
    generatedAt: input.generatedAt ?? new Date().toISOString(),
    period: { ...input.period },
    metrics: { ...input.metrics },
    authors,
    risk: structuredClone(input.risk),
    forecasts: structuredClone(input.forecasts),
    deltas: input.deltas === undefined || input.deltas === null ? null : structuredClone(input.deltas),
    ratings: structuredClone(input.ratings),
    reviewInfluence: structuredClone(input.reviewInfluence ?? []),
    ingestion: { ...input.ingestion },
  });
};
