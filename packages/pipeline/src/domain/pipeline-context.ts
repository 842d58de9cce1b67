import type { IngestionResult } from "@deliverypulse/activity";
import type {
  ForecastOutcome,
  HistoricalPeriodMetrics,
  PerformanceReport,
  Period,
  RiskSummary,
} from "@deliverypulse/core";
import type { MetricsSummary } from "@deliverypulse/metrics";
import type { PipelineState, PipelineStatus } from "./pipeline-state.js";

export type AnalysisOutput = {
  summary: MetricsSummary;
  risk: RiskSummary;
  forecasts: readonly ForecastOutcome[];
};

/**
 * Working state of a single run. Stages fill it in order; nothing outside the
 * run holds a reference to it.
 */
export type PipelineContext = {
  readonly period: Period;
  readonly history: readonly HistoricalPeriodMetrics[];
  state: PipelineState;
  trail: PipelineStatus[];
  harvest: IngestionResult | null;
  analysis: AnalysisOutput | null;
  report: PerformanceReport | null;
};

export const createPipelineContext = (
  period: Period,
  history: readonly HistoricalPeriodMetrics[],
): PipelineContext => ({
  period,
  history,
  state: { status: "idle" },
  trail: ["idle"],
  harvest: null,
  analysis: null,
  report: null,
});
