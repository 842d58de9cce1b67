import {
  ingestActivity,
  previousPeriod,
  type ActivityConfig,
  type ActivitySource,
  type IngestionProgressEvent,
} from "@deliverypulse/activity";
import type { ForecastMetric, HistoricalPeriodMetrics, PerformanceReport, Period } from "@deliverypulse/core";
import { forecastMetric, type ForecasterConfig } from "@deliverypulse/forecaster";
import { computeMetricsSummary, type MetricsEngineConfig } from "@deliverypulse/metrics";
import { assembleReport } from "@deliverypulse/reporter";
import { evaluatePeriodRisk, type RiskDetectorConfig } from "@deliverypulse/risk-engine";
import type { PipelineContext } from "../domain/pipeline-context.js";

export type PipelineConfig = {
  activity?: Partial<ActivityConfig>;
  metrics?: Partial<MetricsEngineConfig>;
  risk?: Partial<RiskDetectorConfig>;
  forecaster?: Partial<ForecasterConfig>;
};

export class PipelinePreconditionError extends Error {
  readonly code = "stage_precondition_failed";

  constructor(message: string) {
    super(message);
    this.name = "PipelinePreconditionError";
  }
}

const FORECAST_METRICS: readonly ForecastMetric[] = ["churn", "leadTime"];

const findPreviousMetrics = (
  history: readonly HistoricalPeriodMetrics[],
  period: Period,
): HistoricalPeriodMetrics | undefined => {
  const previous = previousPeriod(period);
  return history.find(
    (entry) =>
      entry.period.granularity === previous.granularity &&
      entry.period.startMs === previous.startMs &&
      entry.period.endMs === previous.endMs,
  );
};

export const harvestStage = (
  context: PipelineContext,
  source: ActivitySource,
  config: PipelineConfig,
  onIngestionProgress?: (event: IngestionProgressEvent) => void,
): void => {
  const activity = source.readActivity(context.period);
  context.harvest = ingestActivity(
    {
      period: context.period,
      activity,
      ...(config.activity === undefined ? {} : { config: config.activity }),
    },
    onIngestionProgress,
  );
};

export const analyzeStage = (context: PipelineContext, config: PipelineConfig): void => {
  const harvest = context.harvest;
  if (harvest === null) {
    throw new PipelinePreconditionError("analysis requires harvested events");
  }

  const { commits } = harvest.activity;
  const risk = evaluatePeriodRisk({
    commits,
    ...(config.risk === undefined ? {} : { config: config.risk }),
  });

  const previous = findPreviousMetrics(context.history, context.period);
  const summary = computeMetricsSummary({
    activity: harvest.activity,
    riskyCommitShas: new Set(risk.riskyCommitShas),
    ...(previous === undefined ? {} : { previous: previous.metrics }),
    ...(config.metrics === undefined ? {} : { config: config.metrics }),
  });

  const current: HistoricalPeriodMetrics = { period: context.period, metrics: summary.metrics };
  const forecasts = FORECAST_METRICS.map((metric) =>
    forecastMetric({
      metric,
      current,
      history: context.history,
      ...(config.forecaster === undefined ? {} : { config: config.forecaster }),
    }),
  );

  context.analysis = { summary, risk, forecasts };
};

export const summarizeStage = (context: PipelineContext, generatedAt: string): PerformanceReport => {
  const harvest = context.harvest;
  const analysis = context.analysis;
  if (harvest === null || analysis === null) {
    throw new PipelinePreconditionError("summary requires analysis output");
  }

  const report = assembleReport({
    period: context.period,
    authorStats: analysis.summary.authorStats,
    metrics: analysis.summary.metrics,
    risk: analysis.risk,
    forecasts: analysis.forecasts,
    ratings: analysis.summary.ratings,
    deltas: analysis.summary.deltas,
    reviewInfluence: analysis.summary.reviewInfluence,
    ingestion: harvest.counts,
    generatedAt,
  });

  context.report = report;
  return report;
};
