import type {
  ForecastMetric,
  ForecastOutcome,
  HistoricalPeriodMetrics,
  Period,
} from "@deliverypulse/core";
import { nextPeriod } from "@deliverypulse/activity";
import { DEFAULT_FORECASTER_CONFIG, type ForecasterConfig } from "../config.js";
import { fitHoltLinear } from "../domain/holt-linear.js";
import { buildMetricSeries } from "../domain/metric-series.js";
import { forecastConfidence, forecastDirection } from "../domain/qualifiers.js";

export type ForecastMetricInput = {
  metric: ForecastMetric;
  current: HistoricalPeriodMetrics;
  history: readonly HistoricalPeriodMetrics[];
  config?: Partial<ForecasterConfig>;
};

const mergeConfig = (overrides: Partial<ForecasterConfig> | undefined): ForecasterConfig => {
  if (overrides === undefined) {
    return DEFAULT_FORECASTER_CONFIG;
  }

  return {
    ...DEFAULT_FORECASTER_CONFIG,
    ...overrides,
    smoothingGrid: {
      ...DEFAULT_FORECASTER_CONFIG.smoothingGrid,
      ...overrides.smoothingGrid,
    },
  };
};

/**
 * One-step-ahead forecast for `targetPeriod` from an oldest-first series.
 */
export const forecastSeries = (
  metric: ForecastMetric,
  targetPeriod: Period,
  series: readonly number[],
  overrides?: Partial<ForecasterConfig>,
): ForecastOutcome => {
  const config = mergeConfig(overrides);
  const lastObserved = series[series.length - 1];
  if (lastObserved === undefined) {
    return { available: false, metric, period: targetPeriod, historyLength: 0, reason: "insufficient_data" };
  }

  const minHistory = Math.max(2, config.minHistory);
  const fit = series.length >= minHistory ? fitHoltLinear(series, config.smoothingGrid) : null;

  if (fit === null) {
    return {
      available: true,
      metric,
      period: targetPeriod,
      prediction: lastObserved,
      lastObserved,
      direction: "flat",
      confidence: "low",
      historyLength: series.length,
      method: "naive_last_value",
      smoothing: null,
    };
  }

  const prediction = Math.max(0, fit.forecast);

  return {
    available: true,
    metric,
    period: targetPeriod,
    prediction,
    lastObserved,
    direction: forecastDirection(prediction, lastObserved, config.directionTolerance),
    confidence: forecastConfidence(series.length),
    historyLength: series.length,
    method: "holt_linear",
    smoothing: { alpha: fit.alpha, beta: fit.beta, sse: fit.sse },
  };
};

/**
 * Forecasts the period after `current`. Without at least one earlier period
 * the outcome is `insufficient_data`.
 */
export const forecastMetric = (input: ForecastMetricInput): ForecastOutcome => {
  const config = mergeConfig(input.config);
  const target = nextPeriod(input.current.period);
  const series = buildMetricSeries(input.history, input.current, input.metric, config.maxHistory);

  if (series.priorPoints === 0) {
    return {
      available: false,
      metric: input.metric,
      period: target,
      historyLength: series.values.length,
      reason: "insufficient_data",
    };
  }

  return forecastSeries(input.metric, target, series.values, config);
};
