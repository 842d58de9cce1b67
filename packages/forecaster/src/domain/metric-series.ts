import type { ForecastMetric, HistoricalPeriodMetrics, PeriodMetrics } from "@deliverypulse/core";

export type MetricSeries = {
  values: readonly number[];
  /** Points contributed by periods before the current one. */
  priorPoints: number;
};

export const metricValue = (metrics: PeriodMetrics, metric: ForecastMetric): number | null =>
  metric === "churn" ? metrics.totalChurn : metrics.leadTimeHours;

/**
 * Oldest-first series ending with the current period. Only earlier periods of
 * the same granularity contribute, once each; periods without a value are
 * skipped.
 */
export const buildMetricSeries = (
  history: readonly HistoricalPeriodMetrics[],
  current: HistoricalPeriodMetrics,
  metric: ForecastMetric,
  maxHistory: number,
): MetricSeries => {
  // A period supplied more than once counts once; the later entry wins.
  const byStart = new Map<number, HistoricalPeriodMetrics>();
  for (const entry of history) {
    if (entry.period.granularity === current.period.granularity && entry.period.endMs <= current.period.startMs) {
      byStart.set(entry.period.startMs, entry);
    }
  }
  const prior = [...byStart.values()].sort((a, b) => a.period.startMs - b.period.startMs);

  const priorValues: number[] = [];
  for (const entry of prior) {
    const value = metricValue(entry.metrics, metric);
    if (value !== null) {
      priorValues.push(value);
    }
  }

  const currentValue = metricValue(current.metrics, metric);
  const values = currentValue === null ? priorValues : [...priorValues, currentValue];
  const limit = Math.max(1, maxHistory);
  const windowed = values.slice(-limit);
  const currentPoints = currentValue === null ? 0 : 1;

  return {
    values: windowed,
    priorPoints: Math.max(0, windowed.length - currentPoints),
  };
};
