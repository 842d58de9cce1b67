import type { MetricDelta, MetricDeltas, PeriodMetrics } from "@deliverypulse/core";

export const computeMetricDelta = (current: number | null, previous: number | null): MetricDelta => {
  if (current === null || previous === null) {
    return { current, previous, delta: null, percentChange: null };
  }

  const delta = current - previous;
  return {
    current,
    previous,
    delta,
    percentChange: previous === 0 ? null : (delta / previous) * 100,
  };
};

export const computeMetricDeltas = (current: PeriodMetrics, previous: PeriodMetrics): MetricDeltas => ({
  totalCommits: computeMetricDelta(current.totalCommits, previous.totalCommits),
  totalChurn: computeMetricDelta(current.totalChurn, previous.totalChurn),
  leadTimeHours: computeMetricDelta(current.leadTimeHours, previous.leadTimeHours),
  deployFrequency: computeMetricDelta(current.deployFrequency, previous.deployFrequency),
  changeFailureRate: computeMetricDelta(current.changeFailureRate, previous.changeFailureRate),
  mttrHours: computeMetricDelta(current.mttrHours, previous.mttrHours),
});
