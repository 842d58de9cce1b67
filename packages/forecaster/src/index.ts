export { DEFAULT_FORECASTER_CONFIG, type ForecasterConfig, type SmoothingGrid } from "./config.js";
export { fitHoltLinear, smoothingCandidates, type HoltLinearFit } from "./domain/holt-linear.js";
export { buildMetricSeries, metricValue, type MetricSeries } from "./domain/metric-series.js";
export { forecastConfidence, forecastDirection } from "./domain/qualifiers.js";
export { forecastMetric, forecastSeries, type ForecastMetricInput } from "./application/forecast-series.js";
