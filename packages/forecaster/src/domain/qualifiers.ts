import type { ForecastConfidence, ForecastDirection } from "@deliverypulse/core";

export const forecastDirection = (
  prediction: number,
  lastObserved: number,
  tolerance: number,
): ForecastDirection => {
  const band = Math.abs(lastObserved) * tolerance;
  if (prediction > lastObserved + band) {
    return "increasing";
  }

  if (prediction < lastObserved - band) {
    return "decreasing";
  }

  return "flat";
};

export const forecastConfidence = (seriesLength: number): ForecastConfidence => {
  if (seriesLength >= 8) {
    return "high";
  }

  if (seriesLength >= 4) {
    return "medium";
  }

  return "low";
};
