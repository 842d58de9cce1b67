import type { SmoothingGrid } from "../config.js";

export type HoltLinearFit = {
  alpha: number;
  beta: number;
  sse: number;
  level: number;
  trend: number;
  forecast: number;
};

type HoltState = {
  sse: number;
  level: number;
  trend: number;
};

export const smoothingCandidates = (grid: SmoothingGrid): readonly number[] => {
  if (grid.step <= 0 || grid.max < grid.min) {
    return [grid.min];
  }

  const candidates: number[] = [];
  const steps = Math.floor((grid.max - grid.min) / grid.step + 1e-9);
  for (let index = 0; index <= steps; index += 1) {
    candidates.push(Number((grid.min + index * grid.step).toFixed(6)));
  }

  return candidates;
};

const runHolt = (series: readonly number[], first: number, second: number, alpha: number, beta: number): HoltState => {
  let level = first;
  let trend = second - first;
  let sse = 0;

  for (let index = 1; index < series.length; index += 1) {
    const observed = series[index] ?? level;
    const predicted = level + trend;
    sse += (observed - predicted) ** 2;

    const nextLevel = alpha * observed + (1 - alpha) * predicted;
    trend = beta * (nextLevel - level) + (1 - beta) * trend;
    level = nextLevel;
  }

  return { sse, level, trend };
};

/**
 * Level and trend exponential smoothing. Both smoothing parameters are chosen
 * by exhaustive grid search over one-step-ahead squared error; ties keep the
 * first pair visited, alpha outer and beta inner, both ascending.
 *
 * Returns null for fewer than two points.
 */
export const fitHoltLinear = (series: readonly number[], grid: SmoothingGrid): HoltLinearFit | null => {
  const first = series[0];
  const second = series[1];
  if (first === undefined || second === undefined) {
    return null;
  }

  const candidates = smoothingCandidates(grid);
  let best: HoltLinearFit | null = null;

  for (const alpha of candidates) {
    for (const beta of candidates) {
      const state = runHolt(series, first, second, alpha, beta);
      if (best === null || state.sse < best.sse) {
        best = {
          alpha,
          beta,
          sse: state.sse,
          level: state.level,
          trend: state.trend,
          forecast: state.level + state.trend,
        };
      }
    }
  }

  return best;
};
