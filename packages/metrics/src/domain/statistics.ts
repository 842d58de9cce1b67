export const HOUR_MS = 60 * 60 * 1000;

export const hoursBetween = (fromMs: number, toMs: number): number => (toMs - fromMs) / HOUR_MS;

export const sum = (values: readonly number[]): number =>
  values.reduce((total, current) => total + current, 0);

export const meanOrNull = (values: readonly number[]): number | null => {
  if (values.length === 0) {
    return null;
  }

  return sum(values) / values.length;
};

export const percentageOrNull = (numerator: number, denominator: number): number | null =>
  denominator === 0 ? null : (numerator / denominator) * 100;
