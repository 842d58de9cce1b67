export const average = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const total = values.reduce((sum, current) => sum + current, 0);
  return total / values.length;
};

/**
 * Population standard deviation. Zero for fewer than two values.
 */
export const standardDeviation = (values: readonly number[]): number => {
  if (values.length < 2) {
    return 0;
  }

  const mean = average(values);
  const squaredDeviations = values.map((value) => (value - mean) ** 2);
  return Math.sqrt(average(squaredDeviations));
};

export const commitChurn = (commit: { additions: number; deletions: number }): number =>
  commit.additions + commit.deletions;

export const percentageOf = (count: number, total: number): number =>
  total === 0 ? 0 : (count / total) * 100;
