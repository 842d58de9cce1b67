import type { Granularity, Period } from "@deliverypulse/core";

const DAY_MS = 24 * 60 * 60 * 1000;

const toEpochMs = (value: Date | number | string): number => {
  if (value instanceof Date) {
    return value.getTime();
  }

  if (typeof value === "number") {
    return value;
  }

  return Date.parse(value);
};

const shiftStart = (startMs: number, granularity: Granularity, steps: number): number => {
  if (granularity === "daily") {
    return startMs + steps * DAY_MS;
  }

  if (granularity === "weekly") {
    return startMs + steps * 7 * DAY_MS;
  }

  const start = new Date(startMs);
  return Date.UTC(
    start.getUTCFullYear(),
    start.getUTCMonth() + steps,
    start.getUTCDate(),
    start.getUTCHours(),
    start.getUTCMinutes(),
    start.getUTCSeconds(),
    start.getUTCMilliseconds(),
  );
};

export const createPeriod = (start: Date | number | string, granularity: Granularity): Period => {
  const startMs = toEpochMs(start);
  if (!Number.isFinite(startMs)) {
    throw new Error("invalid_period_start");
  }

  // Monthly periods tile the calendar only when anchored on the first of a month.
  if (granularity === "monthly" && new Date(startMs).getUTCDate() !== 1) {
    throw new Error("invalid_period_start");
  }

  return {
    startMs,
    endMs: shiftStart(startMs, granularity, 1),
    granularity,
  };
};

export const periodContains = (period: Period, timestampMs: number): boolean =>
  timestampMs >= period.startMs && timestampMs < period.endMs;

export const nextPeriod = (period: Period): Period => createPeriod(period.endMs, period.granularity);

export const previousPeriod = (period: Period): Period =>
  createPeriod(shiftStart(period.startMs, period.granularity, -1), period.granularity);

export const periodDurationDays = (period: Period): number => (period.endMs - period.startMs) / DAY_MS;

const isoDate = (epochMs: number): string => new Date(epochMs).toISOString().slice(0, 10);

export const formatPeriodLabel = (period: Period): string =>
  `${period.granularity} ${isoDate(period.startMs)}..${isoDate(period.endMs)}`;
