import type { WorkdayWindow } from "./activity-types.js";

const hourFormatters = new Map<string, Intl.DateTimeFormat>();

const hourFormatterFor = (timeZone: string): Intl.DateTimeFormat => {
  const cached = hourFormatters.get(timeZone);
  if (cached !== undefined) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hour: "numeric",
    hourCycle: "h23",
  });
  hourFormatters.set(timeZone, formatter);
  return formatter;
};

export const localHour = (timestampMs: number, timeZone: string): number => {
  const hourPart = hourFormatterFor(timeZone)
    .formatToParts(new Date(timestampMs))
    .find((part) => part.type === "hour");
  const hour = Number.parseInt(hourPart?.value ?? "", 10);

  if (Number.isNaN(hour)) {
    return new Date(timestampMs).getUTCHours();
  }

  return hour % 24;
};

/**
 * A window whose end hour is before its start hour wraps midnight
 * (for example 22 to 6 for a night shift).
 */
export const isAfterHours = (timestampMs: number, workday: WorkdayWindow): boolean => {
  const hour = localHour(timestampMs, workday.timeZone);

  if (workday.startHour <= workday.endHour) {
    return hour < workday.startHour || hour >= workday.endHour;
  }

  return hour < workday.startHour && hour >= workday.endHour;
};
