import type { DataClass } from "common/portfolio";

export type Freshness = "FRESH" | "STALE";

/** Time series: the rest of the fetch day. Overview: refreshed weekly. */
export const TTL_DAYS: Record<DataClass, number> = {
  timeSeries: 1,
  overview: 7,
};

const DAY_MS = 86_400_000;
const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (n: number) => String(n).padStart(2, "0");

/** Local calendar date as YYYY-MM-DD. */
export function toCalendarDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function todayCalendarDate(): string {
  return toCalendarDate(new Date());
}

function dayNumber(calendarDate: string): number | null {
  const match = CALENDAR_DATE.exec(calendarDate);
  if (!match) return null;
  const [, year, month, day] = match;
  return Date.UTC(Number(year), Number(month) - 1, Number(day)) / DAY_MS;
}

/** Whole calendar days from `from` to `to`; null if either date is unparseable. */
export function calendarDaysBetween(from: string, to: string): number | null {
  const a = dayNumber(from);
  const b = dayNumber(to);
  if (a == null || b == null) return null;
  return b - a;
}

export function assessFreshness(
  fetchedOn: string | null,
  today: string,
  dataClass: DataClass
): Freshness {
  if (fetchedOn == null) return "STALE";
  const age = calendarDaysBetween(fetchedOn, today);
  // A fetch date in the future means the clock moved back; refetch.
  if (age == null || age < 0) return "STALE";
  return age < TTL_DAYS[dataClass] ? "FRESH" : "STALE";
}
