import { describe, expect, it } from "vitest";
import {
  TTL_DAYS,
  assessFreshness,
  calendarDaysBetween,
  toCalendarDate,
} from "../lib/freshness.js";

describe("calendarDaysBetween", () => {
  it("counts calendar days, not elapsed hours", () => {
    expect(calendarDaysBetween("2024-03-15", "2024-03-16")).toBe(1);
    expect(calendarDaysBetween("2024-02-28", "2024-03-01")).toBe(2);
    expect(calendarDaysBetween("2023-12-31", "2024-01-01")).toBe(1);
  });

  it("returns null for unparseable dates", () => {
    expect(calendarDaysBetween("15/03/2024", "2024-03-16")).toBeNull();
  });
});

describe("toCalendarDate", () => {
  it("formats the local date", () => {
    expect(toCalendarDate(new Date(2024, 0, 5, 23, 59))).toBe("2024-01-05");
  });

  it("puts 23:59 and 00:01 on different days", () => {
    const lateNight = toCalendarDate(new Date(2024, 2, 15, 23, 59));
    const earlyMorning = toCalendarDate(new Date(2024, 2, 16, 0, 1));
    expect(calendarDaysBetween(lateNight, earlyMorning)).toBe(1);
    expect(assessFreshness(lateNight, earlyMorning, "timeSeries")).toBe("STALE");
  });
});

describe("assessFreshness", () => {
  it("uses a 1 day TTL for time series and 7 days for overview", () => {
    expect(TTL_DAYS).toEqual({ timeSeries: 1, overview: 7 });
  });

  it("keeps time series fresh for the rest of the fetch day only", () => {
    expect(assessFreshness("2024-03-15", "2024-03-15", "timeSeries")).toBe("FRESH");
    expect(assessFreshness("2024-03-15", "2024-03-16", "timeSeries")).toBe("STALE");
  });

  it("keeps overview fresh through day 6 and stale from day 7", () => {
    expect(assessFreshness("2024-03-01", "2024-03-07", "overview")).toBe("FRESH");
    expect(assessFreshness("2024-03-01", "2024-03-08", "overview")).toBe("STALE");
    expect(assessFreshness("2024-03-01", "2024-03-20", "overview")).toBe("STALE");
  });

  it("treats a missing entry as stale", () => {
    expect(assessFreshness(null, "2024-03-15", "timeSeries")).toBe("STALE");
    expect(assessFreshness(null, "2024-03-15", "overview")).toBe("STALE");
  });

  it("treats future or garbled fetch dates as stale", () => {
    expect(assessFreshness("2024-03-16", "2024-03-15", "overview")).toBe("STALE");
    expect(assessFreshness("yesterday", "2024-03-15", "overview")).toBe("STALE");
  });
});
