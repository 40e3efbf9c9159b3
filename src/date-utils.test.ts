import { describe, expect, it } from "vitest";
import {
  assertValidResetHour,
  assertValidTimezone,
  formatDateTime,
  formatDuration,
  formatTime,
  isWithinRange,
  nextResetTime,
  parseDateFilter,
  toDateKey,
  toMonthKey,
} from "./date-utils.js";
import { ConfigError } from "./errors.js";

describe("parseDateFilter", () => {
  it("converts YYYYMMDD into a date key", () => {
    expect(parseDateFilter("20250115")).toBe("2025-01-15");
  });

  it("rejects other formats", () => {
    expect(() => parseDateFilter("2025-01-15")).toThrow(
      new ConfigError("Date must be in YYYYMMDD format, got: 2025-01-15"),
    );
  });

  it("rejects impossible dates", () => {
    expect(() => parseDateFilter("20250230")).toThrow("Invalid date: 20250230");
    expect(() => parseDateFilter("20251301")).toThrow(ConfigError);
  });
});

describe("isWithinRange", () => {
  it("includes both ends", () => {
    expect(isWithinRange("2025-01-15", "2025-01-15", "2025-01-15")).toBe(true);
    expect(isWithinRange("2025-01-14", "2025-01-15")).toBe(false);
    expect(isWithinRange("2025-01-16", undefined, "2025-01-15")).toBe(false);
    expect(isWithinRange("2025-01-16")).toBe(true);
  });
});

describe("toDateKey", () => {
  const lateEvening = new Date("2025-01-15T23:30:00.000Z");

  it("uses the calendar date of the zone", () => {
    expect(toDateKey(lateEvening, "UTC")).toBe("2025-01-15");
    expect(toDateKey(lateEvening, "Asia/Tokyo")).toBe("2025-01-16");
    expect(toMonthKey(toDateKey(lateEvening, "UTC"))).toBe("2025-01");
  });
});

describe("assertValidTimezone", () => {
  it("accepts IANA names and rejects unknown ones", () => {
    expect(() => assertValidTimezone("Europe/Berlin")).not.toThrow();
    expect(() => assertValidTimezone("Not/AZone")).toThrow(ConfigError);
  });
});

describe("nextResetTime", () => {
  it("returns the next occurrence of the hour", () => {
    expect(nextResetTime(new Date("2025-01-15T10:07:00.000Z"), 12, "UTC").toISOString()).toBe(
      "2025-01-15T12:00:00.000Z",
    );
  });

  it("rolls over to the next day once the hour has passed", () => {
    expect(nextResetTime(new Date("2025-01-15T13:00:00.000Z"), 12, "UTC").toISOString()).toBe(
      "2025-01-16T12:00:00.000Z",
    );
    expect(nextResetTime(new Date("2025-01-15T12:00:00.000Z"), 12, "UTC").toISOString()).toBe(
      "2025-01-16T12:00:00.000Z",
    );
  });

  it("handles half-hour offsets", () => {
    expect(nextResetTime(new Date("2025-01-15T10:00:00.000Z"), 0, "Asia/Kolkata").toISOString()).toBe(
      "2025-01-15T18:30:00.000Z",
    );
  });

  it("validates the hour", () => {
    expect(() => assertValidResetHour(24)).toThrow(ConfigError);
    expect(() => nextResetTime(new Date(), -1)).toThrow(ConfigError);
  });
});

describe("formatting", () => {
  const instant = new Date("2025-01-15T09:05:00.000Z");

  it("formats date and time in the zone", () => {
    expect(formatDateTime(instant, "UTC")).toBe("2025-01-15 09:05");
    expect(formatTime(instant, "Asia/Tokyo")).toBe("18:05");
    expect(formatTime(new Date("2025-01-15T00:00:00.000Z"), "UTC")).toBe("00:00");
  });

  it("formats durations as hours and minutes", () => {
    expect(formatDuration(125)).toBe("2h 05m");
    expect(formatDuration(45)).toBe("45m");
    expect(formatDuration(59.6)).toBe("1h 00m");
    expect(formatDuration(-3)).toBe("0m");
  });
});
