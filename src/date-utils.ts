import { MINUTE_MS } from "./constants.js";
import { ConfigError } from "./errors.js";

const DATE_FILTER_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

function createFormatter(timezone: string | undefined): Intl.DateTimeFormat {
  return new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  });
}

/**
 * Throws ConfigError for a name the runtime's time zone database does not know
 */
export function assertValidTimezone(timezone: string): void {
  try {
    createFormatter(timezone);
  } catch (error) {
    throw new ConfigError(
      `Invalid timezone "${timezone}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

export function assertValidResetHour(hour: number): void {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new ConfigError(`Reset hour must be an integer between 0 and 23, got: ${hour}`);
  }
}

interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: number;
  minute: number;
}

function getZonedParts(date: Date, timezone: string | undefined): ZonedParts {
  const parts: ZonedParts = { year: "", month: "", day: "", hour: 0, minute: 0 };
  for (const part of createFormatter(timezone).formatToParts(date)) {
    switch (part.type) {
      case "year":
        parts.year = part.value;
        break;
      case "month":
        parts.month = part.value;
        break;
      case "day":
        parts.day = part.value;
        break;
      case "hour":
        parts.hour = Number(part.value);
        break;
      case "minute":
        parts.minute = Number(part.value);
        break;
    }
  }
  return parts;
}

/**
 * Calendar date of an instant in the given zone (local zone when omitted), as YYYY-MM-DD
 */
export function toDateKey(date: Date, timezone?: string): string {
  const { year, month, day } = getZonedParts(date, timezone);
  return `${year}-${month}-${day}`;
}

export function toMonthKey(dateKey: string): string {
  return dateKey.slice(0, 7);
}

/**
 * Parse a YYYYMMDD filter into a YYYY-MM-DD date key
 */
export function parseDateFilter(value: string): string {
  const match = DATE_FILTER_PATTERN.exec(value);
  if (match == null) {
    throw new ConfigError(`Date must be in YYYYMMDD format, got: ${value}`);
  }
  const [, year, month, day] = match;
  const calendar = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    calendar.getUTCFullYear() !== Number(year) ||
    calendar.getUTCMonth() !== Number(month) - 1 ||
    calendar.getUTCDate() !== Number(day)
  ) {
    throw new ConfigError(`Invalid date: ${value}`);
  }
  return `${year}-${month}-${day}`;
}

/**
 * Inclusive on both ends; keys compare lexicographically
 */
export function isWithinRange(dateKey: string, since?: string, until?: string): boolean {
  if (since != null && dateKey < since) {
    return false;
  }
  if (until != null && dateKey > until) {
    return false;
  }
  return true;
}

const RESET_SEARCH_STEP_MS = 15 * MINUTE_MS;
const RESET_SEARCH_LIMIT_MS = 48 * 60 * MINUTE_MS;

/**
 * First instant after `now` at which the wall clock in `timezone` reads
 * `resetHour`:00. Searches in quarter-hour steps so half-hour offsets work.
 */
export function nextResetTime(now: Date, resetHour: number, timezone?: string): Date {
  assertValidResetHour(resetHour);
  const first = Math.floor(now.getTime() / RESET_SEARCH_STEP_MS) * RESET_SEARCH_STEP_MS;
  for (
    let candidate = first + RESET_SEARCH_STEP_MS;
    candidate <= first + RESET_SEARCH_LIMIT_MS;
    candidate += RESET_SEARCH_STEP_MS
  ) {
    const { hour, minute } = getZonedParts(new Date(candidate), timezone);
    if (hour === resetHour && minute === 0) {
      return new Date(candidate);
    }
  }
  // zones that skip the hour entirely on this day
  return new Date(first + 24 * 60 * MINUTE_MS);
}

export function formatDateTime(date: Date, timezone?: string): string {
  const { year, month, day, hour, minute } = getZonedParts(date, timezone);
  return `${year}-${month}-${day} ${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

export function formatTime(date: Date, timezone?: string): string {
  const { hour, minute } = getZonedParts(date, timezone);
  return `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

/**
 * "2h 05m", "45m"
 */
export function formatDuration(minutes: number): string {
  const total = Math.max(0, Math.round(minutes));
  const hours = Math.floor(total / 60);
  const rest = total % 60;
  return hours > 0 ? `${hours}h ${String(rest).padStart(2, "0")}m` : `${rest}m`;
}
