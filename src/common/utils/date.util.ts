import { format, isValid, parse } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";

const GRID_DATE_PATTERN = /^\d{2}-\d{2}-\d{4}$/;
const GRID_DATE_FORMAT = "dd-MM-yyyy";

/**
 * Parses a "DD-MM-YYYY" calendar date into local midnight.
 *
 * Two-digit day and month and a four-digit year are required. Dates that do
 * not exist on the calendar (e.g. "31-02-2025") are rejected.
 *
 * @returns Local midnight of that day, or null when the text is not a valid date
 *
 * @example
 * parseGridDate("20-11-2025") // 2025-11-20T00:00:00 (local)
 * parseGridDate("2025-11-20") // null
 * parseGridDate("31-02-2025") // null
 */
export function parseGridDate(value: string): Date | null {
  if (!GRID_DATE_PATTERN.test(value)) {
    return null;
  }

  const parsed = parse(value, GRID_DATE_FORMAT, new Date(0));
  if (!isValid(parsed)) {
    return null;
  }

  // Reject anything date-fns rolled over into a neighbouring day
  return format(parsed, GRID_DATE_FORMAT) === value ? parsed : null;
}

/**
 * Formats a local date as "YYYY-MM-DD".
 */
export function formatDateKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

/**
 * Gets the calendar date of an instant as "YYYY-MM-DD".
 *
 * Without a timezone the process's local zone is used.
 *
 * @example
 * // At 2024-01-01 01:00 UTC:
 * getDateKeyAt(now, "UTC") // "2024-01-01"
 * getDateKeyAt(now, "America/Los_Angeles") // "2023-12-31"
 */
export function getDateKeyAt(instant: Date, timezone?: string): string {
  return timezone
    ? formatInTimeZone(instant, timezone, "yyyy-MM-dd")
    : formatDateKey(instant);
}

/**
 * Wall-clock hour and minute of an instant, local or in the given timezone.
 */
export function getClockTimeAt(
  instant: Date,
  timezone?: string,
): { hour: number; minute: number } {
  if (!timezone) {
    return { hour: instant.getHours(), minute: instant.getMinutes() };
  }

  const [hour, minute] = formatInTimeZone(instant, timezone, "H:m")
    .split(":")
    .map((part) => parseInt(part, 10));
  return { hour, minute };
}

/**
 * Human-readable date, e.g. "Wednesday, 1 January 2025".
 */
export function formatReadableDate(date: Date): string {
  return format(date, "EEEE, d MMMM yyyy");
}

/**
 * Checks that a string names an IANA timezone the runtime knows about.
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
