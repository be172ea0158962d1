import { getClockTimeAt, getDateKeyAt } from "../../common/utils/date.util";
import { CANVAS_WIDTH, HOURS_PER_DAY } from "../constants/canvas.constant";
import { TimeMarker } from "../types/geometry.type";
import { segmentBoundary } from "./layout.util";

/**
 * Computes the "now" marker for a rendered day.
 *
 * A marker exists only when the rendered day is today in the given
 * timezone (or the process's local zone). Its position moves continuously
 * with the minute rather than snapping to hour segments.
 *
 * @param dateKey - Rendered calendar day (yyyy-MM-dd)
 * @param now - Current instant
 * @param timezone - Optional IANA timezone deciding "today" and the clock time
 * @returns Marker position, or null for past and future days
 *
 * @example
 * // now = 2025-01-01 09:30 local
 * computeTimeMarker("2025-01-01", now) // { x: 405.33, hour: 9, minute: 30, label: "09:30" }
 * computeTimeMarker("2024-12-31", now) // null
 */
export function computeTimeMarker(
  dateKey: string,
  now: Date,
  timezone?: string,
): TimeMarker | null {
  if (getDateKeyAt(now, timezone) !== dateKey) {
    return null;
  }

  const { hour, minute } = getClockTimeAt(now, timezone);
  // Whole minutes first, so on-the-hour times are exact multiples of 1024/24
  const minuteOfDay = hour * 60 + minute;
  const x =
    segmentBoundary(0) + (minuteOfDay * CANVAS_WIDTH) / (HOURS_PER_DAY * 60);

  return {
    x,
    hour,
    minute,
    label: `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`,
  };
}
