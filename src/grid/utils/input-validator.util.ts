import {
  GridInputError,
  InvalidDateFormatError,
  UnsupportedStateSymbolError,
} from "../../common/errors/grid-image.errors";
import { formatDateKey, parseGridDate } from "../../common/utils/date.util";
import { HOURS_PER_DAY } from "../constants/canvas.constant";
import {
  GridStateModel,
  UnknownSymbolPolicy,
} from "../types/state-model.type";
import { StateSymbol, stateSymbolFromGlyph } from "../types/state-symbol.type";

export const DATE_KEY = "T_Date";

/** "T_00" .. "T_23" */
export const HOUR_KEYS: readonly string[] = Array.from(
  { length: HOURS_PER_DAY },
  (_, hour) => hourKey(hour),
);

export function hourKey(hour: number): string {
  return `T_${String(hour).padStart(2, "0")}`;
}

export interface CoercedSlot {
  key: string;
  value: unknown;
}

export interface ParsedGridData {
  model: GridStateModel;
  /** Slots whose value was unrecognized and replaced by Unknown */
  coerced: CoercedSlot[];
}

/**
 * Validates a raw availability record and builds its state model.
 *
 * - T_Date is required and must be a real calendar date in DD-MM-YYYY form
 * - T_00..T_23 are optional; a missing (or null) slot is Unknown
 * - Unrecognized slot values are coerced to Unknown or rejected, per policy
 * - Any other keys (e.g. "T_24") are ignored
 *
 * All checks run before anything is drawn.
 *
 * @throws GridInputError when the record is not an object
 * @throws InvalidDateFormatError when T_Date is missing or invalid
 * @throws UnsupportedStateSymbolError for unrecognized slots under "reject"
 */
export function parseGridStateModel(
  raw: unknown,
  policy: UnknownSymbolPolicy,
): ParsedGridData {
  if (!isRecord(raw)) {
    throw new GridInputError("Grid data must be a JSON object");
  }

  const dateValue = raw[DATE_KEY];
  const date = typeof dateValue === "string" ? parseGridDate(dateValue) : null;
  if (typeof dateValue !== "string" || !date) {
    throw new InvalidDateFormatError(dateValue);
  }

  const coerced: CoercedSlot[] = [];
  const hours = HOUR_KEYS.map((key): StateSymbol => {
    const value = raw[key];
    if (value === undefined || value === null) {
      return "Unknown";
    }

    const symbol = typeof value === "string" ? stateSymbolFromGlyph(value) : null;
    if (symbol) {
      return symbol;
    }

    if (policy === "reject") {
      throw new UnsupportedStateSymbolError(key, value);
    }
    coerced.push({ key, value });
    return "Unknown";
  });

  return {
    model: {
      date,
      dateKey: formatDateKey(date),
      dateLabel: dateValue,
      hours,
    },
    coerced,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
