import { StateSymbol } from "./state-symbol.type";

/**
 * One day's availability record after validation.
 *
 * Built fresh for every request and never shared between requests.
 */
export interface GridStateModel {
  /** Local midnight of the calendar day */
  readonly date: Date;
  /** Calendar day as yyyy-MM-dd, used for "today" comparisons */
  readonly dateKey: string;
  /** Calendar day exactly as the caller sent it (dd-MM-yyyy) */
  readonly dateLabel: string;
  /** Exactly 24 entries; index i is hour i */
  readonly hours: readonly StateSymbol[];
}

/**
 * Policy for hour values that are present but not one of the four glyphs.
 * - coerce: treat the slot as Unknown and log a warning
 * - reject: fail with UnsupportedStateSymbolError
 */
export type UnknownSymbolPolicy = "coerce" | "reject";
