import { IOS_COLORS } from "../constants/palette.constant";
import { RgbColor } from "../types/geometry.type";
import { StateSymbol } from "../types/state-symbol.type";

const STATE_COLORS: Record<StateSymbol, RgbColor> = {
  Available: IOS_COLORS.green,
  Unavailable: IOS_COLORS.red,
  Partial: IOS_COLORS.orange,
  Unknown: IOS_COLORS.gray,
};

/**
 * Display color of an hourly state.
 */
export function colorForState(state: StateSymbol): RgbColor {
  return STATE_COLORS[state];
}

/**
 * Legend label of an hourly state.
 */
export function labelForState(state: StateSymbol): string {
  switch (state) {
    case "Available":
      return "Available";
    case "Unavailable":
      return "Not Available";
    case "Partial":
      return "Partial";
    case "Unknown":
      return "Unknown";
  }
}
