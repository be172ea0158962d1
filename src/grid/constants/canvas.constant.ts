/**
 * Canvas Layout Constants
 *
 * The 1024x250 output size is an external contract with downstream
 * consumers (chat previews, dashboards) and must not change.
 */

export const CANVAS_WIDTH = 1024;
export const CANVAS_HEIGHT = 250;

export const HOURS_PER_DAY = 24;

// Vertical bands, top to bottom
export const HEADER_TOP = 0;
export const MARKER_BAND_TOP = 72;
export const BAR_TOP = 104;
export const BAR_BOTTOM = 152;
export const LEGEND_TOP = 192;

export const TITLE_Y = 16;
export const DATE_Y = 46;
export const TICK_LENGTH = 6;
export const HOUR_LABEL_Y = 164;
export const LEGEND_CENTER_Y = 220;
export const LEGEND_MARGIN_X = 24;
export const LEGEND_SWATCH_WIDTH = 28;
export const LEGEND_SWATCH_HEIGHT = 10;

export const MARKER_LINE_WIDTH = 2;
export const MARKER_OVERHANG = 6;
export const MARKER_POINTER_SIZE = 5;

export const TITLE_TEXT = "Electricity Grid Availability";
