import { StateSymbol } from "./state-symbol.type";

/**
 * Vertical band of the canvas, top inclusive and bottom exclusive.
 */
export interface Band {
  top: number;
  bottom: number;
}

export interface GridSegment {
  hour: number;
  state: StateSymbol;
  left: number;
  right: number;
}

/**
 * Pixel geometry of one rendered grid image.
 */
export interface GridGeometry {
  width: number;
  height: number;
  /** 25 entries: boundaries[i] is the left edge of hour i, boundaries[24] the right edge of hour 23 */
  boundaries: number[];
  segments: GridSegment[];
  bar: Band;
  header: Band;
  markerLabels: Band;
  hourLabels: Band;
  legend: Band;
}

/**
 * Position of the "now" indicator on the bar.
 */
export interface TimeMarker {
  x: number;
  hour: number;
  minute: number;
  /** HH:mm */
  label: string;
}

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}
