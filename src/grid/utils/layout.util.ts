import {
  BAR_BOTTOM,
  BAR_TOP,
  CANVAS_HEIGHT,
  CANVAS_WIDTH,
  HEADER_TOP,
  HOURS_PER_DAY,
  LEGEND_TOP,
  MARKER_BAND_TOP,
} from "../constants/canvas.constant";
import { GridGeometry } from "../types/geometry.type";
import { GridStateModel } from "../types/state-model.type";

/**
 * Left pixel edge of an hour on the bar.
 *
 * Boundaries are rounded cumulatively (round(i * 1024 / 24)) instead of
 * summing rounded widths, so boundary 24 lands on exactly 1024.
 */
export function segmentBoundary(index: number): number {
  return Math.round((index * CANVAS_WIDTH) / HOURS_PER_DAY);
}

/**
 * Computes the pixel geometry of a grid image.
 *
 * The 24 segments cover [0, 1024) with no gap or overlap. Every band is
 * fixed, so the bar sits in the same rows for every render and the label
 * bands never reach into it.
 */
export function computeGridLayout(model: GridStateModel): GridGeometry {
  const boundaries = Array.from({ length: HOURS_PER_DAY + 1 }, (_, i) =>
    segmentBoundary(i),
  );

  const segments = model.hours.map((state, hour) => ({
    hour,
    state,
    left: boundaries[hour],
    right: boundaries[hour + 1],
  }));

  return {
    width: CANVAS_WIDTH,
    height: CANVAS_HEIGHT,
    boundaries,
    segments,
    header: { top: HEADER_TOP, bottom: MARKER_BAND_TOP },
    markerLabels: { top: MARKER_BAND_TOP, bottom: BAR_TOP },
    bar: { top: BAR_TOP, bottom: BAR_BOTTOM },
    hourLabels: { top: BAR_BOTTOM, bottom: LEGEND_TOP },
    legend: { top: LEGEND_TOP, bottom: CANVAS_HEIGHT },
  };
}
