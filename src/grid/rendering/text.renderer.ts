import type { SKRSContext2D } from "@napi-rs/canvas";
import { formatReadableDate } from "../../common/utils/date.util";
import {
  DATE_Y,
  HOUR_LABEL_Y,
  LEGEND_CENTER_Y,
  LEGEND_MARGIN_X,
  LEGEND_SWATCH_HEIGHT,
  LEGEND_SWATCH_WIDTH,
  MARKER_OVERHANG,
  MARKER_POINTER_SIZE,
  TITLE_TEXT,
  TITLE_Y,
} from "../constants/canvas.constant";
import { IOS_COLORS, toCssColor } from "../constants/palette.constant";
import { GridGeometry, TimeMarker } from "../types/geometry.type";
import { GridStateModel } from "../types/state-model.type";
import { STATE_SYMBOLS } from "../types/state-symbol.type";
import { colorForState, labelForState } from "../utils/color-state.util";
import { cssFont, ResolvedFontStack } from "./font-registry";

const LEGEND_LABEL_GAP = 8;
const LEGEND_ITEM_GAP = 24;
const MARKER_LABEL_PADDING = 4;

/**
 * Draws every text element of the grid image, in the text layer that sits
 * above segments and the marker.
 */
export function drawGridText(
  ctx: SKRSContext2D,
  fonts: ResolvedFontStack,
  model: GridStateModel,
  geometry: GridGeometry,
  marker: TimeMarker | null,
): void {
  drawHeader(ctx, fonts, model, geometry);
  if (marker) {
    drawMarkerLabel(ctx, fonts, marker, geometry);
  }
  drawHourLabels(ctx, fonts, geometry);
  drawLegend(ctx, fonts, geometry);
}

function drawHeader(
  ctx: SKRSContext2D,
  fonts: ResolvedFontStack,
  model: GridStateModel,
  geometry: GridGeometry,
): void {
  const centerX = geometry.width / 2;
  ctx.textAlign = "center";
  ctx.textBaseline = "top";

  ctx.font = cssFont(fonts, 600, 22);
  ctx.fillStyle = toCssColor(IOS_COLORS.label);
  ctx.fillText(TITLE_TEXT, centerX, TITLE_Y);

  ctx.font = cssFont(fonts, 400, 15);
  ctx.fillStyle = toCssColor(IOS_COLORS.secondaryLabel);
  ctx.fillText(formatReadableDate(model.date), centerX, DATE_Y);
}

function drawMarkerLabel(
  ctx: SKRSContext2D,
  fonts: ResolvedFontStack,
  marker: TimeMarker,
  geometry: GridGeometry,
): void {
  const text = `now ${marker.label}`;
  ctx.font = cssFont(fonts, 600, 12);
  ctx.textAlign = "center";
  ctx.textBaseline = "bottom";

  // Keep the label on the canvas near midnight
  const halfWidth = ctx.measureText(text).width / 2 + MARKER_LABEL_PADDING;
  const x = Math.min(
    Math.max(marker.x, halfWidth),
    geometry.width - halfWidth,
  );
  const y =
    geometry.bar.top - MARKER_OVERHANG - MARKER_POINTER_SIZE - MARKER_LABEL_PADDING;

  ctx.fillStyle = toCssColor(IOS_COLORS.marker);
  ctx.fillText(text, x, y);
}

function drawHourLabels(
  ctx: SKRSContext2D,
  fonts: ResolvedFontStack,
  geometry: GridGeometry,
): void {
  ctx.font = cssFont(fonts, 400, 12);
  ctx.textAlign = "center";
  ctx.textBaseline = "top";
  ctx.fillStyle = toCssColor(IOS_COLORS.secondaryLabel);

  for (const segment of geometry.segments) {
    const label = String(segment.hour).padStart(2, "0");
    ctx.fillText(label, (segment.left + segment.right) / 2, HOUR_LABEL_Y);
  }
}

function drawLegend(
  ctx: SKRSContext2D,
  fonts: ResolvedFontStack,
  geometry: GridGeometry,
): void {
  ctx.font = cssFont(fonts, 400, 13);
  ctx.textAlign = "left";
  ctx.textBaseline = "middle";

  let x = LEGEND_MARGIN_X;
  for (const state of STATE_SYMBOLS) {
    const label = labelForState(state);

    ctx.fillStyle = toCssColor(colorForState(state));
    ctx.fillRect(
      x,
      LEGEND_CENTER_Y - LEGEND_SWATCH_HEIGHT / 2,
      LEGEND_SWATCH_WIDTH,
      LEGEND_SWATCH_HEIGHT,
    );
    x += LEGEND_SWATCH_WIDTH + LEGEND_LABEL_GAP;

    ctx.fillStyle = toCssColor(IOS_COLORS.label);
    ctx.fillText(label, x, LEGEND_CENTER_Y);
    x += ctx.measureText(label).width + LEGEND_ITEM_GAP;

    if (x >= geometry.width) {
      break;
    }
  }
}
