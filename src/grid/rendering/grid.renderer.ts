import { Canvas, createCanvas, type SKRSContext2D } from "@napi-rs/canvas";
import {
  MARKER_LINE_WIDTH,
  MARKER_OVERHANG,
  MARKER_POINTER_SIZE,
  TICK_LENGTH,
} from "../constants/canvas.constant";
import { IOS_COLORS, toCssColor } from "../constants/palette.constant";
import { GridGeometry, TimeMarker } from "../types/geometry.type";
import { GridStateModel } from "../types/state-model.type";
import { colorForState } from "../utils/color-state.util";
import { computeGridLayout } from "../utils/layout.util";
import { computeTimeMarker } from "../utils/time-marker.util";
import { ResolvedFontStack } from "./font-registry";
import { drawGridText } from "./text.renderer";

export interface RenderGridOptions {
  /** Instant the "now" marker is computed from */
  now: Date;
  /** IANA timezone deciding "today"; process local when absent */
  timezone?: string;
  fonts: ResolvedFontStack;
}

export interface GridDrawing {
  canvas: Canvas;
  geometry: GridGeometry;
  marker: TimeMarker | null;
}

/**
 * Draws a day's availability onto a fresh 1024x250 canvas.
 *
 * Layers, bottom to top: background, hour segments, hour ticks, "now"
 * marker, text. The output depends only on the model, `now` and the
 * timezone, so equal inputs give identical pixels.
 */
export function drawGrid(
  model: GridStateModel,
  options: RenderGridOptions,
): GridDrawing {
  const geometry = computeGridLayout(model);
  const marker = computeTimeMarker(model.dateKey, options.now, options.timezone);

  const canvas = createCanvas(geometry.width, geometry.height);
  const ctx = canvas.getContext("2d");

  drawBackground(ctx, geometry);
  drawSegments(ctx, geometry);
  drawHourTicks(ctx, geometry);
  if (marker) {
    drawMarker(ctx, geometry, marker);
  }
  drawGridText(ctx, options.fonts, model, geometry, marker);

  return { canvas, geometry, marker };
}

function drawBackground(ctx: SKRSContext2D, geometry: GridGeometry): void {
  ctx.fillStyle = toCssColor(IOS_COLORS.background);
  ctx.fillRect(0, 0, geometry.width, geometry.height);
}

function drawSegments(ctx: SKRSContext2D, geometry: GridGeometry): void {
  const { top, bottom } = geometry.bar;

  // Integer-aligned rects: no anti-aliased seams between hours
  for (const segment of geometry.segments) {
    ctx.fillStyle = toCssColor(colorForState(segment.state));
    ctx.fillRect(segment.left, top, segment.right - segment.left, bottom - top);
  }
}

function drawHourTicks(ctx: SKRSContext2D, geometry: GridGeometry): void {
  ctx.fillStyle = toCssColor(IOS_COLORS.separator);

  for (const x of geometry.boundaries.slice(1, -1)) {
    ctx.fillRect(x, geometry.bar.bottom, 1, TICK_LENGTH);
  }
}

function drawMarker(
  ctx: SKRSContext2D,
  geometry: GridGeometry,
  marker: TimeMarker,
): void {
  const { top, bottom } = geometry.bar;
  ctx.fillStyle = toCssColor(IOS_COLORS.marker);

  ctx.fillRect(
    marker.x - MARKER_LINE_WIDTH / 2,
    top - MARKER_OVERHANG,
    MARKER_LINE_WIDTH,
    bottom - top + 2 * MARKER_OVERHANG,
  );

  // Downward pointer resting on the line's top end
  const pointerTop = top - MARKER_OVERHANG - MARKER_POINTER_SIZE;
  ctx.beginPath();
  ctx.moveTo(marker.x - MARKER_POINTER_SIZE, pointerTop);
  ctx.lineTo(marker.x + MARKER_POINTER_SIZE, pointerTop);
  ctx.lineTo(marker.x, top - MARKER_OVERHANG);
  ctx.closePath();
  ctx.fill();
}
