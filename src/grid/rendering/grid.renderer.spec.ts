import { GridStateModel } from "../types/state-model.type";
import { StateSymbol } from "../types/state-symbol.type";
import { ResolvedFontStack } from "./font-registry";
import { drawGrid, GridDrawing } from "./grid.renderer";

const fonts: ResolvedFontStack = {
  family: "sans-serif",
  source: null,
  fallback: true,
  failures: [],
};

const BAR_MIDDLE_Y = 128;

function model(hours: StateSymbol[]): GridStateModel {
  return {
    date: new Date(2025, 10, 20),
    dateKey: "2025-11-20",
    dateLabel: "20-11-2025",
    hours,
  };
}

function pixel(drawing: GridDrawing, x: number, y: number): number[] {
  const ctx = drawing.canvas.getContext("2d");
  return Array.from(ctx.getImageData(x, y, 1, 1).data);
}

describe("drawGrid", () => {
  const pastDay = new Date(2025, 10, 21, 10, 0);
  const mixed = Array.from({ length: 24 }, (_, hour): StateSymbol => {
    if (hour < 6) return "Available";
    if (hour < 12) return "Unavailable";
    if (hour < 18) return "Partial";
    return "Unknown";
  });

  it("draws a 1024x250 canvas", () => {
    const drawing = drawGrid(model(mixed), { now: pastDay, fonts });

    expect(drawing.canvas.width).toBe(1024);
    expect(drawing.canvas.height).toBe(250);
  });

  it("fills each hour segment with its state color", () => {
    const drawing = drawGrid(model(mixed), { now: pastDay, fonts });

    expect(pixel(drawing, 20, BAR_MIDDLE_Y)).toEqual([52, 199, 89, 255]);
    expect(pixel(drawing, 300, BAR_MIDDLE_Y)).toEqual([255, 59, 48, 255]);
    expect(pixel(drawing, 600, BAR_MIDDLE_Y)).toEqual([255, 149, 0, 255]);
    expect(pixel(drawing, 1000, BAR_MIDDLE_Y)).toEqual([142, 142, 147, 255]);
  });

  it("switches color exactly on segment boundaries", () => {
    const drawing = drawGrid(model(mixed), { now: pastDay, fonts });

    // Hour 5 ends and hour 6 begins at x = 256
    expect(pixel(drawing, 255, BAR_MIDDLE_Y)).toEqual([52, 199, 89, 255]);
    expect(pixel(drawing, 256, BAR_MIDDLE_Y)).toEqual([255, 59, 48, 255]);
    expect(pixel(drawing, 0, 104)).toEqual([52, 199, 89, 255]);
    expect(pixel(drawing, 1023, 151)).toEqual([142, 142, 147, 255]);
  });

  it("leaves the background white outside the bar", () => {
    const drawing = drawGrid(model(mixed), { now: pastDay, fonts });

    expect(pixel(drawing, 0, 0)).toEqual([255, 255, 255, 255]);
    expect(pixel(drawing, 20, 103)).toEqual([255, 255, 255, 255]);
    expect(pixel(drawing, 20, 152)).toEqual([255, 255, 255, 255]);
  });

  it("draws hour ticks below the bar", () => {
    const drawing = drawGrid(model(mixed), { now: pastDay, fonts });

    expect(pixel(drawing, 43, 155)).toEqual([198, 198, 200, 255]);
    expect(pixel(drawing, 42, 155)).toEqual([255, 255, 255, 255]);
  });

  it("omits the marker for other days", () => {
    const drawing = drawGrid(model(mixed), { now: pastDay, fonts });

    expect(drawing.marker).toBeNull();
    expect(pixel(drawing, 511, BAR_MIDDLE_Y)).toEqual([255, 59, 48, 255]);
  });

  it("draws the marker across the bar on today's date", () => {
    const noon = new Date(2025, 10, 20, 12, 0);
    const drawing = drawGrid(model(mixed), { now: noon, fonts });

    expect(drawing.marker).toMatchObject({ x: 512, label: "12:00" });
    expect(pixel(drawing, 511, BAR_MIDDLE_Y)).toEqual([28, 28, 30, 255]);
    expect(pixel(drawing, 512, BAR_MIDDLE_Y)).toEqual([28, 28, 30, 255]);
    expect(pixel(drawing, 511, 100)).toEqual([28, 28, 30, 255]);
    expect(pixel(drawing, 510, BAR_MIDDLE_Y)).toEqual([255, 59, 48, 255]);
    expect(pixel(drawing, 513, BAR_MIDDLE_Y)).toEqual([255, 149, 0, 255]);
  });

  it("renders identical pixels for identical inputs", () => {
    const now = new Date(2025, 10, 20, 8, 15);
    const a = drawGrid(model(mixed), { now, fonts });
    const b = drawGrid(model(mixed), { now, fonts });

    expect(a.canvas.toBuffer("image/png").equals(b.canvas.toBuffer("image/png"))).toBe(
      true,
    );
  });

  describe("whole-bar properties", () => {
    function barColors(drawing: GridDrawing): Set<string> {
      const ctx = drawing.canvas.getContext("2d");
      const { data } = ctx.getImageData(0, 104, 1024, 48);
      const colors = new Set<string>();
      for (let i = 0; i < data.length; i += 4) {
        colors.add(`${data[i]},${data[i + 1]},${data[i + 2]},${data[i + 3]}`);
      }
      return colors;
    }

    it("fills the bar with green only when every hour is Available", () => {
      const drawing = drawGrid(
        model(Array.from({ length: 24 }, (): StateSymbol => "Available")),
        { now: pastDay, fonts },
      );

      expect([...barColors(drawing)]).toEqual(["52,199,89,255"]);
    });

    it("fills the bar with red only when every hour is Unavailable", () => {
      const allDown: GridStateModel = {
        date: new Date(2025, 0, 1),
        dateKey: "2025-01-01",
        dateLabel: "01-01-2025",
        hours: Array.from({ length: 24 }, (): StateSymbol => "Unavailable"),
      };
      const drawing = drawGrid(allDown, { now: pastDay, fonts });

      expect(drawing.marker).toBeNull();
      expect([...barColors(drawing)]).toEqual(["255,59,48,255"]);
    });
  });

  it("ignores the wall clock for days other than today", () => {
    const morning = drawGrid(model(mixed), {
      now: new Date(2025, 10, 22, 6, 0),
      fonts,
    });
    const evening = drawGrid(model(mixed), {
      now: new Date(2026, 2, 1, 21, 45),
      fonts,
    });

    expect(
      morning.canvas.toBuffer("image/png").equals(evening.canvas.toBuffer("image/png")),
    ).toBe(true);
  });

  it("moves the marker right as the day goes on", () => {
    const positions = [9, 11, 13, 15].map(
      (hour) =>
        drawGrid(model(mixed), { now: new Date(2025, 10, 20, hour, 0), fonts })
          .marker?.x ?? -1,
    );

    for (let i = 1; i < positions.length; i++) {
      expect(positions[i]).toBeGreaterThan(positions[i - 1]);
    }
    expect(positions[0]).toBe(384);
  });
});
