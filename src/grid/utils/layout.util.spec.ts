import { GridStateModel } from "../types/state-model.type";
import { StateSymbol } from "../types/state-symbol.type";
import { computeGridLayout, segmentBoundary } from "./layout.util";

const model = (hours: StateSymbol[]): GridStateModel => ({
  date: new Date(2025, 10, 20),
  dateKey: "2025-11-20",
  dateLabel: "20-11-2025",
  hours,
});

describe("layout.util", () => {
  it("rounds boundaries cumulatively", () => {
    expect(segmentBoundary(0)).toBe(0);
    expect(segmentBoundary(1)).toBe(43);
    expect(segmentBoundary(2)).toBe(85);
    expect(segmentBoundary(3)).toBe(128);
    expect(segmentBoundary(12)).toBe(512);
    expect(segmentBoundary(23)).toBe(981);
    expect(segmentBoundary(24)).toBe(1024);
  });

  it("tiles the full width with 24 contiguous segments", () => {
    const hours = Array.from({ length: 24 }, (): StateSymbol => "Available");
    const geometry = computeGridLayout(model(hours));

    expect(geometry.segments).toHaveLength(24);
    expect(geometry.segments[0].left).toBe(0);
    expect(geometry.segments[23].right).toBe(1024);
    for (let i = 1; i < 24; i++) {
      expect(geometry.segments[i].left).toBe(geometry.segments[i - 1].right);
    }

    const widths = geometry.segments.map((s) => s.right - s.left);
    expect(widths.reduce((sum, w) => sum + w, 0)).toBe(1024);
    expect(widths.every((w) => w === 42 || w === 43)).toBe(true);
  });

  it("carries each hour's state onto its segment", () => {
    const hours = Array.from(
      { length: 24 },
      (_, hour): StateSymbol => (hour < 12 ? "Unavailable" : "Partial"),
    );
    const { segments } = computeGridLayout(model(hours));

    expect(segments[0]).toEqual({
      hour: 0,
      state: "Unavailable",
      left: 0,
      right: 43,
    });
    expect(segments[12]).toEqual({
      hour: 12,
      state: "Partial",
      left: 512,
      right: 555,
    });
  });

  it("stacks fixed bands without overlap", () => {
    const geometry = computeGridLayout(
      model(Array.from({ length: 24 }, (): StateSymbol => "Unknown")),
    );

    expect(geometry.width).toBe(1024);
    expect(geometry.height).toBe(250);
    expect(geometry.header).toEqual({ top: 0, bottom: 72 });
    expect(geometry.markerLabels).toEqual({ top: 72, bottom: 104 });
    expect(geometry.bar).toEqual({ top: 104, bottom: 152 });
    expect(geometry.hourLabels).toEqual({ top: 152, bottom: 192 });
    expect(geometry.legend).toEqual({ top: 192, bottom: 250 });
  });
});
