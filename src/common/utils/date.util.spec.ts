import {
  formatDateKey,
  formatReadableDate,
  getClockTimeAt,
  getDateKeyAt,
  isValidTimezone,
  parseGridDate,
} from "./date.util";

describe("date.util", () => {
  describe("parseGridDate", () => {
    it("parses DD-MM-YYYY into local midnight", () => {
      const date = parseGridDate("20-11-2025");

      expect(date).not.toBeNull();
      expect(date?.getFullYear()).toBe(2025);
      expect(date?.getMonth()).toBe(10);
      expect(date?.getDate()).toBe(20);
      expect(date?.getHours()).toBe(0);
    });

    it("accepts leap days", () => {
      expect(parseGridDate("29-02-2024")?.getDate()).toBe(29);
    });

    it.each([
      ["2025-11-20"],
      ["20/11/2025"],
      ["1-1-2025"],
      ["20-11-25"],
      [" 20-11-2025"],
      [""],
    ])("rejects wrong shape %j", (value) => {
      expect(parseGridDate(value)).toBeNull();
    });

    it.each([["31-02-2025"], ["29-02-2025"], ["00-01-2025"], ["15-13-2025"]])(
      "rejects non-existent date %s",
      (value) => {
        expect(parseGridDate(value)).toBeNull();
      },
    );
  });

  it("formatDateKey formats as yyyy-MM-dd", () => {
    expect(formatDateKey(new Date(2025, 0, 5, 13, 45))).toBe("2025-01-05");
  });

  it("formatReadableDate spells out weekday and month", () => {
    expect(formatReadableDate(new Date(2025, 10, 20))).toBe(
      "Thursday, 20 November 2025",
    );
  });

  describe("getDateKeyAt", () => {
    const instant = new Date("2024-01-01T01:00:00Z");

    it("uses the given timezone", () => {
      expect(getDateKeyAt(instant, "UTC")).toBe("2024-01-01");
      expect(getDateKeyAt(instant, "America/Los_Angeles")).toBe("2023-12-31");
    });

    it("falls back to the local zone", () => {
      const local = new Date(2024, 5, 15, 23, 59);
      expect(getDateKeyAt(local)).toBe("2024-06-15");
    });
  });

  describe("getClockTimeAt", () => {
    it("reads the wall clock in the given timezone", () => {
      const instant = new Date("2024-07-01T12:05:00Z");

      expect(getClockTimeAt(instant, "UTC")).toEqual({ hour: 12, minute: 5 });
      expect(getClockTimeAt(instant, "Europe/Kyiv")).toEqual({
        hour: 15,
        minute: 5,
      });
    });

    it("reads the local clock without a timezone", () => {
      expect(getClockTimeAt(new Date(2024, 6, 1, 7, 42))).toEqual({
        hour: 7,
        minute: 42,
      });
    });
  });

  it("isValidTimezone recognizes IANA names", () => {
    expect(isValidTimezone("Europe/Kyiv")).toBe(true);
    expect(isValidTimezone("UTC")).toBe(true);
    expect(isValidTimezone("Mars/Olympus_Mons")).toBe(false);
  });
});
