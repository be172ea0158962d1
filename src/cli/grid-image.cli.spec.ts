import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { GridInputError } from "../common/errors/grid-image.errors";
import {
  CliUsageError,
  DEFAULT_OUTPUT_PATH,
  parseCliArgs,
  readGridInput,
} from "./grid-image.cli";

async function* streamOf(...chunks: string[]): AsyncGenerator<Buffer> {
  for (const chunk of chunks) {
    yield Buffer.from(chunk);
  }
}

describe("grid-image CLI", () => {
  describe("parseCliArgs", () => {
    it("defaults to the bundled example and the default output", () => {
      expect(parseCliArgs([])).toEqual({
        input: null,
        output: DEFAULT_OUTPUT_PATH,
        base64: false,
      });
    });

    it("reads input and output positions", () => {
      expect(parseCliArgs(["day.json", "out.png"])).toEqual({
        input: "day.json",
        output: "out.png",
        base64: false,
      });
    });

    it("accepts - for stdin and --base64 anywhere", () => {
      expect(parseCliArgs(["--base64", "-"])).toEqual({
        input: "-",
        output: "grid_availability.png",
        base64: true,
      });
    });

    it("rejects unknown options", () => {
      expect(() => parseCliArgs(["--png"])).toThrow(CliUsageError);
      expect(() => parseCliArgs(["--png"])).toThrow('Unknown option "--png"');
    });

    it("rejects extra arguments", () => {
      expect(() => parseCliArgs(["a.json", "b.png", "c.png"])).toThrow(
        "Expected at most 2 arguments, got 3",
      );
    });
  });

  describe("readGridInput", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), "grid-cli-"));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it("returns the bundled example record without input", async () => {
      const raw = await readGridInput(null, streamOf());

      expect(raw).toMatchObject({
        T_Date: "20-11-2025",
        T_00: "●",
        T_06: "✕",
        T_16: "%",
        T_24: "-",
      });
    });

    it("reads JSON from a file", async () => {
      const path = join(tempDir, "day.json");
      writeFileSync(path, JSON.stringify({ T_Date: "01-01-2025", T_00: "●" }));

      await expect(readGridInput(path, streamOf())).resolves.toEqual({
        T_Date: "01-01-2025",
        T_00: "●",
      });
    });

    it("reads JSON from stdin across chunks", async () => {
      await expect(
        readGridInput("-", streamOf('{"T_Date":', '"02-01-2025"}')),
      ).resolves.toEqual({ T_Date: "02-01-2025" });
    });

    it("reports a missing file as an input error", async () => {
      const path = join(tempDir, "missing.json");

      await expect(readGridInput(path, streamOf())).rejects.toThrow(
        GridInputError,
      );
      await expect(readGridInput(path, streamOf())).rejects.toThrow(
        `Could not read grid data from ${path}`,
      );
    });

    it("reports malformed JSON as an input error", async () => {
      await expect(readGridInput("-", streamOf("{not json"))).rejects.toThrow(
        "Grid data is not valid JSON",
      );
    });
  });
});
