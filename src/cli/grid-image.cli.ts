import { readFile } from "fs/promises";
import { GridInputError } from "../common/errors/grid-image.errors";
import exampleGridData from "../../fixtures/example-grid-data.json";

export const DEFAULT_OUTPUT_PATH = "grid_availability.png";
export const STDIN_INPUT = "-";

export const CLI_USAGE =
  "Usage: grid-image [input.json | -] [output.png] [--base64]";

export interface CliArgs {
  /** Input file, "-" for stdin, or null for the bundled example record */
  input: string | null;
  output: string;
  base64: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  let base64 = false;

  for (const arg of argv) {
    if (arg === "--base64") {
      base64 = true;
    } else if (arg.startsWith("-") && arg !== STDIN_INPUT) {
      throw new CliUsageError(`Unknown option "${arg}"`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length > 2) {
    throw new CliUsageError(
      `Expected at most 2 arguments, got ${positional.length}`,
    );
  }

  return {
    input: positional[0] ?? null,
    output: positional[1] ?? DEFAULT_OUTPUT_PATH,
    base64,
  };
}

/**
 * Loads the raw record the CLI should render. Shape validation is left to
 * the grid service; this only turns bytes into JSON.
 *
 * @throws GridInputError when the source cannot be read or is not JSON
 */
export async function readGridInput(
  input: string | null,
  stdin: AsyncIterable<string | Buffer>,
): Promise<unknown> {
  if (input === null) {
    return exampleGridData;
  }

  let text: string;
  try {
    text =
      input === STDIN_INPUT ? await readStream(stdin) : await readFile(input, "utf8");
  } catch (error) {
    const source = input === STDIN_INPUT ? "stdin" : input;
    throw new GridInputError(
      `Could not read grid data from ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new GridInputError(
      `Grid data is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

async function readStream(
  stream: AsyncIterable<string | Buffer>,
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}
