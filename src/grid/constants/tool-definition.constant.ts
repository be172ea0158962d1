import { CANVAS_HEIGHT, CANVAS_WIDTH } from "./canvas.constant";
import { STATE_GLYPHS } from "../types/state-symbol.type";
import { DATE_KEY, HOUR_KEYS } from "../utils/input-validator.util";

export const GENERATE_TOOL_NAME = "generate_grid_availability_image";

export const IMAGE_SIZE_LABEL = `${CANVAS_WIDTH}x${CANVAS_HEIGHT}px`;

const STATE_VALUES_TEXT =
  `'${STATE_GLYPHS.Available}' (available), '${STATE_GLYPHS.Unavailable}' (unavailable), ` +
  `'${STATE_GLYPHS.Partial}' (partial/transition), or '${STATE_GLYPHS.Unknown}' (unknown)`;

interface StringProperty {
  type: "string";
  description: string;
}

const hourProperties = Object.fromEntries(
  HOUR_KEYS.map((key, hour): [string, StringProperty] => [
    key,
    { type: "string", description: `State for hour ${hour}` },
  ]),
);

/**
 * JSON schema of the availability record
 */
export const GRID_DATA_SCHEMA = {
  type: "object" as const,
  properties: {
    [DATE_KEY]: {
      type: "string",
      description: "Date in DD-MM-YYYY format (e.g., '20-11-2025')",
    },
    ...hourProperties,
  } satisfies Record<string, StringProperty>,
  required: [DATE_KEY],
};

/**
 * Tool listing served by GET /tools, in the shape tool-calling clients
 * (e.g. n8n, MCP bridges) expect.
 */
export const GRID_TOOLS = [
  {
    name: GENERATE_TOOL_NAME,
    description:
      `Generate an image showing electricity grid availability for a given date. ` +
      `The image is ${IMAGE_SIZE_LABEL} and follows iOS design guidelines. ` +
      `Input data should be a JSON object with T_Date (format: DD-MM-YYYY) and ` +
      `T_00 through T_23 keys with values: ${STATE_VALUES_TEXT}.`,
    inputSchema: {
      type: "object",
      properties: {
        grid_data: GRID_DATA_SCHEMA,
        return_base64: {
          type: "boolean",
          description: "If true, return the image as a base64-encoded string.",
          default: false,
        },
      },
      required: ["grid_data"],
    },
  },
];
