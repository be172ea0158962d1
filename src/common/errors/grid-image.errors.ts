/**
 * Grid Image Errors
 *
 * Domain errors raised by the rendering pipeline. They carry no HTTP
 * semantics; HttpExceptionFilter maps them to status codes.
 */

export type GridImageErrorCode =
  | "INVALID_GRID_DATA"
  | "INVALID_DATE_FORMAT"
  | "UNSUPPORTED_STATE_SYMBOL"
  | "FONT_LOAD_FAILURE"
  | "OUTPUT_WRITE_FAILURE";

export abstract class GridImageError extends Error {
  abstract readonly code: GridImageErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Caller input cannot be turned into a state model.
 */
export class GridInputError extends GridImageError {
  readonly code: GridImageErrorCode = "INVALID_GRID_DATA";
}

export class InvalidDateFormatError extends GridInputError {
  readonly code: GridImageErrorCode = "INVALID_DATE_FORMAT";

  constructor(readonly value: unknown) {
    super(
      value === undefined || value === null
        ? "T_Date is required (format: DD-MM-YYYY)"
        : `Invalid T_Date ${JSON.stringify(value)}: expected a calendar date in DD-MM-YYYY format`,
    );
  }
}

export class UnsupportedStateSymbolError extends GridInputError {
  readonly code: GridImageErrorCode = "UNSUPPORTED_STATE_SYMBOL";

  constructor(
    readonly key: string,
    readonly value: unknown,
  ) {
    super(
      `Unsupported state ${JSON.stringify(value)} for ${key}: expected one of '●', '✕', '%', '-'`,
    );
  }
}

/**
 * A font file could not be registered. Logged and replaced by the next
 * font in the fallback chain; never thrown out of the renderer.
 */
export class FontLoadFailureError extends GridImageError {
  readonly code = "FONT_LOAD_FAILURE" as const;

  constructor(
    readonly path: string,
    cause?: unknown,
  ) {
    super(`Could not load font ${path}`, { cause });
  }
}

export class OutputWriteFailureError extends GridImageError {
  readonly code = "OUTPUT_WRITE_FAILURE" as const;

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(
      `Could not write image to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}
