/**
 * Encoded output of a single render. Treated as immutable once produced.
 */
export interface RenderedImage {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly mimeType: "image/png";
}

/**
 * How the caller wants the encoded image delivered.
 */
export type ImageDelivery = { mode: "file"; path: string } | { mode: "base64" };

export type DeliveredImage =
  | { mode: "file"; path: string; image: RenderedImage }
  | { mode: "base64"; base64: string; image: RenderedImage };
