import type { Canvas } from "@napi-rs/canvas";
import { writeFile } from "fs/promises";
import { OutputWriteFailureError } from "../../common/errors/grid-image.errors";
import {
  DeliveredImage,
  ImageDelivery,
  RenderedImage,
} from "../types/rendered-image.type";

/**
 * Serializes a canvas to a lossless PNG.
 */
export function encodePng(canvas: Canvas): RenderedImage {
  return Object.freeze({
    data: canvas.toBuffer("image/png"),
    width: canvas.width,
    height: canvas.height,
    mimeType: "image/png" as const,
  });
}

/**
 * Single-line base64 text of the image bytes.
 */
export function toBase64(image: RenderedImage): string {
  return image.data.toString("base64");
}

/**
 * Writes the image to `path`, creating or overwriting the file.
 *
 * @throws OutputWriteFailureError on any I/O error; not retried
 */
export async function writeImageFile(
  image: RenderedImage,
  path: string,
): Promise<void> {
  try {
    await writeFile(path, image.data);
  } catch (error) {
    throw new OutputWriteFailureError(path, error);
  }
}

/**
 * Hands an encoded image to the caller in the requested delivery mode.
 */
export async function deliverImage(
  image: RenderedImage,
  delivery: ImageDelivery,
): Promise<DeliveredImage> {
  switch (delivery.mode) {
    case "file":
      await writeImageFile(image, delivery.path);
      return { mode: "file", path: delivery.path, image };
    case "base64":
      return { mode: "base64", base64: toBase64(image), image };
  }
}
