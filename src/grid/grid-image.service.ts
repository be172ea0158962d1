import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  GRID_IMAGE_OPTIONS,
  GridImageConfig,
} from "../config/grid-image.config";
import { loadFontStack, ResolvedFontStack } from "./rendering/font-registry";
import { drawGrid } from "./rendering/grid.renderer";
import { deliverImage, encodePng } from "./rendering/output.encoder";
import {
  DeliveredImage,
  ImageDelivery,
  RenderedImage,
} from "./types/rendered-image.type";
import { GridStateModel } from "./types/state-model.type";
import { parseGridStateModel } from "./utils/input-validator.util";

/**
 * Grid Image Service
 *
 * Turns a raw availability record into a PNG:
 * validate → layout → draw → encode → deliver.
 *
 * Validation finishes before any drawing starts, so a rejected record never
 * produces a partial image.
 */
@Injectable()
export class GridImageService {
  private readonly logger = new Logger(GridImageService.name);

  constructor(
    @Inject(GRID_IMAGE_OPTIONS) private readonly options: GridImageConfig,
  ) {}

  /**
   * Validate a raw record into a state model.
   *
   * @throws GridInputError (or a subclass) when the record is unusable
   */
  parse(raw: unknown): GridStateModel {
    const { model, coerced } = parseGridStateModel(
      raw,
      this.options.unknownSymbolPolicy,
    );

    for (const slot of coerced) {
      this.logger.warn(
        `Unrecognized state ${JSON.stringify(slot.value)} for ${slot.key} on ${model.dateLabel}, drawing as Unknown`,
      );
    }

    return model;
  }

  /**
   * Render a validated model to PNG bytes.
   *
   * @param now - Instant for the "now" marker; fixed values give repeatable output
   */
  render(model: GridStateModel, now: Date = new Date()): RenderedImage {
    const { canvas, marker } = drawGrid(model, {
      now,
      timezone: this.options.timezone,
      fonts: this.getFonts(),
    });

    const image = encodePng(canvas);
    this.logger.debug(
      `Rendered ${model.dateLabel}: ${image.data.length} bytes${marker ? `, now marker at ${marker.label}` : ""}`,
    );
    return image;
  }

  /**
   * Validate, render and deliver in one call.
   *
   * @throws GridInputError subclasses for bad input
   * @throws OutputWriteFailureError when a file delivery cannot be written
   */
  async generate(
    raw: unknown,
    delivery: ImageDelivery,
    now: Date = new Date(),
  ): Promise<DeliveredImage> {
    const model = this.parse(raw);
    const image = this.render(model, now);
    return deliverImage(image, delivery);
  }

  getFonts(): ResolvedFontStack {
    return loadFontStack({ fontDir: this.options.fontDir });
  }
}
