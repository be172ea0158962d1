import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  GRID_IMAGE_OPTIONS,
  getGridImageConfig,
} from "../config/grid-image.config";
import { GridController } from "./grid.controller";
import { GridImageService } from "./grid-image.service";

/**
 * Grid Module
 *
 * Availability image rendering: input validation, layout, drawing and
 * PNG delivery, plus the tool-style HTTP endpoints.
 */
@Module({
  controllers: [GridController],
  providers: [
    {
      provide: GRID_IMAGE_OPTIONS,
      useFactory: (configService: ConfigService) =>
        getGridImageConfig((key) => configService.get<string>(key)),
      inject: [ConfigService],
    },
    GridImageService,
  ],
  exports: [GridImageService],
})
export class GridModule {}
