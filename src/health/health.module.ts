import { Module } from "@nestjs/common";
import { GridModule } from "../grid/grid.module";
import { HealthController } from "./health.controller";

/**
 * Health Module
 *
 * Liveness endpoints; reports which font stack the renderer resolved.
 */
@Module({
  imports: [GridModule],
  controllers: [HealthController],
})
export class HealthModule {}
