import { ApiProperty } from "@nestjs/swagger";
import { IsBoolean, IsObject, IsOptional } from "class-validator";
import { GRID_DATA_SCHEMA } from "../constants/tool-definition.constant";

/**
 * Generate Image Request DTO
 *
 * Body of POST /tools/generate_grid_availability_image and POST /generate.
 * `grid_data` is only checked to be an object here; its fields are
 * validated by the grid input validator so the HTTP and CLI paths share
 * one set of rules.
 */
export class GenerateImageRequestDto {
  @ApiProperty({
    description:
      "Availability record: T_Date (DD-MM-YYYY) plus optional T_00..T_23 states",
    type: "object",
    properties: GRID_DATA_SCHEMA.properties,
    example: {
      T_Date: "20-11-2025",
      T_00: "●",
      T_01: "●",
      T_06: "✕",
      T_16: "%",
      T_23: "-",
    },
  })
  @IsObject()
  grid_data!: Record<string, unknown>;

  @ApiProperty({
    description:
      "If true, return the image as base64 JSON. If false, return PNG binary.",
    required: false,
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  return_base64?: boolean;
}
