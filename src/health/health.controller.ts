import { Controller, Get } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { GridImageService } from "../grid/grid-image.service";
import * as packageJson from "../../package.json";

interface HealthStatus {
  status: "healthy";
  service: string;
  version: string;
  timestamp: string;
  uptime: number;
  fonts: {
    family: string;
    fallback: boolean;
  };
}

@ApiTags("health")
@Controller("health")
export class HealthController {
  constructor(private readonly gridImageService: GridImageService) {}

  @Get()
  @ApiOperation({
    summary: "Service health check",
    description:
      "Returns service status, uptime and the font family used for text.",
  })
  @ApiResponse({
    status: 200,
    description: "Service health status",
    schema: {
      type: "object",
      properties: {
        status: { type: "string", example: "healthy" },
        service: { type: "string", example: "grid-image-generator" },
        version: { type: "string" },
        timestamp: { type: "string", format: "date-time" },
        uptime: { type: "number" },
        fonts: { type: "object" },
      },
    },
  })
  getHealth(): HealthStatus {
    const fonts = this.gridImageService.getFonts();

    return {
      status: "healthy",
      service: "grid-image-generator",
      version: packageJson.version,
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      fonts: {
        family: fonts.family,
        fallback: fonts.fallback,
      },
    };
  }

  @Get("ping")
  ping(): { message: string; timestamp: string } {
    return {
      message: "pong",
      timestamp: new Date().toISOString(),
    };
  }
}
