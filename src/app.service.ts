import { Injectable } from "@nestjs/common";
import {
  GENERATE_TOOL_NAME,
  IMAGE_SIZE_LABEL,
} from "./grid/constants/tool-definition.constant";
import * as packageJson from "../package.json";

export interface ApiInfo {
  name: string;
  version: string;
  description: string;
  endpoints: Record<string, string>;
}

@Injectable()
export class AppService {
  getApiInfo(): ApiInfo {
    return {
      name: "Grid Availability Image Generator",
      version: packageJson.version,
      description: `Renders ${IMAGE_SIZE_LABEL} PNG timelines of hourly electricity grid availability`,
      endpoints: {
        "GET /health": "Service health and active font family",
        "GET /tools": "Tool definitions with input schema",
        [`POST /tools/${GENERATE_TOOL_NAME}`]: "Generate an image",
        "POST /generate": "Generate an image (short path)",
        "GET /api": "Swagger UI",
      },
    };
  }
}
