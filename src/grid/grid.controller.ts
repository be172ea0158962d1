import {
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  StreamableFile,
  UseInterceptors,
} from "@nestjs/common";
import {
  ApiBody,
  ApiOperation,
  ApiProduces,
  ApiResponse,
  ApiTags,
} from "@nestjs/swagger";
import { NoCdnCacheInterceptor } from "../common/interceptors/no-cdn-cache.interceptor";
import {
  GENERATE_TOOL_NAME,
  GRID_TOOLS,
  IMAGE_SIZE_LABEL,
} from "./constants/tool-definition.constant";
import { GenerateImageRequestDto } from "./dto/generate-image-request.dto";
import { GenerateImageResponseDto } from "./dto/generate-image-response.dto";
import { GridImageService } from "./grid-image.service";
import { toBase64 } from "./rendering/output.encoder";

/**
 * Grid Controller
 *
 * Tool-style endpoints for workflow engines:
 * - GET /tools - Tool listing with input schema
 * - POST /tools/generate_grid_availability_image - Render an image
 * - POST /generate - Same as above, shorter path for n8n
 */
@ApiTags("tools")
@Controller()
export class GridController {
  constructor(private readonly gridImageService: GridImageService) {}

  @Get("tools")
  @ApiOperation({
    summary: "List available tools",
    description: "Tool definitions with JSON input schemas.",
  })
  listTools(): { tools: typeof GRID_TOOLS } {
    return { tools: GRID_TOOLS };
  }

  @Post(`tools/${GENERATE_TOOL_NAME}`)
  @HttpCode(200)
  @UseInterceptors(NoCdnCacheInterceptor)
  @ApiOperation({
    summary: "Generate grid availability image",
    description:
      `Renders a ${IMAGE_SIZE_LABEL} PNG timeline of 24 hourly states. ` +
      "Returns PNG binary, or base64 JSON when return_base64 is true.",
  })
  @ApiBody({ type: GenerateImageRequestDto })
  @ApiProduces("image/png", "application/json")
  @ApiResponse({
    status: 200,
    description: "PNG image, or base64 JSON when return_base64 is true",
    type: GenerateImageResponseDto,
  })
  @ApiResponse({ status: 400, description: "Invalid T_Date or grid data" })
  generateImage(
    @Body() request: GenerateImageRequestDto,
  ): StreamableFile | GenerateImageResponseDto {
    const model = this.gridImageService.parse(request.grid_data);
    const image = this.gridImageService.render(model);

    if (request.return_base64) {
      return {
        success: true,
        message: "Grid availability image generated successfully",
        image_size: IMAGE_SIZE_LABEL,
        image_base64: toBase64(image),
        mime_type: image.mimeType,
      };
    }

    const fileName = `grid_availability_${model.dateLabel.replace(/-/g, "_")}.png`;
    return new StreamableFile(image.data, {
      type: image.mimeType,
      disposition: `attachment; filename=${fileName}`,
      length: image.data.length,
    });
  }

  @Post("generate")
  @HttpCode(200)
  @UseInterceptors(NoCdnCacheInterceptor)
  @ApiOperation({
    summary: "Generate grid availability image (short path)",
    description: `Alias of POST /tools/${GENERATE_TOOL_NAME}.`,
  })
  @ApiBody({ type: GenerateImageRequestDto })
  @ApiProduces("image/png", "application/json")
  generateSimple(
    @Body() request: GenerateImageRequestDto,
  ): StreamableFile | GenerateImageResponseDto {
    return this.generateImage(request);
  }
}
