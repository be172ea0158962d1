import { Controller, Get, Header } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { ApiInfo, AppService } from "./app.service";

@ApiTags("root")
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @Header("Cache-Control", "public, max-age=3600")
  @ApiOperation({
    summary: "API information",
    description: "Service name, version and the available endpoints",
  })
  @ApiResponse({ status: 200, description: "API information" })
  getRoot(): ApiInfo {
    return this.appService.getApiInfo();
  }
}
