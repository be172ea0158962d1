import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import { Logger, ValidationPipe } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { getHttpConfig } from "./config/grid-image.config";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { LoggingInterceptor } from "./common/interceptors/logging.interceptor";
import * as packageJson from "../package.json";

async function bootstrap(): Promise<void> {
  const logger = new Logger("Bootstrap");
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ["log", "error", "warn"],
  });

  app.disable("x-powered-by");

  // Global validation pipe for DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip unknown properties
      forbidNonWhitelisted: true, // Throw error on unknown properties
      transform: true,
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  // Workflow engines call from other origins
  app.enableCors({ origin: "*" });

  const config = new DocumentBuilder()
    .setTitle("Grid Availability Image Generator")
    .setDescription(
      "Renders a day of hourly electricity grid availability as a 1024x250 PNG " +
        "timeline, with a marker for the current time.",
    )
    .setVersion(packageJson.version)
    .addTag("root", "API information")
    .addTag("health", "Service health checks")
    .addTag("tools", "Tool discovery and image generation")
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup("api", app, document, {
    customSiteTitle: "Grid Availability Image API",
  });

  const { host, port } = getHttpConfig();
  await app.listen(port, host);

  logger.log(`🚀 Grid image API running on: http://${host}:${port}`);
  logger.log(`📚 API Documentation: http://${host}:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(
    "Failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
