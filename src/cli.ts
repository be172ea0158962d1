#!/usr/bin/env node
import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger } from "@nestjs/common";
import { AppModule } from "./app.module";
import { GridImageService } from "./grid/grid-image.service";
import {
  CLI_USAGE,
  CliArgs,
  CliUsageError,
  parseCliArgs,
  readGridInput,
} from "./cli/grid-image.cli";

/**
 * Grid Image CLI
 *
 * Renders one record without starting the HTTP server:
 *   grid-image                      bundled example → grid_availability.png
 *   grid-image day.json out.png     file → file
 *   cat day.json | grid-image - --base64
 */
async function run(args: CliArgs): Promise<void> {
  const logger = new Logger("GridImageCli");

  // stdout carries the image in base64 mode, keep it free of log lines
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: args.base64 ? ["error"] : ["error", "warn", "log"],
  });

  try {
    const raw = await readGridInput(args.input, process.stdin);
    const result = await app
      .get(GridImageService)
      .generate(
        raw,
        args.base64 ? { mode: "base64" } : { mode: "file", path: args.output },
      );

    if (result.mode === "base64") {
      process.stdout.write(`${result.base64}\n`);
    } else {
      logger.log(
        `✅ Saved ${result.image.width}x${result.image.height} image to ${result.path}`,
      );
    }
  } finally {
    await app.close();
  }
}

async function bootstrap(): Promise<void> {
  const logger = new Logger("GridImageCli");

  try {
    await run(parseCliArgs(process.argv.slice(2)));
  } catch (error) {
    if (error instanceof CliUsageError) {
      logger.error(error.message);
      logger.error(CLI_USAGE);
    } else {
      logger.error(
        `❌ ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    process.exitCode = 1;
  }
}

void bootstrap();
