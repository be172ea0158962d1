import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { HealthModule } from "./health/health.module";
import { GridModule } from "./grid/grid.module";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";

@Module({
  imports: [
    // Global config module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
    }),

    // Core modules
    HealthModule,

    // Feature modules
    GridModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
