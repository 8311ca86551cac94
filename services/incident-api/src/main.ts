import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import morgan from "morgan";

import { AppModule, createValidationPipe } from "./app.module.js";
import { APP_CONFIG } from "./tokens.js";
import type { AppConfig } from "./config.js";

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  app.use(morgan("tiny"));
  app.useGlobalPipes(createValidationPipe());

  const config = app.get<AppConfig>(APP_CONFIG);
  app.enableCors({ origin: config.corsOrigin });
  app.enableShutdownHooks();
  await app.listen(config.port);
  Logger.log(`Incident API listening on port ${config.port}`, "Bootstrap");
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Failed to bootstrap incident API", error);
    process.exitCode = 1;
  });
}
