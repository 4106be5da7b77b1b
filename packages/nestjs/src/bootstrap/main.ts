import "reflect-metadata";
// eslint-disable-next-line simple-import-sort/imports
import otelSDK from "./tracing";

import { Logger, ValidationPipe } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";

import { AppModule } from "../app.module";

const logger = new Logger("Bootstrap");

async function bootstrap() {
  otelSDK.start();

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ["debug", "verbose", "log", "warn", "error"],
  });

  app.enableCors();
  app.useGlobalPipes(new ValidationPipe());

  // GET port from config
  const config = app.get(ConfigService);
  const port = config.getOrThrow<number>("PORT");

  const server = await app.listen(port, "0.0.0.0");
  const serverDetails = server.address();

  if (serverDetails && typeof serverDetails !== "string") {
    logger.log(
      `Listening on ${serverDetails.family} ${serverDetails.address}:${serverDetails.port}`,
    );
  }

  return app;
}

async function closeGracefully(signal: NodeJS.Signals) {
  logger.log(`Received signal to terminate: ${signal}`);

  try {
    const nestApp = await app;

    await Promise.all([nestApp.close(), otelSDK.shutdown()]);

    logger.log("Application and tracing closed gracefully");
    process.exit(0);
  } catch (error) {
    logger.error(
      "Error during graceful shutdown",
      error instanceof Error ? error.stack : String(error),
    );
    process.exit(1);
  }
}

process.on("SIGINT", (signal) => void closeGracefully(signal));
process.on("SIGTERM", (signal) => void closeGracefully(signal));

// Start the Application
const app = bootstrap();
void app.catch((error: unknown) => {
  logger.error(
    "Application failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
