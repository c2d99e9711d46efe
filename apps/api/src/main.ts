import "reflect-metadata";

import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import type { AppConfig } from "@tradewarden/shared";
import { errorMessage } from "@tradewarden/shared";
import type { RequestHandler } from "express";
import { json } from "express";

import { AppModule } from "./modules/app.module";
import { ConfigService } from "./modules/config/config.service";
import { DecisionEngineService } from "./modules/engine/decision-engine.service";
import { createLogger } from "./modules/logging/pino-logger";

function loadConfigOrExit(configService: ConfigService): AppConfig {
  try {
    return configService.load();
  } catch (err) {
    console.error(`Refusing to start: ${errorMessage(err)}`);
    process.exit(1);
  }
}

async function bootstrap(): Promise<void> {
  const configService = new ConfigService();
  const config = loadConfigOrExit(configService);

  const logger = createLogger({ dataDir: configService.dataDir });

  const app = await NestFactory.create<NestExpressApplication>(AppModule.forRoot({ configService, logger }), {
    logger: false
  });
  app.enableShutdownHooks();

  app.use(json({ limit: "10mb" }));

  const pinoHttpModule = await import("pino-http");
  const pinoHttp = pinoHttpModule.default as unknown as (opts: unknown) => RequestHandler;
  app.use(pinoHttp({ logger }));

  app.useLogger({
    log: (message) => logger.info({ msg: message }),
    error: (message, trace) => logger.error({ msg: message, trace }),
    warn: (message) => logger.warn({ msg: message }),
    debug: (message) => logger.debug({ msg: message }),
    verbose: (message) => logger.trace({ msg: message })
  });

  if (process.env.ENGINE_AUTOSTART === "true") {
    app.get(DecisionEngineService).start();
  }

  const port = config.server.port;
  await app.listen(port, "0.0.0.0");

  logger.info({
    msg: "API listening",
    port,
    symbols: config.engine.symbols,
    executionMode: config.engine.executionMode,
    advisor: config.advisor.enabled ? config.advisor.model : "disabled"
  });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
