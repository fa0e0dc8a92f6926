import "reflect-metadata";

import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { json } from "express";
import pinoHttp from "pino-http";

import { AppModule } from "./modules/app.module";
import { ConfigService } from "./modules/config/config.service";
import { APP_LOGGER, type AppLogger } from "./modules/logging/pino-logger";
import { isLoopbackHost } from "./modules/security/api-key.guard";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: false
  });
  const logger = app.get<AppLogger>(APP_LOGGER);

  app.use(json({ limit: "1mb" }));
  app.use(pinoHttp({ logger }));

  app.useLogger({
    log: (message) => logger.info({ msg: message }),
    error: (message, trace) => logger.error({ msg: message, trace }),
    warn: (message) => logger.warn({ msg: message }),
    debug: (message) => logger.debug({ msg: message }),
    verbose: (message) => logger.trace({ msg: message })
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const migration = configService.migrateOnStartup();
  if (migration.migrated) {
    logger.info({ msg: "Config startup migration applied", reason: migration.reason });
  }
  const { api } = configService.load();

  await app.listen(api.port, api.host);

  logger.info({ msg: "API listening", host: api.host, port: api.port, authenticated: Boolean(api.apiKey) });
  if (!api.apiKey && !isLoopbackHost(api.host)) {
    logger.warn({ msg: "No API key configured; every route except /health is refused", host: api.host });
  }
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
