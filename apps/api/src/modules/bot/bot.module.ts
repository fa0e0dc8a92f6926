import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";

import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { TradeExecutorService } from "../execution/trade-executor.service";
import { IntegrationsModule } from "../integrations/integrations.module";
import { TradeLifecycleService } from "../lifecycle/trade-lifecycle.service";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { NotificationsModule } from "../notifications/notifications.module";
import { ApiKeyGuard } from "../security/api-key.guard";
import { StateStore } from "../state/state-store";
import { BotController } from "./bot.controller";
import { BotEngineService } from "./bot-engine.service";

@Module({
  imports: [ConfigModule, IntegrationsModule, NotificationsModule],
  controllers: [BotController],
  providers: [
    BotEngineService,
    TradeExecutorService,
    TradeLifecycleService,
    {
      provide: StateStore,
      inject: [ConfigService, APP_LOGGER],
      useFactory: (configService: ConfigService, logger: AppLogger) => StateStore.inDataDir(configService.dataDir, logger)
    },
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard
    }
  ],
  exports: [BotEngineService]
})
export class BotModule {}
