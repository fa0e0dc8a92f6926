import { Module } from "@nestjs/common";

import { BotModule } from "./bot/bot.module";
import { CommandsModule } from "./commands/commands.module";
import { ConfigPublicModule } from "./config/config.public.module";
import { HealthModule } from "./health/health.module";
import { LoggingModule } from "./logging/logging.module";

@Module({
  imports: [LoggingModule, HealthModule, ConfigPublicModule, BotModule, CommandsModule]
})
export class AppModule {}
