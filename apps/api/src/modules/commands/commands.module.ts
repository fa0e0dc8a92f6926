import { Module } from "@nestjs/common";

import { BotModule } from "../bot/bot.module";
import { ConfigModule } from "../config/config.module";
import { NotificationsModule } from "../notifications/notifications.module";
import { CommandRouter } from "./command-router";
import { TelegramCommandChannel } from "./telegram-command-channel.service";

@Module({
  imports: [ConfigModule, NotificationsModule, BotModule],
  providers: [CommandRouter, TelegramCommandChannel]
})
export class CommandsModule {}
