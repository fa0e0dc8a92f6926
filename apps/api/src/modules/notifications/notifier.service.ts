import { Inject, Injectable } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { errorMessage } from "../errors/trading-errors";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import type { Notifier } from "./notifier";
import { TelegramClient } from "./telegram-client";

/** Sends notifications to the configured Telegram chat, or to the log when Telegram is off. */
@Injectable()
export class NotifierService implements Notifier {
  private client: { token: string; instance: TelegramClient } | null = null;

  constructor(
    private readonly configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {}

  telegram(): { client: TelegramClient; chatId: string } | null {
    const { telegram } = this.configService.load();
    if (!telegram.enabled || !telegram.botToken || !telegram.chatId) return null;
    if (!this.client || this.client.token !== telegram.botToken) {
      this.client = { token: telegram.botToken, instance: new TelegramClient({ botToken: telegram.botToken }) };
    }
    return { client: this.client.instance, chatId: telegram.chatId };
  }

  async notify(message: string): Promise<void> {
    const target = this.telegram();
    if (!target) {
      this.logger.info({ notification: message }, "Operator notification");
      return;
    }
    try {
      await target.client.sendMessage(target.chatId, message);
    } catch (err) {
      this.logger.warn({ notification: message, err: errorMessage(err) }, "Telegram notification failed");
    }
  }
}
