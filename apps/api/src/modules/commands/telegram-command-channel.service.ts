import { Inject, Injectable, type OnApplicationBootstrap, type OnApplicationShutdown } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { errorMessage } from "../errors/trading-errors";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { NotifierService } from "../notifications/notifier.service";
import type { TelegramClient, TelegramUpdate } from "../notifications/telegram-client";
import { CommandRouter } from "./command-router";

const RETRY_DELAY_MS = 5_000;

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const t = setTimeout(done, ms);
    function done(): void {
      clearTimeout(t);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done);
  });
}

/**
 * Long-polls Telegram for operator commands. Only the configured chat is answered;
 * everything else is logged and dropped.
 */
@Injectable()
export class TelegramCommandChannel implements OnApplicationBootstrap, OnApplicationShutdown {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private offset = 0;

  constructor(
    private readonly router: CommandRouter,
    private readonly notifier: NotifierService,
    private readonly configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {}

  onApplicationBootstrap(): void {
    const target = this.notifier.telegram();
    if (!target) {
      this.logger.info("Telegram not configured; command channel disabled");
      return;
    }
    this.controller = new AbortController();
    this.loop = this.poll(target.client, target.chatId, this.controller.signal);
    this.logger.info({ chatId: target.chatId }, "Telegram command channel listening");
  }

  async onApplicationShutdown(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;
  }

  private async poll(client: TelegramClient, chatId: string, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let updates: TelegramUpdate[];
      try {
        updates = await client.getUpdates(this.offset, this.configService.load().telegram.pollTimeoutSeconds, signal);
      } catch (err) {
        if (signal.aborted) break;
        this.logger.warn({ err: errorMessage(err) }, "Telegram getUpdates failed");
        await delay(RETRY_DELAY_MS, signal);
        continue;
      }
      for (const update of updates) {
        this.offset = Math.max(this.offset, update.update_id + 1);
        await this.handleUpdate(client, chatId, update);
      }
    }
  }

  /** Answers one update; returns the reply sent, or null when the update was ignored. */
  async handleUpdate(client: TelegramClient, chatId: string, update: TelegramUpdate): Promise<string | null> {
    const message = update.message;
    if (!message?.text) return null;
    if (String(message.chat.id) !== chatId) {
      this.logger.warn({ chatId: message.chat.id }, "Command from unknown chat ignored");
      return null;
    }

    let reply: string;
    try {
      reply = await this.router.handle(message.text);
    } catch (err) {
      this.logger.error({ command: message.text, err: errorMessage(err) }, "Command failed");
      reply = `Command failed: ${errorMessage(err)}`;
    }

    try {
      await client.sendMessage(chatId, reply);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, "Telegram reply failed");
    }
    return reply;
  }
}
