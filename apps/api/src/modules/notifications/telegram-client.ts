import { z } from "zod";

import { TransientGatewayError } from "../errors/trading-errors";

const TelegramEnvelope = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.unknown().optional()
});

const UpdatesSchema = z.array(
  z.object({
    update_id: z.number().int(),
    message: z
      .object({
        chat: z.object({ id: z.union([z.number(), z.string()]) }),
        text: z.string().optional()
      })
      .optional()
  })
);

export type TelegramUpdate = z.infer<typeof UpdatesSchema>[number];

export type TelegramClientOptions = {
  botToken: string;
  baseUrl?: string;
  timeoutMs?: number;
};

export class TelegramClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: TelegramClientOptions) {
    this.baseUrl = (options.baseUrl ?? "https://api.telegram.org").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const result = await this.call(
      "getUpdates",
      { offset, timeout: timeoutSeconds, allowed_updates: ["message"] },
      this.timeoutMs + timeoutSeconds * 1000,
      signal
    );
    return UpdatesSchema.parse(result);
  }

  async sendMessage(chatId: string, text: string): Promise<void> {
    await this.call("sendMessage", { chat_id: chatId, text, disable_web_page_preview: true }, this.timeoutMs);
  }

  private async call(method: string, body: Record<string, unknown>, timeoutMs: number, outer?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), timeoutMs);
    const onOuterAbort = (): void => controller.abort();
    outer?.addEventListener("abort", onOuterAbort);
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/bot${this.options.botToken}/${method}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal
      });
    } catch (err) {
      throw new TransientGatewayError(`Telegram ${method} failed: ${err instanceof Error ? err.message : String(err)}`, undefined, {
        cause: err
      });
    } finally {
      clearTimeout(t);
      outer?.removeEventListener("abort", onOuterAbort);
    }

    const envelope = TelegramEnvelope.safeParse(await res.json().catch(() => null));
    if (!res.ok || !envelope.success || !envelope.data.ok) {
      const description = envelope.success ? envelope.data.description : undefined;
      throw new TransientGatewayError(`Telegram ${method} HTTP ${res.status}: ${description ?? "unexpected response"}`, res.status);
    }
    return envelope.data.result;
  }
}
