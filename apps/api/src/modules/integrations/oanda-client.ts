import { GatewayAuthError, RejectedOrderError, TransientGatewayError } from "../errors/trading-errors";

export type OandaClientOptions = {
  baseUrl: string;
  apiToken: string;
  accountId: string;
  timeoutMs?: number;
};

export type OandaHttpMethod = "GET" | "POST" | "PUT";

function extractErrorMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && "errorMessage" in parsed && typeof parsed.errorMessage === "string") {
      return parsed.errorMessage;
    }
  } catch {
    // not JSON; use the raw body
  }
  return text.slice(0, 250);
}

export class OandaClient {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly accountId: string;
  private readonly timeoutMs: number;

  constructor(options: OandaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiToken = options.apiToken;
    this.accountId = options.accountId;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async accountSummary(): Promise<unknown> {
    return await this.request(`/v3/accounts/${this.accountId}/summary`);
  }

  async candles(instrument: string, granularity: string, count: number): Promise<unknown> {
    return await this.request(`/v3/instruments/${instrument}/candles`, {
      query: { granularity, count, price: "M" }
    });
  }

  async createOrder(order: Record<string, unknown>): Promise<unknown> {
    return await this.request(`/v3/accounts/${this.accountId}/orders`, { method: "POST", body: { order } });
  }

  async closeTrade(tradeId: string): Promise<unknown> {
    return await this.request(`/v3/accounts/${this.accountId}/trades/${encodeURIComponent(tradeId)}/close`, {
      method: "PUT",
      body: { units: "ALL" }
    });
  }

  async openTrades(): Promise<unknown> {
    return await this.request(`/v3/accounts/${this.accountId}/openTrades`);
  }

  private async request(
    path: string,
    options?: {
      method?: OandaHttpMethod;
      query?: Record<string, string | number | undefined>;
      body?: unknown;
    }
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }

    const method: OandaHttpMethod = options?.method ?? "GET";
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          "Content-Type": "application/json",
          "Accept-Datetime-Format": "RFC3339"
        },
        ...(options?.body === undefined ? {} : { body: JSON.stringify(options.body) }),
        signal: controller.signal
      });
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : err instanceof Error ? err.message : String(err);
      throw new TransientGatewayError(`OANDA ${method} ${path} ${reason}`, undefined, { cause: err });
    } finally {
      clearTimeout(t);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      const message = `OANDA HTTP ${res.status}: ${extractErrorMessage(text)}`;
      if (res.status === 401) throw new GatewayAuthError(message);
      if (res.status === 429 || res.status >= 500) throw new TransientGatewayError(message, res.status);
      throw new RejectedOrderError(message, res.status);
    }

    return await res.json();
  }
}
