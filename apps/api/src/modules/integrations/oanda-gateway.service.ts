import { Inject, Injectable } from "@nestjs/common";
import { type Candle, type CandleGranularity, CandleSchema } from "@pipwatch/shared";
import { z } from "zod";

import { ConfigService } from "../config/config.service";
import { DataInsufficientError, GatewayAuthError, RejectedOrderError } from "../errors/trading-errors";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import type { BrokerageGateway, GatewayAccount, OrderFill, OrderRequest, TradeCloseFill } from "./brokerage-gateway";
import { resolveOandaBaseUrl } from "./oanda-base-url";
import { OandaClient } from "./oanda-client";
import { type RetryOptions, withRetry } from "./retry";

const Decimal = z.union([z.string(), z.number()]).pipe(z.coerce.number().finite());

const AccountSummaryResponse = z.object({
  account: z.object({
    currency: z.string(),
    balance: Decimal,
    NAV: Decimal,
    marginAvailable: Decimal,
    marginUsed: Decimal
  })
});

const CandlesResponse = z.object({
  candles: z.array(
    z.object({
      complete: z.boolean(),
      time: z.string(),
      volume: z.number().int().min(0).default(0),
      mid: z.object({ o: Decimal, h: Decimal, l: Decimal, c: Decimal }).optional()
    })
  )
});

const CancelTransaction = z.object({ reason: z.string().default("UNKNOWN") });

const OrderResponse = z.object({
  orderFillTransaction: z
    .object({
      time: z.string(),
      price: Decimal.optional(),
      tradeOpened: z.object({ tradeID: z.string(), units: Decimal, price: Decimal.optional() }).optional()
    })
    .optional(),
  orderCancelTransaction: CancelTransaction.optional()
});

const CloseResponse = z.object({
  orderFillTransaction: z
    .object({
      time: z.string(),
      price: Decimal.optional(),
      pl: Decimal.default(0)
    })
    .optional(),
  orderCancelTransaction: CancelTransaction.optional()
});

const OpenTradesResponse = z.object({
  trades: z.array(z.object({ id: z.string() }))
});

@Injectable()
export class OandaGatewayService implements BrokerageGateway {
  retryPolicy: RetryOptions = { attempts: 3, baseDelayMs: 250 };

  constructor(
    private readonly configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {}

  private getClient(): OandaClient {
    const config = this.configService.load();
    const { apiToken, accountId } = config.brokerage;
    if (!apiToken || !accountId) {
      throw new GatewayAuthError("OANDA API token and account id are not configured");
    }
    return new OandaClient({
      baseUrl: resolveOandaBaseUrl(config),
      apiToken,
      accountId,
      timeoutMs: config.brokerage.timeoutMs
    });
  }

  async getAccountSnapshot(): Promise<GatewayAccount> {
    const client = this.getClient();
    const raw = await withRetry(() => client.accountSummary(), this.retryPolicy);
    const { account } = AccountSummaryResponse.parse(raw);
    return {
      currency: account.currency,
      balance: account.balance,
      equity: account.NAV,
      marginAvailable: account.marginAvailable,
      marginUsed: account.marginUsed
    };
  }

  async getPriceHistory(instrument: string, lookback: number, granularity: CandleGranularity = "M5"): Promise<Candle[]> {
    const client = this.getClient();
    // One extra candle: the newest one is usually still forming.
    const raw = await withRetry(() => client.candles(instrument, granularity, lookback + 1), this.retryPolicy);
    const parsed = CandlesResponse.parse(raw);
    const candles: Candle[] = [];
    for (const c of parsed.candles) {
      if (!c.complete || !c.mid) continue;
      const candle = CandleSchema.safeParse({ time: c.time, open: c.mid.o, high: c.mid.h, low: c.mid.l, close: c.mid.c, volume: c.volume });
      if (!candle.success) {
        this.logger.warn({ instrument, time: c.time, issues: candle.error.issues.length }, "Malformed candle skipped");
        continue;
      }
      candles.push(candle.data);
    }
    if (candles.length === 0) {
      throw new DataInsufficientError(instrument, 0, lookback);
    }
    return candles.slice(-lookback);
  }

  async submitOrder(request: OrderRequest): Promise<OrderFill> {
    const client = this.getClient();
    const units = Math.trunc(request.units);
    const signedUnits = request.direction === "long" ? units : -units;
    const raw = await client.createOrder({
      type: "MARKET",
      instrument: request.instrument,
      units: String(signedUnits),
      timeInForce: "FOK",
      positionFill: "DEFAULT",
      stopLossOnFill: { price: request.stopLossPrice.toFixed(request.precision), timeInForce: "GTC" },
      takeProfitOnFill: { price: request.takeProfitPrice.toFixed(request.precision), timeInForce: "GTC" }
    });
    const parsed = OrderResponse.parse(raw);

    if (parsed.orderCancelTransaction) {
      const reason = parsed.orderCancelTransaction.reason;
      throw new RejectedOrderError(`Order for ${request.instrument} cancelled: ${reason}`, undefined, reason);
    }
    const fill = parsed.orderFillTransaction;
    const opened = fill?.tradeOpened;
    if (!fill || !opened) {
      throw new RejectedOrderError(`Order for ${request.instrument} opened no trade`);
    }

    const price = opened.price ?? fill.price;
    if (price === undefined) {
      throw new RejectedOrderError(`Order for ${request.instrument} filled without a price`);
    }

    this.logger.info({ instrument: request.instrument, tradeId: opened.tradeID, units: opened.units, price }, "OANDA order filled");
    return {
      tradeId: opened.tradeID,
      price,
      filledUnits: Math.abs(opened.units),
      requestedUnits: units,
      time: fill.time
    };
  }

  async closeTrade(tradeId: string): Promise<TradeCloseFill> {
    const client = this.getClient();
    const parsed = CloseResponse.parse(await client.closeTrade(tradeId));
    if (parsed.orderCancelTransaction) {
      const reason = parsed.orderCancelTransaction.reason;
      throw new RejectedOrderError(`Close of trade ${tradeId} cancelled: ${reason}`, undefined, reason);
    }
    const fill = parsed.orderFillTransaction;
    if (!fill || fill.price === undefined) {
      throw new RejectedOrderError(`Close of trade ${tradeId} returned no fill`);
    }
    return { tradeId, price: fill.price, realizedPnl: fill.pl, time: fill.time };
  }

  async listOpenTrades(): Promise<string[]> {
    const client = this.getClient();
    const raw = await withRetry(() => client.openTrades(), this.retryPolicy);
    return OpenTradesResponse.parse(raw).trades.map((t) => t.id);
  }

  async close(): Promise<void> {
    // fetch keeps no connection state of its own
  }
}
