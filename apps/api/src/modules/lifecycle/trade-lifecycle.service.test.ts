import type { BotState, OpenTrade } from "@pipwatch/shared";
import { AppConfigSchema, defaultBotState } from "@pipwatch/shared";
import pino from "pino";
import { describe, expect, it } from "vitest";

import { FakeBrokerageGateway } from "../../testing/fake-brokerage-gateway";
import type { ConfigService } from "../config/config.service";
import { TransientGatewayError } from "../errors/trading-errors";
import { TradeLifecycleService } from "./trade-lifecycle.service";

const config = AppConfigSchema.parse({});
const now = new Date("2026-01-05T12:00:00.000Z");

function openTrade(overrides: Partial<OpenTrade> = {}): OpenTrade {
  return {
    id: "T1",
    instrument: "EUR_USD",
    direction: "long",
    entryPrice: 1.1,
    units: 1_000,
    stopLossPrice: 1.098,
    takeProfitPrice: 1.11,
    highWaterPrice: 1.104,
    openedAt: "2026-01-05T11:00:00.000Z",
    unrealizedPips: 40,
    lifecycle: "TRAILING_ARMED",
    closeFailures: 0,
    lastPrice: 1.104,
    confidence: 0.7,
    riskFraction: 0.02,
    manual: false,
    ...overrides
  };
}

function setup(trades: OpenTrade[]): { gateway: FakeBrokerageGateway; service: TradeLifecycleService; state: BotState } {
  const gateway = new FakeBrokerageGateway();
  for (const t of trades) {
    gateway.seedTrade(
      t.id,
      {
        instrument: t.instrument,
        direction: t.direction,
        units: t.units,
        stopLossPrice: t.stopLossPrice,
        takeProfitPrice: t.takeProfitPrice,
        precision: 5
      },
      t.entryPrice
    );
  }
  const service = new TradeLifecycleService(gateway, { load: () => config } as unknown as ConfigService, pino({ level: "silent" }));
  const state: BotState = {
    ...defaultBotState(),
    daily: { date: "2026-01-05", dayStartEquity: 10_000, realizedPnl: 0, tradesOpened: 1, tradesClosed: 0, wins: 0, losses: 0 },
    risk: { peakEquity: 10_000, consecutiveLosses: 2 },
    openTrades: Object.fromEntries(trades.map((t) => [t.id, t]))
  };
  return { gateway, service, state };
}

describe("TradeLifecycleService", () => {
  it("closes a trade on a trailing-stop retrace and books the win", async () => {
    const { gateway, service, state } = setup([openTrade()]);
    gateway.closePrices.set("T1", 1.1023);

    const { state: next, events } = await service.advance(state, new Map([["EUR_USD", 1.1023]]), now);

    expect(gateway.closedIds).toEqual(["T1"]);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "CLOSED", trade: { id: "T1", exitReason: "TRAILING_STOP", realizedPips: 23, realizedPnl: 2.3 } });
    expect(next.openTrades).toEqual({});
    expect(next.performance.EUR_USD).toMatchObject({ wins: 1, losses: 0, realizedPips: 23, confidenceWeight: 1.05 });
    expect(next.daily).toMatchObject({ tradesClosed: 1, wins: 1, realizedPnl: 2.3 });
    expect(next.risk.consecutiveLosses).toBe(0);
    expect(next.tradeHistory.map((t) => t.id)).toEqual(["T1"]);
  });

  it("keeps a trade whose close fails and escalates after three attempts", async () => {
    const { gateway, service, state } = setup([openTrade()]);
    gateway.closeFailures.push(new TransientGatewayError("a"), new TransientGatewayError("b"), new TransientGatewayError("c"));

    let current = state;
    const escalations: boolean[] = [];
    for (let i = 0; i < 3; i += 1) {
      const outcome = await service.advance(current, new Map([["EUR_USD", 1.1023]]), now);
      current = outcome.state;
      for (const event of outcome.events) {
        if (event.type === "CLOSE_FAILED") escalations.push(event.escalate);
      }
    }

    expect(escalations).toEqual([false, false, true]);
    expect(current.openTrades.T1).toMatchObject({ lifecycle: "TRAILING_ARMED", closeFailures: 3 });
    expect(current.tradeHistory).toEqual([]);
  });

  it("books trades the brokerage no longer lists as broker-closed losses", async () => {
    const { service, state } = setup([]);
    const withTrade: BotState = {
      ...state,
      openTrades: { T9: openTrade({ id: "T9", highWaterPrice: 1.1, lifecycle: "OPEN", unrealizedPips: -15, lastPrice: 1.0985 }) }
    };

    const { state: next, events } = await service.advance(withTrade, new Map(), now, new Set());

    expect(events[0]).toMatchObject({
      type: "CLOSED",
      trade: { id: "T9", exitReason: "BROKER_CLOSED", exitPrice: 1.0985, realizedPips: -15, realizedPnl: -1.5 }
    });
    expect(next.risk.consecutiveLosses).toBe(3);
    expect(next.performance.EUR_USD?.confidenceWeight).toBe(0.9);
    expect(next.daily?.losses).toBe(1);
  });

  it("leaves price exits alone when the instrument has no fresh price", async () => {
    const stale = openTrade({ highWaterPrice: 1.1, lifecycle: "OPEN", unrealizedPips: -25, lastPrice: 1.0975 });
    const { gateway, service, state } = setup([stale]);

    const { state: next, events } = await service.advance(state, new Map(), now);

    expect(events).toEqual([]);
    expect(gateway.closedIds).toEqual([]);
    expect(next.openTrades.T1).toEqual(stale);
  });

  it("still applies the time stop without a fresh price", async () => {
    const { gateway, service, state } = setup([
      openTrade({ openedAt: "2026-01-05T07:59:00.000Z", highWaterPrice: 1.1, lifecycle: "OPEN", unrealizedPips: -25, lastPrice: 1.0975 })
    ]);

    const { events } = await service.advance(state, new Map(), now);

    expect(gateway.closedIds).toEqual(["T1"]);
    expect(events[0]).toMatchObject({ type: "CLOSED", trade: { id: "T1", exitReason: "TIME_STOP" } });
  });

  it("closes everything on request", async () => {
    const { gateway, service, state } = setup([
      openTrade(),
      openTrade({ id: "T2", instrument: "USD_JPY", entryPrice: 150, stopLossPrice: 149.8, takeProfitPrice: 150.5, highWaterPrice: 150, lastPrice: 150 })
    ]);

    const { state: next, events } = await service.closeAll(state);

    expect(gateway.closedIds).toEqual(["T1", "T2"]);
    expect(events.map((e) => e.type === "CLOSED" && e.trade.exitReason)).toEqual(["MANUAL", "MANUAL"]);
    expect(next.openTrades).toEqual({});
  });
});
