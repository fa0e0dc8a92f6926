import { describe, expect, it } from "vitest";
import { BotStateSchema, defaultBotState, type BotState } from "./bot-state";

function sampleState(): BotState {
  return {
    ...defaultBotState(),
    running: true,
    lastCycleAt: "2026-03-02T10:00:07.000Z",
    daily: {
      date: "2026-03-02",
      dayStartEquity: 10_000,
      realizedPnl: -12.5,
      tradesOpened: 2,
      tradesClosed: 1,
      wins: 0,
      losses: 1
    },
    risk: { peakEquity: 10_250, consecutiveLosses: 1 },
    openTrades: {
      "101": {
        id: "101",
        instrument: "EUR_USD",
        direction: "long",
        entryPrice: 1.1,
        units: 5_000,
        stopLossPrice: 1.098,
        takeProfitPrice: 1.103,
        highWaterPrice: 1.1012,
        openedAt: "2026-03-02T09:30:00.000Z",
        unrealizedPips: 8.4,
        lifecycle: "TRAILING_ARMED",
        closeFailures: 0,
        lastPrice: 1.10084,
        confidence: 0.72,
        riskFraction: 0.0188,
        manual: false
      }
    },
    performance: {
      GBP_USD: { wins: 3, losses: 1, realizedPips: 21.5, confidenceWeight: 1.05, lastTradeAt: "2026-03-02T08:00:00.000Z" }
    }
  };
}

describe("BotStateSchema", () => {
  it("reproduces the active trade set and performance map after a JSON round trip", () => {
    const state = sampleState();
    const reloaded = BotStateSchema.parse(JSON.parse(JSON.stringify(state)));

    expect(reloaded.openTrades).toEqual(state.openTrades);
    expect(reloaded.performance).toEqual(state.performance);
    expect(reloaded.risk).toEqual(state.risk);
    expect(reloaded.daily).toEqual(state.daily);
  });

  it("loads a minimal older document by filling defaults", () => {
    const reloaded = BotStateSchema.parse({ version: 1, updatedAt: "2026-03-01T00:00:00.000Z" });

    expect(reloaded.openTrades).toEqual({});
    expect(reloaded.performance).toEqual({});
    expect(reloaded.risk).toEqual({ peakEquity: 0, consecutiveLosses: 0 });
    expect(reloaded.running).toBe(false);
  });

  it("rejects a trade filed under a key that is not its id", () => {
    const state = sampleState();
    const trade = state.openTrades["101"];
    const broken = { ...state, openTrades: { "999": trade } };

    expect(BotStateSchema.safeParse(broken).success).toBe(false);
  });
});
