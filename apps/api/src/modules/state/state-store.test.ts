import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { BotState, OpenTrade } from "@pipwatch/shared";
import { defaultBotState } from "@pipwatch/shared";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { StateCorruptionError } from "../errors/trading-errors";
import { StateStore, reconcileOpenTrades } from "./state-store";

function trade(id: string, instrument = "EUR_USD"): OpenTrade {
  return {
    id,
    instrument,
    direction: "long",
    entryPrice: 1.1,
    units: 1000,
    stopLossPrice: 1.098,
    takeProfitPrice: 1.103,
    highWaterPrice: 1.1012,
    openedAt: "2026-01-05T10:00:00.000Z",
    unrealizedPips: 12,
    lifecycle: "TRAILING_ARMED",
    closeFailures: 1,
    lastPrice: 1.1012,
    confidence: 0.72,
    riskFraction: 0.0188,
    manual: false
  };
}

describe("StateStore", () => {
  let dir: string;
  let store: StateStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "pipwatch-state-"));
    store = StateStore.inDataDir(dir, pino({ level: "silent" }));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts from an empty state when no file exists", () => {
    const state = store.load();
    expect(state.running).toBe(false);
    expect(state.openTrades).toEqual({});
    expect(fs.existsSync(store.filePath)).toBe(false);
  });

  it("round-trips open trades, performance and daily counters", () => {
    const state: BotState = {
      ...defaultBotState(),
      running: true,
      daily: {
        date: "2026-01-05",
        dayStartEquity: 10_000,
        realizedPnl: -42.5,
        tradesOpened: 3,
        tradesClosed: 2,
        wins: 1,
        losses: 1
      },
      risk: { peakEquity: 10_250, consecutiveLosses: 2 },
      openTrades: { "101": trade("101"), "102": trade("102", "USD_JPY") },
      performance: {
        EUR_USD: { wins: 3, losses: 1, realizedPips: 31.5, confidenceWeight: 1.05, lastTradeAt: "2026-01-05T09:00:00.000Z" }
      }
    };

    const saved = store.save(state);
    const loaded = store.load();

    expect(loaded).toEqual(saved);
    expect(loaded.openTrades["102"]?.instrument).toBe("USD_JPY");
    expect(fs.existsSync(`${store.filePath}.tmp`)).toBe(false);
  });

  it("throws on a corrupt file and leaves it untouched", () => {
    fs.writeFileSync(store.filePath, "{ not json", "utf-8");

    expect(() => store.load()).toThrow(StateCorruptionError);
    expect(fs.readFileSync(store.filePath, "utf-8")).toBe("{ not json");
  });

  it("rejects a document whose trade keys disagree with trade ids", () => {
    fs.writeFileSync(
      store.filePath,
      JSON.stringify({ ...defaultBotState(), openTrades: { "7": trade("8") } }),
      "utf-8"
    );

    expect(() => store.load()).toThrow(/failed validation: openTrades\.7\.id/);
  });

  it("caps decisions when saving", () => {
    const decisions = Array.from({ length: 205 }, (_, i) => ({
      id: `d${i}`,
      ts: "2026-01-05T10:00:00.000Z",
      kind: "CYCLE" as const,
      summary: `cycle ${i}`
    }));

    const saved = store.save({ ...defaultBotState(), decisions });
    expect(saved.decisions).toHaveLength(200);
    expect(saved.decisions[0]?.id).toBe("d0");
  });
});

describe("reconcileOpenTrades", () => {
  it("drops trades the brokerage no longer lists and keeps the rest", () => {
    const state: BotState = {
      ...defaultBotState(),
      openTrades: { a: trade("a"), b: trade("b", "GBP_USD"), c: trade("c", "USD_JPY") }
    };

    const result = reconcileOpenTrades(state, ["a", "c", "zzz"]);

    expect(Object.keys(result.state.openTrades).sort()).toEqual(["a", "c"]);
    expect(result.dropped.map((t) => t.id)).toEqual(["b"]);
    expect(Object.keys(state.openTrades)).toHaveLength(3);
  });

  it("handles an empty remote list without throwing", () => {
    const state: BotState = { ...defaultBotState(), openTrades: { a: trade("a") } };
    const result = reconcileOpenTrades(state, []);
    expect(result.state.openTrades).toEqual({});
    expect(result.dropped).toHaveLength(1);
  });
});
