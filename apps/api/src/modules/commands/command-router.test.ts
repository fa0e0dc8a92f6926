import type { OpenTrade } from "@pipwatch/shared";
import { describe, expect, it, vi } from "vitest";

import type { BotEngineService, BotStatus } from "../bot/bot-engine.service";
import { CommandRouter, HELP_TEXT, formatOpenTrades, formatStatus, parseCommand } from "./command-router";

const trade: OpenTrade = {
  id: "T1",
  instrument: "EUR_USD",
  direction: "long",
  entryPrice: 1.1,
  units: 1000,
  stopLossPrice: 1.098,
  takeProfitPrice: 1.103,
  highWaterPrice: 1.1012,
  openedAt: "2026-01-05T10:00:00.000Z",
  unrealizedPips: 12,
  lifecycle: "TRAILING_ARMED",
  closeFailures: 0,
  confidence: 0.7,
  riskFraction: 0.02,
  manual: false
};

describe("parseCommand", () => {
  it("accepts a leading slash and a bot mention", () => {
    expect(parseCommand("/status")).toEqual({ ok: true, command: { name: "status" } });
    expect(parseCommand("/Status@pip_bot")).toEqual({ ok: true, command: { name: "status" } });
    expect(parseCommand("  weeklyreport ")).toEqual({ ok: true, command: { name: "weeklyreport" } });
  });

  it("parses maketrade arguments in any order", () => {
    expect(parseCommand("maketrade eur_usd SHORT")).toEqual({
      ok: true,
      command: { name: "maketrade", instrument: "EUR_USD", direction: "short" }
    });
    expect(parseCommand("/maketrade long GBP/USD")).toEqual({
      ok: true,
      command: { name: "maketrade", instrument: "GBP_USD", direction: "long" }
    });
    expect(parseCommand("maketrade")).toEqual({ ok: true, command: { name: "maketrade" } });
  });

  it("rejects unknown commands and stray arguments", () => {
    expect(parseCommand("maketrade banana")).toEqual({
      ok: false,
      message: 'Unknown argument "banana". Usage: maketrade [INSTRUMENT] [long|short]'
    });
    expect(parseCommand("status now")).toEqual({ ok: false, message: "status takes no arguments" });
    expect(parseCommand("buy")).toEqual({ ok: false, message: 'Unknown command "buy". Send help for the list.' });
  });
});

describe("formatting", () => {
  it("lists open trades", () => {
    expect(formatOpenTrades([])).toBe("No open trades");
    expect(formatOpenTrades([trade])).toBe("T1 LONG 1000 EUR_USD @ 1.1 SL 1.098 TP 1.103 (+12.0 pips, TRAILING_ARMED)");
  });

  it("renders the status summary", () => {
    const status: BotStatus = {
      running: true,
      fatalError: null,
      reconciled: true,
      haltReason: "Daily loss 210.00 reached the 2% limit (200.00)",
      lastCycleAt: "2026-01-05T10:30:00.000Z",
      lastError: null,
      account: {
        currency: "USD",
        balance: 10_000,
        equity: 9_790,
        marginAvailable: 9_000,
        marginUsed: 0,
        realizedPnlToday: -210,
        dayStartEquity: 10_000,
        peakEquity: 10_000,
        consecutiveLosses: 2,
        fetchedAt: "2026-01-05T10:30:00.000Z"
      },
      openTrades: [],
      daily: { date: "2026-01-05", dayStartEquity: 10_000, realizedPnl: -210, tradesOpened: 3, tradesClosed: 3, wins: 1, losses: 2 },
      risk: { peakEquity: 10_000, consecutiveLosses: 2 },
      performance: {},
      signals: []
    };

    expect(formatStatus(status).split("\n")).toEqual([
      "Engine: running",
      "Equity: 9790.00 USD (day start 10000.00, peak 10000.00)",
      "Margin available: 9000.00 USD",
      "Open trades: 0",
      "Today: -210.00 realized, 1W/2L, 3 opened",
      "Consecutive losses: 2",
      "New trades halted: Daily loss 210.00 reached the 2% limit (200.00)",
      "Last cycle: 2026-01-05T10:30:00.000Z"
    ]);
  });
});

describe("CommandRouter", () => {
  function createRouter() {
    const engine = {
      manualTrade: vi.fn(async () => ({ ok: true, message: "Opened SHORT 5000 USD_JPY" })),
      closeAll: vi.fn(async () => ({ ok: true, message: "No open trades" })),
      stop: vi.fn(async () => ({ ok: true, message: "Engine stopped; 0 trade(s) remain open" })),
      getOpenTrades: vi.fn(() => [trade])
    };
    return { engine, router: new CommandRouter(engine as unknown as BotEngineService) };
  }

  it("routes maketrade with its arguments", async () => {
    const { engine, router } = createRouter();
    await expect(router.handle("/maketrade usd_jpy short")).resolves.toBe("Opened SHORT 5000 USD_JPY");
    expect(engine.manualTrade).toHaveBeenCalledWith("USD_JPY", "short");
  });

  it("answers with the engine's command result", async () => {
    const { engine, router } = createRouter();
    await expect(router.handle("stop")).resolves.toBe("Engine stopped; 0 trade(s) remain open");
    await expect(router.handle("opentrades")).resolves.toBe(formatOpenTrades([trade]));
    expect(engine.stop).toHaveBeenCalledTimes(1);
  });

  it("replies with help and parse errors without touching the engine", async () => {
    const { engine, router } = createRouter();
    await expect(router.handle("help")).resolves.toBe(HELP_TEXT);
    await expect(router.handle("closeall please")).resolves.toBe("closeall takes no arguments");
    expect(engine.closeAll).not.toHaveBeenCalled();
  });
});
