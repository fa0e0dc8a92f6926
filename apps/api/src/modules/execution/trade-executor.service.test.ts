import { AppConfigSchema } from "@pipwatch/shared";
import pino from "pino";
import { describe, expect, it } from "vitest";

import { FakeBrokerageGateway } from "../../testing/fake-brokerage-gateway";
import type { ConfigService } from "../config/config.service";
import { RejectedOrderError, TransientGatewayError } from "../errors/trading-errors";
import type { TradePlan } from "../sizing/position-sizer";
import { TradeExecutorService } from "./trade-executor.service";

const config = AppConfigSchema.parse({});

function plan(overrides: Partial<TradePlan> = {}): TradePlan {
  return {
    instrument: "EUR_USD",
    direction: "long",
    units: 10_000,
    entryPrice: 1.1,
    stopLossPrice: 1.0985,
    takeProfitPrice: 1.10225,
    stopPips: 15,
    takeProfitPips: 22.5,
    riskFraction: 0.015,
    riskAmount: 150,
    marginRequired: 366.3,
    precision: 5,
    ...overrides
  };
}

function setup(): { gateway: FakeBrokerageGateway; executor: TradeExecutorService; now: { ms: number } } {
  const gateway = new FakeBrokerageGateway();
  gateway.candles.set("EUR_USD", [
    { time: "2026-01-05T09:55:00.000Z", open: 1.1, high: 1.1003, low: 1.0998, close: 1.1001, volume: 5 }
  ]);
  const executor = new TradeExecutorService(gateway, { load: () => config } as unknown as ConfigService, pino({ level: "silent" }));
  const now = { ms: 1_000_000 };
  executor.clock = () => now.ms;
  return { gateway, executor, now };
}

describe("TradeExecutorService", () => {
  it("opens a trade carrying the plan's protective prices", async () => {
    const { gateway, executor } = setup();

    const result = await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 });

    expect(result).toEqual({
      ok: true,
      trade: {
        id: "T1",
        instrument: "EUR_USD",
        direction: "long",
        entryPrice: 1.1001,
        units: 10_000,
        stopLossPrice: 1.0985,
        takeProfitPrice: 1.10225,
        highWaterPrice: 1.1001,
        openedAt: "2026-01-05T10:00:01.000Z",
        unrealizedPips: 0,
        lifecycle: "OPEN",
        closeFailures: 0,
        lastPrice: 1.1001,
        confidence: 0.7,
        riskFraction: 0.015,
        manual: false
      }
    });
    expect(gateway.submitted).toEqual([
      { instrument: "EUR_USD", direction: "long", units: 10_000, stopLossPrice: 1.0985, takeProfitPrice: 1.10225, precision: 5 }
    ]);
  });

  it("enforces the cooldown between executions", async () => {
    const { executor, now } = setup();

    expect((await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 })).ok).toBe(true);

    now.ms += 2_000;
    const blocked = await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 });
    expect(blocked.ok).toBe(false);
    if (!blocked.ok) {
      expect(blocked.error.kind).toBe("COOLDOWN");
      expect(blocked.error.details).toEqual({ remainingMs: 4_000 });
    }

    now.ms += 4_000;
    expect((await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 })).ok).toBe(true);
  });

  it("re-checks margin against a fresh account before submitting", async () => {
    const { gateway, executor } = setup();
    gateway.account = { ...gateway.account, marginAvailable: 100 };

    const result = await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("MARGIN");
    expect(gateway.accountCalls).toBe(1);
    expect(gateway.submitted).toHaveLength(0);
  });

  it("maps gateway failures to typed execution errors", async () => {
    const { gateway, executor, now } = setup();

    gateway.submitFailures.push(new TransientGatewayError("timed out"));
    const transient = await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 });
    if (transient.ok) throw new Error("expected failure");
    expect(transient.error.kind).toBe("TRANSIENT");

    now.ms += 10_000;
    gateway.submitFailures.push(new RejectedOrderError("cancelled", 400, "INSUFFICIENT_MARGIN"));
    const rejected = await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 });
    if (rejected.ok) throw new Error("expected failure");
    expect(rejected.error.kind).toBe("REJECTED");
    expect(rejected.error.details).toEqual({ status: 400, rejectReason: "INSUFFICIENT_MARGIN" });

    now.ms += 10_000;
    gateway.accountFailures.push(new TransientGatewayError("503"));
    const refresh = await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 });
    if (refresh.ok) throw new Error("expected failure");
    expect(refresh.error.kind).toBe("TRANSIENT");
    expect(gateway.submitted).toHaveLength(2);
  });

  it("closes a partial fill immediately", async () => {
    const { gateway, executor } = setup();
    gateway.fillRatio = 0.5;

    const result = await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 });

    if (result.ok) throw new Error("expected failure");
    expect(result.error.kind).toBe("PARTIAL_FILL");
    expect(result.error.details).toEqual({ tradeId: "T1", filledUnits: 5_000, requestedUnits: 10_000, orphaned: false });
    expect(gateway.closedIds).toEqual(["T1"]);
  });

  it("reports the orphaned trade when closing a partial fill fails", async () => {
    const { gateway, executor } = setup();
    gateway.fillRatio = 0.5;
    gateway.closeFailures.push(new TransientGatewayError("timed out"));

    const result = await executor.execute(plan(), "EUR_USD", "long", { confidence: 0.7 });

    if (result.ok) throw new Error("expected failure");
    expect(result.error.kind).toBe("PARTIAL_FILL");
    expect(result.error.details).toMatchObject({ tradeId: "T1", orphaned: true });
    expect(result.error.message).toBe("Partial fill on EUR_USD left trade T1 open: timed out");
  });
});
