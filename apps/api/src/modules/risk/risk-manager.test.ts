import type { AccountSnapshot } from "@pipwatch/shared";
import { defaultAppConfig, getInstrumentMeta } from "@pipwatch/shared";
import { describe, expect, it } from "vitest";

import { marginRequiredFor } from "../sizing/position-sizer";
import { drawdownFraction, evaluateRisk, riskFractionForConfidence } from "./risk-manager";

const policy = defaultAppConfig().risk;

function account(overrides: Partial<AccountSnapshot> = {}): AccountSnapshot {
  return {
    currency: "USD",
    balance: 10_000,
    equity: 10_000,
    marginAvailable: 9_000,
    marginUsed: 1_000,
    realizedPnlToday: 0,
    dayStartEquity: 10_000,
    peakEquity: 10_000,
    consecutiveLosses: 0,
    fetchedAt: "2026-01-05T10:00:00.000Z",
    ...overrides
  };
}

describe("evaluateRisk", () => {
  it("allows a healthy account and scales the fraction from confidence", () => {
    expect(evaluateRisk(account(), 0, 0, 0.5, policy)).toEqual({ allowed: true, maxRiskFraction: 0.01 });
    expect(evaluateRisk(account(), 0, 0, 1, policy).maxRiskFraction).toBeCloseTo(0.03, 12);
    expect(evaluateRisk(account(), 0, 0, 0.75, policy).maxRiskFraction).toBeCloseTo(0.02, 12);
  });

  it("halts at 10% drawdown regardless of other inputs", () => {
    for (const equity of [9_000, 8_500, 5_000]) {
      const decision = evaluateRisk(account({ equity, peakEquity: 10_000, dayStartEquity: equity }), 0, 0, 1, policy);
      expect(decision.allowed).toBe(false);
      expect(decision.maxRiskFraction).toBe(0);
    }
    expect(evaluateRisk(account({ equity: 9_001, peakEquity: 10_000 }), 0, 0, 1, policy).allowed).toBe(true);
  });

  it("halts on a 2.1% realized daily loss with no drawdown", () => {
    const decision = evaluateRisk(account(), -210, 0, 0.9, policy);
    expect(decision).toEqual({
      allowed: false,
      maxRiskFraction: 0,
      reason: "Daily loss 210.00 reached the 2% limit (200.00)"
    });
  });

  it("halts the sixth candidate after five consecutive losses", () => {
    expect(evaluateRisk(account(), 0, 4, 1, policy).allowed).toBe(true);
    const decision = evaluateRisk(account(), 0, 5, 1, policy);
    expect(decision.allowed).toBe(false);
    expect(decision.reason).toBe("5 consecutive losses (limit 5)");
  });

  it("fails closed on thin margin or non-positive equity", () => {
    expect(evaluateRisk(account({ marginAvailable: -1 }), 0, 0, 1, policy).allowed).toBe(false);
    expect(evaluateRisk(account({ marginAvailable: Number.NaN }), 0, 0, 1, policy).allowed).toBe(false);
    expect(evaluateRisk(account({ equity: 0 }), 0, 0, 1, policy).reason).toBe("Account equity is not positive");
    expect(evaluateRisk(account({ equity: Number.NaN }), 0, 0, 1, policy).allowed).toBe(false);
  });

  it("requires the margin of the instrument's minimum position", () => {
    // 1000 EUR_USD units at 1.1 with a 3.33% margin rate
    const meta = getInstrumentMeta("EUR_USD", { minUnits: 1_000 });
    const required = marginRequiredFor(meta.minUnits, 1.1, meta, "USD", 0.0333);
    expect(required).toBeCloseTo(36.63, 10);

    expect(evaluateRisk(account({ marginAvailable: 36.64 }), 0, 0, 1, policy, required).allowed).toBe(true);
    expect(evaluateRisk(account({ marginAvailable: 36.6 }), 0, 0, 1, policy, required)).toEqual({
      allowed: false,
      maxRiskFraction: 0,
      reason: "Available margin 36.60 below 36.63 required for the minimum position"
    });
  });

  it("applies the configured margin floor when it is higher", () => {
    const floored = { ...policy, minMarginForTrade: 50 };
    expect(evaluateRisk(account({ marginAvailable: 40 }), 0, 0, 1, floored, 36.63).reason).toBe(
      "Available margin 40.00 below 50.00 required for the minimum position"
    );
  });
});

describe("risk helpers", () => {
  it("measures drawdown against the higher of peak and equity", () => {
    expect(drawdownFraction({ equity: 9_500, peakEquity: 10_000 })).toBeCloseTo(0.05, 12);
    expect(drawdownFraction({ equity: 10_500, peakEquity: 10_000 })).toBe(0);
  });

  it("clips the risk fraction to the configured range", () => {
    expect(riskFractionForConfidence(0.2, policy)).toBe(0.01);
    expect(riskFractionForConfidence(1.4, policy)).toBeCloseTo(0.03, 12);
  });
});
