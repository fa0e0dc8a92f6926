import type { Candle, InstrumentSignal, PerformanceRecord, ScoringSettings, SignalComponents } from "@pipwatch/shared";
import { getPipSize } from "@pipwatch/shared";

import { atr, clampNumber, meanTrueRange, rollingHigh, rollingLow, sma, stdDev } from "./indicators";

function round(value: number, decimals: number): number {
  const pow = 10 ** decimals;
  return Math.round(value * pow) / pow;
}

function noSignal(instrument: string, lastPrice: number, reason: string, volatility = 0, pipSize = 1): InstrumentSignal {
  return {
    instrument,
    direction: "none",
    confidence: 0,
    volatility,
    volatilityPips: round(volatility / pipSize, 1),
    lastPrice,
    reason
  };
}

/** Applies the instrument's track record to a raw confidence, per the configured policy. */
export function applyPerformanceWeight(
  confidence: number,
  weight: number,
  mode: ScoringSettings["performanceAdjustment"]
): number {
  switch (mode) {
    case "MULTIPLICATIVE":
      return clampNumber(confidence * weight, 0, 1);
    case "ADDITIVE":
      return clampNumber(confidence + (weight - 1), 0, 1);
    case "OFF":
      return confidence;
  }
}

/**
 * Scores one instrument from its recent candles (oldest first).
 *
 * Momentum (fast/slow SMA gap in ATRs) picks the direction. A Bollinger z-score stretched
 * against that direction counts as a pullback and raises confidence; stretched with it lowers it.
 * Abnormal volatility and a nearby high/low scale confidence down.
 * Same input, same output.
 */
export function scoreInstrument(
  instrument: string,
  candles: Candle[],
  options: ScoringSettings,
  performance?: PerformanceRecord
): InstrumentSignal {
  const lastPrice = candles.length > 0 ? candles[candles.length - 1].close : 0;
  if (candles.length < options.minHistory) {
    return noSignal(instrument, lastPrice, `Insufficient history: ${candles.length} of ${options.minHistory} candles`);
  }

  const pipSize = getPipSize(instrument);
  const closes = candles.map((c) => c.close);
  const atrValue = atr(candles, options.atrPeriod);
  const fast = sma(closes, options.fastPeriod);
  const slow = sma(closes, options.slowPeriod);
  const mid = sma(closes, options.bandPeriod);
  const sd = stdDev(closes, options.bandPeriod);
  const avgRange = meanTrueRange(candles);

  if (atrValue === null || fast === null || slow === null || mid === null || sd === null || avgRange === null) {
    return noSignal(instrument, lastPrice, "Indicator window longer than history", 0, pipSize);
  }
  if (!(atrValue > 0)) {
    return noSignal(instrument, lastPrice, "Flat price series", 0, pipSize);
  }

  const gap = fast - slow;
  if (gap === 0) {
    return noSignal(instrument, lastPrice, "No momentum", atrValue, pipSize);
  }

  const sign = gap > 0 ? 1 : -1;
  const momentum = clampNumber(gap / atrValue, -1, 1);

  // Positive when price sits below the band middle, i.e. reversion would push it up.
  const z = sd > 0 ? (lastPrice - mid) / sd : 0;
  const meanReversion = clampNumber(-z / options.bandStdDev, -1, 1);
  const agreement = meanReversion * sign;

  const ratio = avgRange > 0 ? atrValue / avgRange : 1;
  const volatilityFactor = ratio > options.volatilityGuardRatio ? (options.volatilityGuardRatio / ratio) ** 2 : 1;

  const extreme = sign > 0 ? rollingHigh(candles, options.supportResistanceLookback) : rollingLow(candles, options.supportResistanceLookback);
  const roomAtr = extreme === null ? Number.POSITIVE_INFINITY : ((extreme - lastPrice) * sign) / atrValue;
  const supportResistance = roomAtr < 1 ? 0.5 + 0.5 * clampNumber(roomAtr, 0, 1) : 1;

  const base = (Math.abs(momentum) * (2 + agreement)) / 3;
  const raw = clampNumber(base * volatilityFactor * supportResistance, 0, 1);
  const performanceWeight = performance?.confidenceWeight ?? 1;
  const confidence = round(applyPerformanceWeight(raw, performanceWeight, options.performanceAdjustment), 4);

  const components: SignalComponents = {
    momentum: round(momentum, 4),
    meanReversion: round(meanReversion, 4),
    agreement: round(agreement, 4),
    volatilityFactor: round(volatilityFactor, 4),
    supportResistance: round(supportResistance, 4),
    performanceWeight
  };

  return {
    instrument,
    direction: sign > 0 ? "long" : "short",
    confidence,
    volatility: atrValue,
    volatilityPips: round(atrValue / pipSize, 1),
    lastPrice,
    components
  };
}
