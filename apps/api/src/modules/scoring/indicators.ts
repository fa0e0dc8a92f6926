import type { Candle } from "@pipwatch/shared";

export function clampNumber(v: number, min: number, max: number): number {
  if (!Number.isFinite(v)) return min;
  if (v < min) return min;
  if (v > max) return max;
  return v;
}

export function sma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  let sum = 0;
  for (let i = values.length - period; i < values.length; i += 1) sum += values[i];
  return sum / period;
}

/** Population standard deviation of the last `period` values. */
export function stdDev(values: number[], period: number): number | null {
  const mean = sma(values, period);
  if (mean === null) return null;
  let sq = 0;
  for (let i = values.length - period; i < values.length; i += 1) {
    const d = values[i] - mean;
    sq += d * d;
  }
  return Math.sqrt(sq / period);
}

export function trueRanges(candles: Candle[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < candles.length; i += 1) {
    const { high, low } = candles[i];
    const prevClose = candles[i - 1].close;
    out.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
  }
  return out;
}

/** Wilder-smoothed average true range, in price units. */
export function atr(candles: Candle[], period = 14): number | null {
  const trs = trueRanges(candles);
  if (period <= 0 || trs.length < period) return null;
  let value = 0;
  for (let i = 0; i < period; i += 1) value += trs[i];
  value /= period;
  for (let i = period; i < trs.length; i += 1) {
    value = (value * (period - 1) + trs[i]) / period;
  }
  return value;
}

export function meanTrueRange(candles: Candle[]): number | null {
  const trs = trueRanges(candles);
  if (trs.length === 0) return null;
  return trs.reduce((acc, v) => acc + v, 0) / trs.length;
}

export function rollingHigh(candles: Candle[], lookback: number): number | null {
  if (candles.length === 0 || lookback <= 0) return null;
  return Math.max(...candles.slice(-lookback).map((c) => c.high));
}

export function rollingLow(candles: Candle[], lookback: number): number | null {
  if (candles.length === 0 || lookback <= 0) return null;
  return Math.min(...candles.slice(-lookback).map((c) => c.low));
}
