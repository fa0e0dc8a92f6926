import type { ClosedTrade, ExitReason, InstrumentMeta, LifecycleSettings, OpenTrade } from "@pipwatch/shared";
import { priceToPips, roundPrice } from "@pipwatch/shared";

export type PriceScale = Pick<InstrumentMeta, "pipSize" | "displayPrecision">;

export type CloseFill = {
  price: number;
  realizedPnl: number;
  time: string;
};

/** Signed pips from entry to `price`, positive when the trade is in profit. */
export function pipsInFavour(trade: Pick<OpenTrade, "direction" | "entryPrice">, price: number, pipSize: number): number {
  return trade.direction === "long" ? priceToPips(trade.entryPrice, price, pipSize) : priceToPips(price, trade.entryPrice, pipSize);
}

function isArmed(trade: OpenTrade, pipSize: number, policy: LifecycleSettings): boolean {
  return pipsInFavour(trade, trade.highWaterPrice, pipSize) >= policy.trailingArmPips;
}

/**
 * Applies a new price. The high-water mark only moves in the trade's favour,
 * and once armed the trailing stop stays armed.
 */
export function markToMarket(trade: OpenTrade, price: number, scale: PriceScale, policy: LifecycleSettings): OpenTrade {
  if (trade.lifecycle === "CLOSING" || trade.lifecycle === "CLOSED" || !(price > 0)) return trade;

  const highWaterPrice =
    trade.direction === "long" ? Math.max(trade.highWaterPrice, price) : Math.min(trade.highWaterPrice, price);
  const next: OpenTrade = {
    ...trade,
    lastPrice: price,
    highWaterPrice,
    unrealizedPips: pipsInFavour(trade, price, scale.pipSize)
  };
  if (next.lifecycle === "OPEN" && isArmed(next, scale.pipSize, policy)) {
    next.lifecycle = "TRAILING_ARMED";
  }
  return next;
}

export function trailingStopLevel(trade: OpenTrade, scale: PriceScale, policy: LifecycleSettings): number | null {
  if (trade.lifecycle !== "TRAILING_ARMED") return null;
  const distance = policy.trailingStopPips * scale.pipSize;
  const level = trade.direction === "long" ? trade.highWaterPrice - distance : trade.highWaterPrice + distance;
  return roundPrice(level, scale.displayPrecision);
}

/** First exit condition that holds, checked in priority order; null keeps the trade open. */
export function evaluateExit(trade: OpenTrade, now: Date, scale: PriceScale, policy: LifecycleSettings): ExitReason | null {
  if (trade.lifecycle === "CLOSING" || trade.lifecycle === "CLOSED") return null;

  const price = trade.lastPrice;
  if (price !== undefined) {
    const long = trade.direction === "long";
    if (trade.unrealizedPips <= -policy.maxLossPips) return "MAX_LOSS";
    if (long ? price <= trade.stopLossPrice : price >= trade.stopLossPrice) return "STOP_LOSS";

    const trailing = trailingStopLevel(trade, scale, policy);
    if (trailing !== null && (long ? price <= trailing : price >= trailing)) return "TRAILING_STOP";

    if (long ? price >= trade.takeProfitPrice : price <= trade.takeProfitPrice) return "TAKE_PROFIT";
  }

  return timeStopReached(trade, now, policy) ? "TIME_STOP" : null;
}

/** Whether the trade has outlived `maxTradeDurationMinutes`. Needs no price. */
export function timeStopReached(trade: Pick<OpenTrade, "openedAt">, now: Date, policy: LifecycleSettings): boolean {
  const openedAtMs = Date.parse(trade.openedAt);
  return Number.isFinite(openedAtMs) && (now.getTime() - openedAtMs) / 60_000 > policy.maxTradeDurationMinutes;
}

export function beginClosing(trade: OpenTrade, reason: ExitReason): OpenTrade {
  return { ...trade, lifecycle: "CLOSING", exitReason: reason };
}

/** Returns the trade to its pre-close state with one more failure recorded. */
export function closeFailed(
  trade: OpenTrade,
  scale: PriceScale,
  policy: LifecycleSettings
): { trade: OpenTrade; escalate: boolean } {
  const closeFailures = trade.closeFailures + 1;
  const restored: OpenTrade = {
    ...trade,
    lifecycle: isArmed(trade, scale.pipSize, policy) ? "TRAILING_ARMED" : "OPEN",
    exitReason: undefined,
    closeFailures
  };
  return { trade: restored, escalate: closeFailures % policy.closeFailureEscalation === 0 };
}

export function confirmClosed(trade: OpenTrade, fill: CloseFill, reason: ExitReason, scale: PriceScale): ClosedTrade {
  return {
    id: trade.id,
    instrument: trade.instrument,
    direction: trade.direction,
    units: trade.units,
    entryPrice: trade.entryPrice,
    exitPrice: fill.price,
    realizedPips: pipsInFavour(trade, fill.price, scale.pipSize),
    realizedPnl: fill.realizedPnl,
    exitReason: reason,
    openedAt: trade.openedAt,
    closedAt: fill.time
  };
}
