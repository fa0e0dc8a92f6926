import type { BotState, ClosedTrade, PerformanceRecord } from "@pipwatch/shared";
import { TRADE_HISTORY_LIMIT, defaultPerformanceRecord } from "@pipwatch/shared";

export const WEIGHT_STEP_WIN = 0.05;
export const WEIGHT_STEP_LOSS = 0.1;
export const WEIGHT_MAX = 1.25;
export const WEIGHT_MIN = 0.5;

export type TradeOutcome = "WIN" | "LOSS" | "FLAT";

/** Broker P&L decides; pips only break a zero P&L. */
export function tradeOutcome(closed: Pick<ClosedTrade, "realizedPnl" | "realizedPips">): TradeOutcome {
  const value = closed.realizedPnl !== 0 ? closed.realizedPnl : closed.realizedPips;
  if (value > 0) return "WIN";
  if (value < 0) return "LOSS";
  return "FLAT";
}

function round(value: number, decimals: number): number {
  const pow = 10 ** decimals;
  return Math.round(value * pow) / pow;
}

export function updatePerformance(record: PerformanceRecord | undefined, closed: ClosedTrade): PerformanceRecord {
  const current = record ?? defaultPerformanceRecord();
  const outcome = tradeOutcome(closed);
  let confidenceWeight = current.confidenceWeight;
  if (outcome === "WIN") confidenceWeight = Math.min(WEIGHT_MAX, confidenceWeight + WEIGHT_STEP_WIN);
  if (outcome === "LOSS") confidenceWeight = Math.max(WEIGHT_MIN, confidenceWeight - WEIGHT_STEP_LOSS);

  return {
    wins: current.wins + (outcome === "WIN" ? 1 : 0),
    losses: current.losses + (outcome === "LOSS" ? 1 : 0),
    realizedPips: round(current.realizedPips + closed.realizedPips, 1),
    confidenceWeight: round(confidenceWeight, 4),
    lastTradeAt: closed.closedAt
  };
}

/** Removes the trade from the active set and books it into performance, daily and risk counters and history. */
export function applyClosedTrade(state: BotState, closed: ClosedTrade): BotState {
  const { [closed.id]: _removed, ...openTrades } = state.openTrades;
  const outcome = tradeOutcome(closed);

  const daily = state.daily
    ? {
        ...state.daily,
        realizedPnl: round(state.daily.realizedPnl + closed.realizedPnl, 2),
        tradesClosed: state.daily.tradesClosed + 1,
        wins: state.daily.wins + (outcome === "WIN" ? 1 : 0),
        losses: state.daily.losses + (outcome === "LOSS" ? 1 : 0)
      }
    : state.daily;

  const consecutiveLosses =
    outcome === "LOSS" ? state.risk.consecutiveLosses + 1 : outcome === "WIN" ? 0 : state.risk.consecutiveLosses;

  return {
    ...state,
    openTrades,
    daily,
    risk: { ...state.risk, consecutiveLosses },
    performance: { ...state.performance, [closed.instrument]: updatePerformance(state.performance[closed.instrument], closed) },
    tradeHistory: [closed, ...state.tradeHistory].slice(0, TRADE_HISTORY_LIMIT)
  };
}
