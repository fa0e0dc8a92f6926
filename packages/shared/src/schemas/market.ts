import { z } from "zod";

import type { TradeDirection } from "./bot-state";

export type SignalDirection = TradeDirection | "none";

export const CandleSchema = z.object({
  time: z.string().min(1),
  open: z.number().positive(),
  high: z.number().positive(),
  low: z.number().positive(),
  close: z.number().positive(),
  volume: z.number().int().min(0).default(0)
});
export type Candle = z.infer<typeof CandleSchema>;

export type SignalComponents = {
  momentum: number;
  meanReversion: number;
  agreement: number;
  volatilityFactor: number;
  supportResistance: number;
  performanceWeight: number;
};

/** Output of the scorer for one instrument. Produced in process, never parsed. */
export type InstrumentSignal = {
  instrument: string;
  direction: SignalDirection;
  confidence: number;
  volatility: number;
  volatilityPips: number;
  lastPrice: number;
  components?: SignalComponents;
  reason?: string;
};

/** Brokerage account figures merged with the engine's day and risk counters. */
export type AccountSnapshot = {
  currency: string;
  balance: number;
  equity: number;
  marginAvailable: number;
  marginUsed: number;
  realizedPnlToday: number;
  dayStartEquity: number;
  peakEquity: number;
  consecutiveLosses: number;
  fetchedAt: string;
};
