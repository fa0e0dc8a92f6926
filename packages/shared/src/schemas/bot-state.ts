import { z } from "zod";

export const BOT_STATE_VERSION = 1 as const;

export const TradeDirectionSchema = z.enum(["long", "short"]);
export type TradeDirection = z.infer<typeof TradeDirectionSchema>;

export const TradeLifecycleSchema = z.enum(["OPEN", "TRAILING_ARMED", "CLOSING", "CLOSED"]);
export type TradeLifecycle = z.infer<typeof TradeLifecycleSchema>;

export const ExitReasonSchema = z.enum([
  "STOP_LOSS",
  "TRAILING_STOP",
  "TAKE_PROFIT",
  "TIME_STOP",
  "MAX_LOSS",
  "MANUAL",
  "BROKER_CLOSED"
]);
export type ExitReason = z.infer<typeof ExitReasonSchema>;

export const DecisionKindSchema = z.enum(["ENGINE", "CYCLE", "TRADE", "CLOSE", "SKIP", "RISK", "ERROR", "COMMAND"]);
export type DecisionKind = z.infer<typeof DecisionKindSchema>;

export const DecisionSchema = z.object({
  id: z.string().min(1),
  ts: z.string().min(1),
  kind: DecisionKindSchema,
  summary: z.string().min(1),
  details: z.record(z.unknown()).optional()
});
export type Decision = z.infer<typeof DecisionSchema>;

export const OpenTradeSchema = z.object({
  id: z.string().min(1),
  instrument: z.string().min(1),
  direction: TradeDirectionSchema,
  entryPrice: z.number().positive(),
  units: z.number().positive(),
  stopLossPrice: z.number().positive(),
  takeProfitPrice: z.number().positive(),
  highWaterPrice: z.number().positive(),
  openedAt: z.string().min(1),
  unrealizedPips: z.number().default(0),
  lifecycle: TradeLifecycleSchema.default("OPEN"),
  exitReason: ExitReasonSchema.optional(),
  closeFailures: z.number().int().min(0).default(0),
  lastPrice: z.number().positive().optional(),
  confidence: z.number().min(0).max(1).default(0),
  riskFraction: z.number().min(0).max(1).default(0),
  manual: z.boolean().default(false)
});
export type OpenTrade = z.infer<typeof OpenTradeSchema>;

export const ClosedTradeSchema = z.object({
  id: z.string().min(1),
  instrument: z.string().min(1),
  direction: TradeDirectionSchema,
  units: z.number().positive(),
  entryPrice: z.number().positive(),
  exitPrice: z.number().positive(),
  realizedPips: z.number(),
  realizedPnl: z.number(),
  exitReason: ExitReasonSchema,
  openedAt: z.string().min(1),
  closedAt: z.string().min(1)
});
export type ClosedTrade = z.infer<typeof ClosedTradeSchema>;

export const PerformanceRecordSchema = z.object({
  wins: z.number().int().min(0).default(0),
  losses: z.number().int().min(0).default(0),
  realizedPips: z.number().default(0),
  confidenceWeight: z.number().min(0).max(2).default(1),
  lastTradeAt: z.string().min(1).optional()
});
export type PerformanceRecord = z.infer<typeof PerformanceRecordSchema>;

export const DailyCountersSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  dayStartEquity: z.number().min(0),
  realizedPnl: z.number().default(0),
  tradesOpened: z.number().int().min(0).default(0),
  tradesClosed: z.number().int().min(0).default(0),
  wins: z.number().int().min(0).default(0),
  losses: z.number().int().min(0).default(0)
});
export type DailyCounters = z.infer<typeof DailyCountersSchema>;

export const RiskCountersSchema = z.object({
  peakEquity: z.number().min(0).default(0),
  consecutiveLosses: z.number().int().min(0).default(0),
  haltReason: z.string().min(1).optional()
});
export type RiskCounters = z.infer<typeof RiskCountersSchema>;

export const BotStateSchema = z
  .object({
    version: z.literal(BOT_STATE_VERSION),
    updatedAt: z.string().min(1),
    running: z.boolean().default(false),
    lastCycleAt: z.string().min(1).optional(),
    lastError: z.string().optional(),
    daily: DailyCountersSchema.optional(),
    risk: RiskCountersSchema.default({}),
    openTrades: z.record(OpenTradeSchema).default({}),
    performance: z.record(PerformanceRecordSchema).default({}),
    tradeHistory: z.array(ClosedTradeSchema).default([]),
    decisions: z.array(DecisionSchema).default([])
  })
  .superRefine((value, ctx) => {
    for (const [key, trade] of Object.entries(value.openTrades)) {
      if (trade.id !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `open trade keyed ${key} carries id ${trade.id}`,
          path: ["openTrades", key, "id"]
        });
      }
    }
  });
export type BotState = z.infer<typeof BotStateSchema>;

export const TRADE_HISTORY_LIMIT = 500;
export const DECISION_LIMIT = 200;

export function defaultBotState(): BotState {
  return {
    version: BOT_STATE_VERSION,
    updatedAt: new Date().toISOString(),
    running: false,
    risk: { peakEquity: 0, consecutiveLosses: 0 },
    openTrades: {},
    performance: {},
    tradeHistory: [],
    decisions: []
  };
}

export function defaultPerformanceRecord(): PerformanceRecord {
  return { wins: 0, losses: 0, realizedPips: 0, confidenceWeight: 1 };
}
