import { z } from "zod";

export const CONFIG_VERSION = 1 as const;

export const BrokerageEnvironmentSchema = z.enum(["PRACTICE", "LIVE"]);
export type BrokerageEnvironment = z.infer<typeof BrokerageEnvironmentSchema>;

export const PerformanceAdjustmentSchema = z.enum(["MULTIPLICATIVE", "ADDITIVE", "OFF"]);
export type PerformanceAdjustment = z.infer<typeof PerformanceAdjustmentSchema>;

export const CandleGranularitySchema = z.enum(["M1", "M5", "M15", "M30", "H1", "H4", "D"]);
export type CandleGranularity = z.infer<typeof CandleGranularitySchema>;

export const DEFAULT_INSTRUMENTS = ["EUR_USD", "USD_JPY", "GBP_USD", "USD_CHF", "AUD_USD", "USD_CAD", "NZD_USD"];

export const BrokerageSettingsSchema = z.object({
  environment: BrokerageEnvironmentSchema.default("PRACTICE"),
  apiToken: z.string().min(1).optional(),
  accountId: z.string().min(1).optional(),
  baseUrlOverride: z.string().url().optional(),
  timeoutMs: z.number().int().min(1_000).max(60_000).default(10_000)
});
export type BrokerageSettings = z.infer<typeof BrokerageSettingsSchema>;

export const TelegramSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  botToken: z.string().min(1).optional(),
  chatId: z.string().min(1).optional(),
  pollTimeoutSeconds: z.number().int().min(0).max(50).default(25)
});
export type TelegramSettings = z.infer<typeof TelegramSettingsSchema>;

export const ApiSettingsSchema = z.object({
  apiKey: z.string().min(16).optional(),
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(8148)
});
export type ApiSettings = z.infer<typeof ApiSettingsSchema>;

export const TradingSettingsSchema = z.object({
  instruments: z.array(z.string().regex(/^[A-Z]{3}_[A-Z]{3}$/)).min(1).default(DEFAULT_INSTRUMENTS),
  candleGranularity: CandleGranularitySchema.default("M5"),
  candleCount: z.number().int().min(10).max(5_000).default(120),
  scanIntervalMs: z.number().int().min(1_000).max(3_600_000).default(7_000),
  autoStart: z.boolean().default(true),
  maxNewTradesPerCycle: z.number().int().min(1).max(20).default(2),
  confidenceThreshold: z.number().min(0).max(1).default(0.5),
  maxOpenTrades: z.number().int().min(1).max(100).default(5),
  executionCooldownMs: z.number().int().min(0).max(3_600_000).default(6_000)
});
export type TradingSettings = z.infer<typeof TradingSettingsSchema>;

export const RiskSettingsSchema = z.object({
  maxDrawdownPct: z.number().gt(0).max(100).default(10),
  dailyLossLimitPct: z.number().gt(0).max(100).default(2),
  maxConsecutiveLosses: z.number().int().min(1).max(100).default(5),
  minRiskFraction: z.number().gt(0).max(0.5).default(0.01),
  maxRiskFraction: z.number().gt(0).max(0.5).default(0.03),
  minMarginForTrade: z.number().min(0).default(0)
});
export type RiskSettings = z.infer<typeof RiskSettingsSchema>;

export const SizingSettingsSchema = z.object({
  atrStopMultiplier: z.number().gt(0).max(10).default(1.5),
  minStopPips: z.number().gt(0).default(10),
  maxStopPips: z.number().gt(0).default(30),
  rewardRiskRatio: z.number().min(1.2).max(10).default(1.5),
  minUnits: z.number().int().min(1).default(1),
  unitIncrement: z.number().int().min(1).default(1),
  marginRate: z.number().gt(0).max(1).default(0.0333)
});
export type SizingSettings = z.infer<typeof SizingSettingsSchema>;

export const ScoringSettingsSchema = z.object({
  minHistory: z.number().int().min(2).default(50),
  fastPeriod: z.number().int().min(2).default(10),
  slowPeriod: z.number().int().min(3).default(30),
  bandPeriod: z.number().int().min(2).default(20),
  bandStdDev: z.number().gt(0).default(2),
  atrPeriod: z.number().int().min(2).default(14),
  volatilityGuardRatio: z.number().gt(1).default(1.5),
  supportResistanceLookback: z.number().int().min(5).default(20),
  performanceAdjustment: PerformanceAdjustmentSchema.default("MULTIPLICATIVE")
});
export type ScoringSettings = z.infer<typeof ScoringSettingsSchema>;

export const LifecycleSettingsSchema = z.object({
  trailingStopPips: z.number().gt(0).default(15),
  trailingArmPips: z.number().min(0).default(3),
  maxTradeDurationMinutes: z.number().int().min(1).default(240),
  maxLossPips: z.number().gt(0).default(30),
  closeFailureEscalation: z.number().int().min(1).default(3)
});
export type LifecycleSettings = z.infer<typeof LifecycleSettingsSchema>;

export const AppConfigSchema = z
  .object({
    version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
    brokerage: BrokerageSettingsSchema.default({}),
    telegram: TelegramSettingsSchema.default({}),
    api: ApiSettingsSchema.default({}),
    trading: TradingSettingsSchema.default({}),
    risk: RiskSettingsSchema.default({}),
    sizing: SizingSettingsSchema.default({}),
    scoring: ScoringSettingsSchema.default({}),
    lifecycle: LifecycleSettingsSchema.default({})
  })
  .superRefine((value, ctx) => {
    if (value.risk.minRiskFraction > value.risk.maxRiskFraction) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "risk.minRiskFraction must not exceed risk.maxRiskFraction",
        path: ["risk", "minRiskFraction"]
      });
    }
    if (value.sizing.minStopPips > value.sizing.maxStopPips) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "sizing.minStopPips must not exceed sizing.maxStopPips",
        path: ["sizing", "minStopPips"]
      });
    }
    if (value.scoring.fastPeriod >= value.scoring.slowPeriod) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "scoring.fastPeriod must be shorter than scoring.slowPeriod",
        path: ["scoring", "fastPeriod"]
      });
    }
    if (value.telegram.enabled && (!value.telegram.botToken || !value.telegram.chatId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "telegram.botToken and telegram.chatId are required when telegram.enabled=true",
        path: ["telegram", "enabled"]
      });
    }
  });
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

export function defaultAppConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

export function isBrokerageConfigured(config: AppConfig): boolean {
  return Boolean(config.brokerage.apiToken && config.brokerage.accountId);
}
