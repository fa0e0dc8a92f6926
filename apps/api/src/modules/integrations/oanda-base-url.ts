import type { AppConfig } from "@pipwatch/shared";

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

export function resolveOandaBaseUrl(config: AppConfig): string {
  const override = config.brokerage.baseUrlOverride?.trim();
  if (override) return normalizeBaseUrl(override);

  const env = (process.env.OANDA_BASE_URL ?? "").trim();
  if (env) return normalizeBaseUrl(env);

  return config.brokerage.environment === "LIVE" ? "https://api-fxtrade.oanda.com" : "https://api-fxpractice.oanda.com";
}
