import type { AccountSnapshot, RiskSettings } from "@pipwatch/shared";

export type RiskDecision = {
  allowed: boolean;
  maxRiskFraction: number;
  reason?: string;
};

const CONFIDENCE_FLOOR = 0.5;
const CONFIDENCE_CEIL = 1;

function denied(reason: string): RiskDecision {
  return { allowed: false, maxRiskFraction: 0, reason };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Decline of equity from its peak, as a fraction. 0 when equity is at or above the peak. */
export function drawdownFraction(account: Pick<AccountSnapshot, "equity" | "peakEquity">): number {
  const peak = Math.max(account.peakEquity, account.equity);
  if (!(peak > 0)) return 0;
  return Math.max(0, (peak - account.equity) / peak);
}

/** Linear map of confidence 0.5..1.0 onto the configured risk fraction range, clipped at both ends. */
export function riskFractionForConfidence(confidence: number, policy: Pick<RiskSettings, "minRiskFraction" | "maxRiskFraction">): number {
  const c = Number.isFinite(confidence) ? clamp(confidence, CONFIDENCE_FLOOR, CONFIDENCE_CEIL) : CONFIDENCE_FLOOR;
  const t = (c - CONFIDENCE_FLOOR) / (CONFIDENCE_CEIL - CONFIDENCE_FLOOR);
  return policy.minRiskFraction + t * (policy.maxRiskFraction - policy.minRiskFraction);
}

/**
 * Decides whether a new trade may open and at what risk fraction of equity.
 * `dailyLossSoFar` is today's realized loss; its sign is ignored.
 * `minPositionMargin` is the margin the smallest tradable position of the candidate
 * instrument needs. `policy.minMarginForTrade` is an extra floor on top of it.
 * Every failing check denies with a zero fraction.
 */
export function evaluateRisk(
  account: AccountSnapshot,
  dailyLossSoFar: number,
  consecutiveLosses: number,
  confidence: number,
  policy: RiskSettings,
  minPositionMargin?: number
): RiskDecision {
  if (!Number.isFinite(account.equity) || account.equity <= 0) {
    return denied("Account equity is not positive");
  }

  const drawdown = drawdownFraction(account);
  if (drawdown >= policy.maxDrawdownPct / 100) {
    return denied(`Drawdown ${(drawdown * 100).toFixed(2)}% reached the ${policy.maxDrawdownPct}% limit`);
  }

  const dayStart = account.dayStartEquity > 0 ? account.dayStartEquity : account.equity;
  const dailyLoss = Number.isFinite(dailyLossSoFar) ? Math.abs(dailyLossSoFar) : Number.POSITIVE_INFINITY;
  const dailyLimit = dayStart * (policy.dailyLossLimitPct / 100);
  if (dailyLoss >= dailyLimit) {
    return denied(`Daily loss ${dailyLoss.toFixed(2)} reached the ${policy.dailyLossLimitPct}% limit (${dailyLimit.toFixed(2)})`);
  }

  if (consecutiveLosses >= policy.maxConsecutiveLosses) {
    return denied(`${consecutiveLosses} consecutive losses (limit ${policy.maxConsecutiveLosses})`);
  }

  const requiredMargin = Math.max(policy.minMarginForTrade, minPositionMargin ?? 0);
  if (!(account.marginAvailable >= requiredMargin)) {
    return denied(`Available margin ${account.marginAvailable.toFixed(2)} below ${requiredMargin.toFixed(2)} required for the minimum position`);
  }

  return { allowed: true, maxRiskFraction: riskFractionForConfidence(confidence, policy) };
}
