import type { AccountSnapshot, InstrumentMeta, InstrumentSignal, RiskSettings, SizingSettings, TradeDirection } from "@pipwatch/shared";
import { pipValuePerUnit, roundPrice } from "@pipwatch/shared";

export type SizingPolicy = SizingSettings & Pick<RiskSettings, "minRiskFraction" | "maxRiskFraction">;

export type TradePlan = {
  instrument: string;
  direction: TradeDirection;
  units: number;
  entryPrice: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  stopPips: number;
  takeProfitPips: number;
  riskFraction: number;
  riskAmount: number;
  marginRequired: number;
  precision: number;
};

export type SizingResult = { ok: true; plan: TradePlan } | { ok: false; reason: string };

// Absorbs binary noise such as 199999.99999999997 before flooring.
const FLOOR_EPSILON = 1e-9;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Margin in account currency. Units are base currency. */
export function marginRequiredFor(units: number, price: number, meta: InstrumentMeta, accountCurrency: string, marginRate: number): number {
  const notional = meta.baseCurrency === accountCurrency.trim().toUpperCase() ? units : units * price;
  return notional * marginRate;
}

export function sizePosition(
  signal: InstrumentSignal,
  riskFraction: number,
  account: AccountSnapshot,
  meta: InstrumentMeta,
  policy: SizingPolicy
): SizingResult {
  if (signal.direction === "none") {
    return { ok: false, reason: "Signal has no direction" };
  }
  const direction = signal.direction;
  const price = signal.lastPrice;
  if (!(price > 0)) {
    return { ok: false, reason: `No usable price for ${meta.instrument}` };
  }
  if (!(account.equity > 0)) {
    return { ok: false, reason: "Account equity is not positive" };
  }

  const fraction = clamp(Number.isFinite(riskFraction) ? riskFraction : 0, policy.minRiskFraction, policy.maxRiskFraction);
  const atrPips = signal.volatilityPips > 0 ? signal.volatilityPips : signal.volatility / meta.pipSize;
  const stopPips = Math.round(clamp(atrPips * policy.atrStopMultiplier, policy.minStopPips, policy.maxStopPips) * 10) / 10;

  const pipValue = pipValuePerUnit(meta, price, account.currency);
  if (!Number.isFinite(pipValue) || pipValue <= 0) {
    return { ok: false, reason: `Cannot value a pip of ${meta.instrument} in ${account.currency}` };
  }

  const riskAmount = account.equity * fraction;
  const increment = Math.max(policy.unitIncrement, meta.unitIncrement);
  const rawUnits = riskAmount / (stopPips * pipValue);
  const units = Math.floor(rawUnits / increment + FLOOR_EPSILON) * increment;
  const minUnits = Math.max(policy.minUnits, meta.minUnits);
  if (units < minUnits) {
    return { ok: false, reason: `Position of ${units} units below the ${minUnits} unit minimum` };
  }

  const takeProfitPips = Math.round(stopPips * policy.rewardRiskRatio * 10) / 10;
  const sign = direction === "long" ? 1 : -1;
  const stopLossPrice = roundPrice(price - sign * stopPips * meta.pipSize, meta.displayPrecision);
  const takeProfitPrice = roundPrice(price + sign * takeProfitPips * meta.pipSize, meta.displayPrecision);

  return {
    ok: true,
    plan: {
      instrument: meta.instrument,
      direction,
      units,
      entryPrice: price,
      stopLossPrice,
      takeProfitPrice,
      stopPips,
      takeProfitPips,
      riskFraction: fraction,
      riskAmount,
      marginRequired: marginRequiredFor(units, price, meta, account.currency, policy.marginRate),
      precision: meta.displayPrecision
    }
  };
}
