import { Inject, Injectable } from "@nestjs/common";
import type { OpenTrade, TradeDirection } from "@pipwatch/shared";

import { ConfigService } from "../config/config.service";
import {
  ExecutionError,
  GatewayAuthError,
  RejectedOrderError,
  TransientGatewayError,
  errorMessage
} from "../errors/trading-errors";
import { BROKERAGE_GATEWAY, type BrokerageGateway, type OrderFill } from "../integrations/brokerage-gateway";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import type { TradePlan } from "../sizing/position-sizer";

export type ExecutionResult = { ok: true; trade: OpenTrade } | { ok: false; error: ExecutionError };

export type TradeContext = {
  confidence: number;
  manual?: boolean;
};

function gatewayFailure(err: unknown, action: string): ExecutionError {
  const message = `${action}: ${errorMessage(err)}`;
  if (err instanceof TransientGatewayError) return new ExecutionError("TRANSIENT", message, { status: err.status }, { cause: err });
  if (err instanceof GatewayAuthError) return new ExecutionError("AUTH", message, undefined, { cause: err });
  if (err instanceof RejectedOrderError) {
    return new ExecutionError("REJECTED", message, { status: err.status, rejectReason: err.rejectReason }, { cause: err });
  }
  return new ExecutionError("REJECTED", message, undefined, { cause: err });
}

/**
 * Turns a sized plan into a brokerage order. Does not touch BotState; the caller
 * records the returned trade.
 */
@Injectable()
export class TradeExecutorService {
  clock: () => number = Date.now;
  private lastExecutionAtMs: number | null = null;

  constructor(
    @Inject(BROKERAGE_GATEWAY) private readonly gateway: BrokerageGateway,
    private readonly configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {}

  cooldownRemainingMs(): number {
    if (this.lastExecutionAtMs === null) return 0;
    const cooldownMs = this.configService.load().trading.executionCooldownMs;
    return Math.max(0, this.lastExecutionAtMs + cooldownMs - this.clock());
  }

  async execute(plan: TradePlan, instrument: string, direction: TradeDirection, context: TradeContext): Promise<ExecutionResult> {
    const remainingMs = this.cooldownRemainingMs();
    if (remainingMs > 0) {
      return {
        ok: false,
        error: new ExecutionError("COOLDOWN", `Execution cooldown active for ${remainingMs}ms`, { remainingMs })
      };
    }

    let marginAvailable: number;
    try {
      marginAvailable = (await this.gateway.getAccountSnapshot()).marginAvailable;
    } catch (err) {
      return { ok: false, error: gatewayFailure(err, "Account refresh before order failed") };
    }
    if (marginAvailable < plan.marginRequired) {
      return {
        ok: false,
        error: new ExecutionError(
          "MARGIN",
          `Margin available ${marginAvailable.toFixed(2)} below ${plan.marginRequired.toFixed(2)} required for ${instrument}`,
          { marginAvailable, marginRequired: plan.marginRequired }
        )
      };
    }

    this.lastExecutionAtMs = this.clock();
    let fill: OrderFill;
    try {
      fill = await this.gateway.submitOrder({
        instrument,
        direction,
        units: plan.units,
        stopLossPrice: plan.stopLossPrice,
        takeProfitPrice: plan.takeProfitPrice,
        precision: plan.precision
      });
    } catch (err) {
      this.logger.warn({ instrument, direction, units: plan.units, err: errorMessage(err) }, "Order submission failed");
      return { ok: false, error: gatewayFailure(err, `Order for ${instrument} failed`) };
    }

    if (fill.filledUnits < fill.requestedUnits) {
      const details: Record<string, unknown> = {
        tradeId: fill.tradeId,
        filledUnits: fill.filledUnits,
        requestedUnits: fill.requestedUnits
      };
      try {
        await this.gateway.closeTrade(fill.tradeId);
        this.logger.warn(details, "Partial fill closed");
        return {
          ok: false,
          error: new ExecutionError("PARTIAL_FILL", `Partial fill on ${instrument} closed`, { ...details, orphaned: false })
        };
      } catch (err) {
        this.logger.error({ ...details, err: errorMessage(err) }, "Partial fill could not be closed");
        return {
          ok: false,
          error: new ExecutionError(
            "PARTIAL_FILL",
            `Partial fill on ${instrument} left trade ${fill.tradeId} open: ${errorMessage(err)}`,
            { ...details, orphaned: true },
            { cause: err }
          )
        };
      }
    }

    const trade: OpenTrade = {
      id: fill.tradeId,
      instrument,
      direction,
      entryPrice: fill.price,
      units: fill.filledUnits,
      stopLossPrice: plan.stopLossPrice,
      takeProfitPrice: plan.takeProfitPrice,
      highWaterPrice: fill.price,
      openedAt: fill.time,
      unrealizedPips: 0,
      lifecycle: "OPEN",
      closeFailures: 0,
      lastPrice: fill.price,
      confidence: context.confidence,
      riskFraction: plan.riskFraction,
      manual: context.manual ?? false
    };
    this.logger.info({ tradeId: trade.id, instrument, direction, units: trade.units, price: trade.entryPrice }, "Trade opened");
    return { ok: true, trade };
  }
}
