import { Inject, Injectable } from "@nestjs/common";
import type { BotState, ClosedTrade, ExitReason, OpenTrade } from "@pipwatch/shared";
import { getInstrumentMeta, pipValuePerUnit } from "@pipwatch/shared";

import { ConfigService } from "../config/config.service";
import { GatewayAuthError, errorMessage } from "../errors/trading-errors";
import { BROKERAGE_GATEWAY, type BrokerageGateway } from "../integrations/brokerage-gateway";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { applyClosedTrade } from "./performance";
import { beginClosing, closeFailed, confirmClosed, evaluateExit, markToMarket, pipsInFavour, timeStopReached } from "./trade-lifecycle";

export type LifecycleEvent =
  | { type: "CLOSED"; trade: ClosedTrade }
  | {
      type: "CLOSE_FAILED";
      tradeId: string;
      instrument: string;
      reason: ExitReason;
      error: string;
      failures: number;
      escalate: boolean;
    };

export type LifecycleOutcome = {
  state: BotState;
  events: LifecycleEvent[];
};

/** Moves open trades through their exit state machine and submits the close orders. */
@Injectable()
export class TradeLifecycleService {
  constructor(
    @Inject(BROKERAGE_GATEWAY) private readonly gateway: BrokerageGateway,
    private readonly configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {}

  /**
   * Marks every open trade to `prices` and closes those whose exit condition holds.
   * When `remoteOpenIds` is given, trades missing from it were closed by the brokerage
   * (its own stop or target) and are booked at their last known price.
   */
  async advance(
    state: BotState,
    prices: ReadonlyMap<string, number>,
    now: Date,
    remoteOpenIds?: ReadonlySet<string>,
    accountCurrency = "USD"
  ): Promise<LifecycleOutcome> {
    const policy = this.configService.load().lifecycle;
    let next = state;
    const events: LifecycleEvent[] = [];

    for (const original of Object.values(state.openTrades)) {
      const meta = getInstrumentMeta(original.instrument);

      if (remoteOpenIds && !remoteOpenIds.has(original.id)) {
        const closed = this.bookBrokerClose(original, now, accountCurrency);
        this.logger.warn({ tradeId: original.id, instrument: original.instrument }, "Trade no longer open at the brokerage");
        next = applyClosedTrade(next, closed);
        events.push({ type: "CLOSED", trade: closed });
        continue;
      }

      const price = prices.get(original.instrument);
      let reason: ExitReason | null;
      let marked = original;
      if (price === undefined) {
        // No fresh price this cycle: the stored one is stale, so only the clock can close the trade.
        reason = timeStopReached(original, now, policy) ? "TIME_STOP" : null;
      } else {
        marked = markToMarket(original, price, meta, policy);
        next = { ...next, openTrades: { ...next.openTrades, [marked.id]: marked } };
        reason = evaluateExit(marked, now, meta, policy);
      }
      if (!reason) continue;

      const result = await this.close(next, marked, reason);
      next = result.state;
      events.push(...result.events);
    }

    return { state: next, events };
  }

  /** Closes every open trade with reason MANUAL. */
  async closeAll(state: BotState): Promise<LifecycleOutcome> {
    let next = state;
    const events: LifecycleEvent[] = [];
    for (const trade of Object.values(state.openTrades)) {
      const result = await this.close(next, trade, "MANUAL");
      next = result.state;
      events.push(...result.events);
    }
    return { state: next, events };
  }

  private async close(state: BotState, trade: OpenTrade, reason: ExitReason): Promise<LifecycleOutcome> {
    const policy = this.configService.load().lifecycle;
    const meta = getInstrumentMeta(trade.instrument);
    const closing = beginClosing(trade, reason);

    try {
      const fill = await this.gateway.closeTrade(trade.id);
      const closed = confirmClosed(closing, fill, reason, meta);
      this.logger.info(
        { tradeId: trade.id, instrument: trade.instrument, reason, pips: closed.realizedPips, pnl: closed.realizedPnl },
        "Trade closed"
      );
      return { state: applyClosedTrade(state, closed), events: [{ type: "CLOSED", trade: closed }] };
    } catch (err) {
      if (err instanceof GatewayAuthError) throw err;
      const failed = closeFailed(closing, meta, policy);
      this.logger.warn(
        { tradeId: trade.id, instrument: trade.instrument, reason, failures: failed.trade.closeFailures, err: errorMessage(err) },
        "Trade close failed"
      );
      return {
        state: { ...state, openTrades: { ...state.openTrades, [trade.id]: failed.trade } },
        events: [
          {
            type: "CLOSE_FAILED",
            tradeId: trade.id,
            instrument: trade.instrument,
            reason,
            error: errorMessage(err),
            failures: failed.trade.closeFailures,
            escalate: failed.escalate
          }
        ]
      };
    }
  }

  private bookBrokerClose(trade: OpenTrade, now: Date, accountCurrency: string): ClosedTrade {
    const meta = getInstrumentMeta(trade.instrument);
    const price = trade.lastPrice ?? trade.entryPrice;
    const pips = pipsInFavour(trade, price, meta.pipSize);
    const pipValue = pipValuePerUnit(meta, price, accountCurrency);
    const estimate = Number.isFinite(pipValue) ? Math.round(pips * pipValue * trade.units * 100) / 100 : 0;
    return confirmClosed(trade, { price, realizedPnl: estimate, time: now.toISOString() }, "BROKER_CLOSED", meta);
  }
}
