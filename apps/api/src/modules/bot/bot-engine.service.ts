import crypto from "node:crypto";

import { Inject, Injectable, type OnApplicationShutdown, type OnModuleInit } from "@nestjs/common";
import type {
  AccountSnapshot,
  AppConfig,
  BotState,
  Candle,
  Decision,
  InstrumentSignal,
  OpenTrade,
  TradeDirection
} from "@pipwatch/shared";
import { DECISION_LIMIT, defaultBotState, getInstrumentMeta, parseInstrument } from "@pipwatch/shared";

import { ConfigService } from "../config/config.service";
import { GatewayAuthError, StateCorruptionError, errorMessage } from "../errors/trading-errors";
import { TradeExecutorService } from "../execution/trade-executor.service";
import { BROKERAGE_GATEWAY, type BrokerageGateway, type GatewayAccount } from "../integrations/brokerage-gateway";
import type { LifecycleEvent } from "../lifecycle/trade-lifecycle.service";
import { TradeLifecycleService } from "../lifecycle/trade-lifecycle.service";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { NOTIFIER, type Notifier } from "../notifications/notifier";
import { evaluateRisk } from "../risk/risk-manager";
import { scoreInstrument } from "../scoring/instrument-scorer";
import { marginRequiredFor, sizePosition } from "../sizing/position-sizer";
import { StateStore, reconcileOpenTrades } from "../state/state-store";
import { type ReportPeriod, type TradeReport, buildTradeReport } from "./reports";
import { SerialQueue } from "./serial-queue";

export type CommandResult = { ok: boolean; message: string };

export type CycleOutcome =
  | { status: "skipped"; reason: string }
  | { status: "aborted"; reason: string }
  | { status: "completed"; opened: string[]; closed: string[]; signals: number };

export type BotStatus = {
  running: boolean;
  fatalError: string | null;
  reconciled: boolean;
  haltReason: string | null;
  lastCycleAt: string | null;
  lastError: string | null;
  account: AccountSnapshot | null;
  openTrades: OpenTrade[];
  daily: BotState["daily"] | null;
  risk: BotState["risk"];
  performance: BotState["performance"];
  signals: InstrumentSignal[];
};

function utcDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

function unique(items: string[]): string[] {
  return [...new Set(items)];
}

function describeTrade(trade: OpenTrade): string {
  return `${trade.direction.toUpperCase()} ${trade.units} ${trade.instrument} @ ${trade.entryPrice} (SL ${trade.stopLossPrice}, TP ${trade.takeProfitPrice})`;
}

/**
 * Trading cycle engine. Owns BotState; every mutation, whether from the scheduler
 * or an operator command, runs through one serial queue.
 */
@Injectable()
export class BotEngineService implements OnModuleInit, OnApplicationShutdown {
  clock: () => Date = () => new Date();

  private state: BotState;
  private readonly queue = new SerialQueue();
  private loopTimer: NodeJS.Timeout | null = null;
  private firstCycleTimer: NodeJS.Timeout | null = null;
  private reconciled = false;
  private stateCorrupt = false;
  private fatalError: string | null = null;
  private lastAccount: AccountSnapshot | null = null;
  private lastSignals: InstrumentSignal[] = [];

  constructor(
    private readonly configService: ConfigService,
    @Inject(BROKERAGE_GATEWAY) private readonly gateway: BrokerageGateway,
    private readonly executor: TradeExecutorService,
    private readonly lifecycle: TradeLifecycleService,
    private readonly store: StateStore,
    @Inject(NOTIFIER) private readonly notifier: Notifier,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {
    this.state = this.loadState();
  }

  async onModuleInit(): Promise<void> {
    if (this.stateCorrupt) {
      await this.notifier.notify(`State file is unreadable; trading is halted until it is repaired. ${this.fatalError ?? ""}`.trim());
      return;
    }
    const firstBoot = !this.store.exists();
    const autoStart = this.configService.load().trading.autoStart;
    if (this.state.running || (firstBoot && autoStart)) {
      await this.start();
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.clearTimers();
    await this.queue.idle();
    if (!this.stateCorrupt) {
      this.addDecision("ENGINE", `Shutdown${signal ? ` (${signal})` : ""}`);
      this.persist();
    }
    await this.gateway.close();
    this.logger.info({ signal }, "Engine shut down");
  }

  private loadState(): BotState {
    try {
      return this.store.load();
    } catch (err) {
      if (!(err instanceof StateCorruptionError)) throw err;
      this.stateCorrupt = true;
      this.fatalError = err.message;
      this.logger.error({ path: err.filePath, err: err.message }, "State file corrupt; trading halted");
      return { ...defaultBotState(), lastError: err.message };
    }
  }

  private persist(): void {
    if (this.stateCorrupt) return;
    this.state = this.store.save(this.state);
  }

  addDecision(kind: Decision["kind"], summary: string, details?: Record<string, unknown>): void {
    const decision: Decision = {
      id: crypto.randomUUID(),
      ts: this.clock().toISOString(),
      kind,
      summary,
      ...(details ? { details } : {})
    };
    this.state = { ...this.state, decisions: [decision, ...this.state.decisions].slice(0, DECISION_LIMIT) };
  }

  // ---- scheduler -------------------------------------------------------------------------

  private startTimers(): void {
    this.clearTimers();
    const intervalMs = this.configService.load().trading.scanIntervalMs;
    this.firstCycleTimer = setTimeout(() => this.scheduleCycle(), 250);
    this.loopTimer = setInterval(() => this.scheduleCycle(), intervalMs);
  }

  private clearTimers(): void {
    if (this.loopTimer) clearInterval(this.loopTimer);
    if (this.firstCycleTimer) clearTimeout(this.firstCycleTimer);
    this.loopTimer = null;
    this.firstCycleTimer = null;
  }

  private scheduleCycle(): void {
    // Something is already queued; the next tick will pick up from there.
    if (this.queue.size > 0) return;
    this.runCycle().catch((err: unknown) => {
      this.logger.error({ err: errorMessage(err) }, "Cycle crashed");
    });
  }

  /** Runs one scan through the serial queue. */
  runCycle(): Promise<CycleOutcome> {
    return this.queue.run(() => this.cycle());
  }

  private async cycle(): Promise<CycleOutcome> {
    if (this.stateCorrupt) return { status: "skipped", reason: "State file corrupt" };
    if (this.fatalError) return { status: "skipped", reason: this.fatalError };
    if (!this.state.running) return { status: "skipped", reason: "Engine stopped" };

    const config = this.configService.load();
    const now = this.clock();

    try {
      if (!this.reconciled) await this.reconcile();

      let gatewayAccount: GatewayAccount;
      try {
        gatewayAccount = await this.gateway.getAccountSnapshot();
      } catch (err) {
        if (err instanceof GatewayAuthError) throw err;
        const reason = `Account refresh failed: ${errorMessage(err)}`;
        this.state = { ...this.state, lastError: reason };
        this.addDecision("ERROR", reason);
        this.persist();
        await this.notifier.notify(`${reason}. Retrying next cycle.`);
        return { status: "aborted", reason };
      }

      const account = this.refreshAccount(gatewayAccount, now);
      const { candles, signals } = await this.scan(config);
      this.lastSignals = signals;
      if (signals.length === 0) {
        this.addDecision("CYCLE", "No instrument could be scored this cycle");
      }

      const closed = await this.advanceOpenTrades(candles, account, now);
      const opened = await this.openNewTrades(config, account, signals);

      this.state = { ...this.state, lastCycleAt: now.toISOString(), lastError: undefined };
      this.persist();
      return { status: "completed", opened, closed, signals: signals.length };
    } catch (err) {
      if (err instanceof GatewayAuthError) {
        await this.haltFatal(`Brokerage rejected the credentials: ${err.message}`);
        return { status: "aborted", reason: err.message };
      }
      const reason = `Cycle failed: ${errorMessage(err)}`;
      this.logger.error({ err: errorMessage(err) }, "Cycle failed");
      this.state = { ...this.state, lastError: reason };
      this.addDecision("ERROR", reason);
      this.persist();
      return { status: "aborted", reason };
    }
  }

  private async reconcile(): Promise<void> {
    let remoteIds: string[];
    try {
      remoteIds = await this.gateway.listOpenTrades();
    } catch (err) {
      if (err instanceof GatewayAuthError) throw err;
      this.logger.warn({ err: errorMessage(err) }, "Reconciliation failed; entries blocked");
      this.addDecision("ERROR", `Reconciliation failed: ${errorMessage(err)}`);
      return;
    }

    const { state, dropped } = reconcileOpenTrades(this.state, remoteIds);
    this.state = state;
    this.reconciled = true;
    if (dropped.length > 0) {
      const ids = dropped.map((t) => t.id);
      this.logger.warn({ dropped: ids }, "Dropped trades the brokerage no longer lists");
      this.addDecision("ENGINE", `Reconciled: dropped ${ids.length} stale trade(s)`, { dropped: ids });
      await this.notifier.notify(`Reconciliation dropped ${ids.length} trade(s) no longer open at the brokerage: ${ids.join(", ")}`);
    } else {
      this.addDecision("ENGINE", `Reconciled ${Object.keys(state.openTrades).length} open trade(s)`);
    }
    this.persist();
  }

  private refreshAccount(gatewayAccount: GatewayAccount, now: Date): AccountSnapshot {
    const today = utcDate(now);
    if (!this.state.daily || this.state.daily.date !== today) {
      const streak = this.state.risk.consecutiveLosses;
      if (streak > 0) {
        this.state = { ...this.state, risk: { ...this.state.risk, consecutiveLosses: 0 } };
        this.addDecision("RISK", `New trading day ${today}: loss streak of ${streak} reset`);
      }
      this.state = {
        ...this.state,
        daily: {
          date: today,
          dayStartEquity: gatewayAccount.equity,
          realizedPnl: 0,
          tradesOpened: 0,
          tradesClosed: 0,
          wins: 0,
          losses: 0
        }
      };
    }
    const peakEquity = Math.max(this.state.risk.peakEquity, gatewayAccount.equity);
    this.state = { ...this.state, risk: { ...this.state.risk, peakEquity } };

    const daily = this.state.daily;
    const account: AccountSnapshot = {
      ...gatewayAccount,
      realizedPnlToday: daily?.realizedPnl ?? 0,
      dayStartEquity: daily?.dayStartEquity ?? gatewayAccount.equity,
      peakEquity,
      consecutiveLosses: this.state.risk.consecutiveLosses,
      fetchedAt: now.toISOString()
    };
    this.lastAccount = account;
    return account;
  }

  private async scan(config: AppConfig): Promise<{ candles: Map<string, Candle[]>; signals: InstrumentSignal[] }> {
    const openInstruments = Object.values(this.state.openTrades).map((t) => t.instrument);
    const instruments = unique([...config.trading.instruments, ...openInstruments]);

    const results = await Promise.allSettled(
      instruments.map((instrument) =>
        this.gateway.getPriceHistory(instrument, config.trading.candleCount, config.trading.candleGranularity)
      )
    );

    const candles = new Map<string, Candle[]>();
    const signals: InstrumentSignal[] = [];
    results.forEach((result, i) => {
      const instrument = instruments[i];
      if (result.status === "rejected") {
        if (result.reason instanceof GatewayAuthError) throw result.reason;
        this.logger.warn({ instrument, err: errorMessage(result.reason) }, "Price history unavailable; instrument skipped");
        return;
      }
      candles.set(instrument, result.value);
      try {
        signals.push(scoreInstrument(instrument, result.value, config.scoring, this.state.performance[instrument]));
      } catch (err) {
        this.logger.warn({ instrument, err: errorMessage(err) }, "Scoring failed; instrument skipped");
      }
    });
    return { candles, signals };
  }

  private async advanceOpenTrades(candles: Map<string, Candle[]>, account: AccountSnapshot, now: Date): Promise<string[]> {
    if (Object.keys(this.state.openTrades).length === 0) return [];

    const prices = new Map<string, number>();
    for (const [instrument, series] of candles) {
      if (series.length > 0) prices.set(instrument, series[series.length - 1].close);
    }

    let remoteOpenIds: Set<string> | undefined;
    try {
      remoteOpenIds = new Set(await this.gateway.listOpenTrades());
    } catch (err) {
      if (err instanceof GatewayAuthError) throw err;
      this.logger.warn({ err: errorMessage(err) }, "Open trade listing failed; broker-side closes not checked this cycle");
    }

    const outcome = await this.lifecycle.advance(this.state, prices, now, remoteOpenIds, account.currency);
    this.state = outcome.state;
    return await this.handleLifecycleEvents(outcome.events);
  }

  private async handleLifecycleEvents(events: LifecycleEvent[]): Promise<string[]> {
    const closed: string[] = [];
    for (const event of events) {
      if (event.type === "CLOSED") {
        const t = event.trade;
        closed.push(t.id);
        const summary = `Closed ${t.instrument} ${t.direction} (${t.exitReason}): ${t.realizedPips >= 0 ? "+" : ""}${t.realizedPips} pips, P&L ${t.realizedPnl.toFixed(2)}`;
        this.addDecision("CLOSE", summary, { tradeId: t.id, exitPrice: t.exitPrice });
        this.persist();
        await this.notifier.notify(summary);
        continue;
      }
      this.addDecision("ERROR", `Close of ${event.instrument} trade ${event.tradeId} failed (${event.failures}x): ${event.error}`, {
        tradeId: event.tradeId,
        reason: event.reason
      });
      if (event.escalate) {
        await this.notifier.notify(
          `Trade ${event.tradeId} on ${event.instrument} failed to close ${event.failures} times (${event.reason}): ${event.error}. Manual attention needed.`
        );
      }
    }
    return closed;
  }

  /** Daily loss figure handed to the risk manager: today's realized P&L when negative, else 0. */
  private dailyLossSoFar(): number {
    return Math.min(0, this.state.daily?.realizedPnl ?? 0);
  }

  private async updateHaltState(account: AccountSnapshot, config: AppConfig): Promise<boolean> {
    const gate = evaluateRisk(account, this.dailyLossSoFar(), this.state.risk.consecutiveLosses, 1, config.risk);
    const previous = this.state.risk.haltReason;
    if (!gate.allowed) {
      const reason = gate.reason ?? "Risk limits reached";
      if (!previous) {
        this.state = { ...this.state, risk: { ...this.state.risk, haltReason: reason } };
        this.addDecision("RISK", `New trades halted: ${reason}`);
        await this.notifier.notify(`New trades halted: ${reason}`);
      }
      return false;
    }
    if (previous) {
      this.state = { ...this.state, risk: { ...this.state.risk, haltReason: undefined } };
      this.addDecision("RISK", "Risk limits clear; new trades allowed again");
      await this.notifier.notify("Risk limits clear; new trades allowed again");
    }
    return true;
  }

  /** Candidates in execution order: confidence descending, then instrument id ascending. */
  rankCandidates(signals: InstrumentSignal[], config: AppConfig): InstrumentSignal[] {
    const held = new Set(Object.values(this.state.openTrades).map((t) => t.instrument));
    return signals
      .filter((s) => s.direction !== "none" && s.confidence > config.trading.confidenceThreshold && !held.has(s.instrument))
      .sort((a, b) => b.confidence - a.confidence || a.instrument.localeCompare(b.instrument));
  }

  private async openNewTrades(config: AppConfig, account: AccountSnapshot, signals: InstrumentSignal[]): Promise<string[]> {
    if (!this.reconciled) {
      this.addDecision("SKIP", "Entries blocked until reconciliation succeeds");
      return [];
    }
    if (!(await this.updateHaltState(account, config))) return [];

    const opened: string[] = [];
    const candidates = this.rankCandidates(signals, config).slice(0, config.trading.maxNewTradesPerCycle);
    for (const signal of candidates) {
      if (Object.keys(this.state.openTrades).length >= config.trading.maxOpenTrades) {
        this.addDecision("SKIP", `Max open trades (${config.trading.maxOpenTrades}) reached`);
        break;
      }
      const trade = await this.tryOpen(signal, account, config, false);
      if (trade) opened.push(trade.id);
    }
    return opened;
  }

  private async tryOpen(signal: InstrumentSignal, account: AccountSnapshot, config: AppConfig, manual: boolean): Promise<OpenTrade | null> {
    if (signal.direction === "none") return null;

    const meta = getInstrumentMeta(signal.instrument, { minUnits: config.sizing.minUnits, unitIncrement: config.sizing.unitIncrement });
    const minPositionMargin = marginRequiredFor(meta.minUnits, signal.lastPrice, meta, account.currency, config.sizing.marginRate);
    const risk = evaluateRisk(
      account,
      this.dailyLossSoFar(),
      this.state.risk.consecutiveLosses,
      signal.confidence,
      config.risk,
      minPositionMargin
    );
    if (!risk.allowed) {
      this.addDecision("RISK", `${signal.instrument} blocked: ${risk.reason ?? "risk limits"}`);
      return null;
    }

    const sizing = sizePosition(signal, risk.maxRiskFraction, account, meta, { ...config.sizing, ...config.risk });
    if (!sizing.ok) {
      this.addDecision("SKIP", `${signal.instrument} not sized: ${sizing.reason}`);
      return null;
    }

    const result = await this.executor.execute(sizing.plan, signal.instrument, signal.direction, {
      confidence: signal.confidence,
      manual
    });
    if (!result.ok) {
      if (result.error.kind === "AUTH") throw new GatewayAuthError(result.error.message);
      const kind = result.error.kind === "COOLDOWN" || result.error.kind === "MARGIN" ? "SKIP" : "ERROR";
      this.addDecision(kind, `${signal.instrument} ${result.error.kind}: ${result.error.message}`, result.error.details);
      if (result.error.kind === "PARTIAL_FILL" && result.error.details?.orphaned === true) {
        await this.notifier.notify(`Partial fill could not be closed: ${result.error.message}`);
      }
      return null;
    }

    const trade = result.trade;
    const daily = this.state.daily ? { ...this.state.daily, tradesOpened: this.state.daily.tradesOpened + 1 } : this.state.daily;
    this.state = { ...this.state, daily, openTrades: { ...this.state.openTrades, [trade.id]: trade } };
    const summary = `Opened ${describeTrade(trade)}${manual ? " [manual]" : ""}, confidence ${signal.confidence.toFixed(2)}`;
    this.addDecision("TRADE", summary, { tradeId: trade.id, riskFraction: trade.riskFraction });
    this.persist();
    await this.notifier.notify(summary);
    return trade;
  }

  private async haltFatal(reason: string): Promise<void> {
    this.fatalError = reason;
    this.clearTimers();
    this.logger.error({ reason }, "Engine halted");
    this.state = { ...this.state, lastError: reason };
    this.addDecision("ERROR", reason);
    this.persist();
    await this.notifier.notify(`${reason}. Scheduler stopped; fix the credentials and send start.`);
  }

  // ---- operator commands -------------------------------------------------------------------

  start(): Promise<CommandResult> {
    return this.queue.run(async () => {
      if (this.stateCorrupt) {
        return { ok: false, message: `Cannot start: ${this.fatalError ?? "state file corrupt"}` };
      }
      if (this.loopTimer && !this.fatalError) return { ok: true, message: "Already running" };

      this.fatalError = null;
      this.state = { ...this.state, running: true, lastError: undefined };
      this.addDecision("ENGINE", "Start requested");
      this.persist();
      this.startTimers();
      this.logger.info("Engine started");
      return { ok: true, message: "Engine started" };
    });
  }

  /** Queued behind any in-flight cycle; open trades stay open. */
  stop(): Promise<CommandResult> {
    return this.queue.run(async () => {
      this.clearTimers();
      if (!this.state.running) return { ok: true, message: "Already stopped" };
      this.state = { ...this.state, running: false };
      this.addDecision("ENGINE", "Stop requested");
      this.persist();
      this.logger.info("Engine stopped");
      return { ok: true, message: `Engine stopped; ${Object.keys(this.state.openTrades).length} trade(s) remain open` };
    });
  }

  manualTrade(instrument?: string, direction?: TradeDirection): Promise<CommandResult> {
    return this.queue.run(async () => {
      if (this.stateCorrupt || this.fatalError) {
        return { ok: false, message: `Cannot trade: ${this.fatalError ?? "engine halted"}` };
      }
      if (!this.reconciled) {
        try {
          await this.reconcile();
        } catch (err) {
          return { ok: false, message: `Reconciliation failed: ${errorMessage(err)}` };
        }
        if (!this.reconciled) return { ok: false, message: "Reconciliation with the brokerage has not succeeded yet" };
      }

      const config = this.configService.load();
      const now = this.clock();
      let target: string;
      if (instrument) {
        try {
          const { base, quote } = parseInstrument(instrument);
          target = `${base}_${quote}`;
        } catch (err) {
          return { ok: false, message: errorMessage(err) };
        }
      } else {
        const best = this.rankCandidates(this.lastSignals, { ...config, trading: { ...config.trading, confidenceThreshold: 0 } })[0];
        if (!best) return { ok: false, message: "No instrument currently has a directional signal" };
        target = best.instrument;
      }
      if (Object.values(this.state.openTrades).some((t) => t.instrument === target)) {
        return { ok: false, message: `A trade on ${target} is already open` };
      }
      if (Object.keys(this.state.openTrades).length >= config.trading.maxOpenTrades) {
        return { ok: false, message: `Max open trades (${config.trading.maxOpenTrades}) reached` };
      }

      let account: AccountSnapshot;
      let signal: InstrumentSignal;
      try {
        account = this.refreshAccount(await this.gateway.getAccountSnapshot(), now);
        const candles = await this.gateway.getPriceHistory(target, config.trading.candleCount, config.trading.candleGranularity);
        signal = scoreInstrument(target, candles, config.scoring, this.state.performance[target]);
      } catch (err) {
        if (err instanceof GatewayAuthError) await this.haltFatal(`Brokerage rejected the credentials: ${err.message}`);
        return { ok: false, message: `Market data unavailable for ${target}: ${errorMessage(err)}` };
      }

      const chosen = direction ?? (signal.direction === "none" ? null : signal.direction);
      if (!chosen) {
        return { ok: false, message: `${target} has no directional signal (${signal.reason ?? "flat"}); give long or short` };
      }
      if (signal.volatility <= 0) {
        return { ok: false, message: `${target}: ${signal.reason ?? "no volatility estimate"}` };
      }

      this.addDecision("COMMAND", `Manual trade requested: ${target} ${chosen}`);
      const confidence = Math.max(signal.confidence, 0.5);
      let trade: OpenTrade | null;
      try {
        trade = await this.tryOpen({ ...signal, direction: chosen, confidence }, account, config, true);
      } catch (err) {
        if (err instanceof GatewayAuthError) {
          await this.haltFatal(`Brokerage rejected the credentials: ${err.message}`);
          return { ok: false, message: err.message };
        }
        throw err;
      } finally {
        this.persist();
      }
      if (!trade) {
        return { ok: false, message: this.state.decisions[0]?.summary ?? "Trade not opened" };
      }
      return { ok: true, message: `Opened ${describeTrade(trade)}` };
    });
  }

  closeAll(): Promise<CommandResult> {
    return this.queue.run(async () => {
      if (this.stateCorrupt) return { ok: false, message: "State file corrupt; nothing is tracked" };
      const count = Object.keys(this.state.openTrades).length;
      if (count === 0) return { ok: true, message: "No open trades" };

      this.addDecision("COMMAND", `Close all requested (${count} trade(s))`);
      let closed: string[];
      try {
        const outcome = await this.lifecycle.closeAll(this.state);
        this.state = outcome.state;
        closed = await this.handleLifecycleEvents(outcome.events);
      } catch (err) {
        if (err instanceof GatewayAuthError) {
          await this.haltFatal(`Brokerage rejected the credentials: ${err.message}`);
          return { ok: false, message: err.message };
        }
        throw err;
      } finally {
        this.persist();
      }
      const remaining = Object.keys(this.state.openTrades).length;
      return {
        ok: remaining === 0,
        message: remaining === 0 ? `Closed ${closed.length} trade(s)` : `Closed ${closed.length}; ${remaining} failed and will be retried`
      };
    });
  }

  // ---- read-only views -------------------------------------------------------------------

  getStatus(): BotStatus {
    const snapshot = structuredClone(this.state);
    return {
      running: snapshot.running && this.fatalError === null,
      fatalError: this.fatalError,
      reconciled: this.reconciled,
      haltReason: snapshot.risk.haltReason ?? null,
      lastCycleAt: snapshot.lastCycleAt ?? null,
      lastError: snapshot.lastError ?? null,
      account: this.lastAccount ? { ...this.lastAccount } : null,
      openTrades: Object.values(snapshot.openTrades),
      daily: snapshot.daily ?? null,
      risk: snapshot.risk,
      performance: snapshot.performance,
      signals: structuredClone(this.lastSignals)
    };
  }

  getOpenTrades(): OpenTrade[] {
    return structuredClone(Object.values(this.state.openTrades));
  }

  getDecisions(): Decision[] {
    return structuredClone(this.state.decisions);
  }

  report(period: ReportPeriod): TradeReport {
    return buildTradeReport(this.state.tradeHistory, period, this.clock());
  }

  dailyReport(): TradeReport {
    return this.report("daily");
  }

  weeklyReport(): TradeReport {
    return this.report("weekly");
  }

  get accountCurrency(): string {
    return this.lastAccount?.currency ?? "USD";
  }
}
