import { Injectable } from "@nestjs/common";
import type { OpenTrade, TradeDirection } from "@pipwatch/shared";
import { parseInstrument } from "@pipwatch/shared";

import { BotEngineService, type BotStatus } from "../bot/bot-engine.service";
import { formatTradeReport } from "../bot/reports";

export type OperatorCommand =
  | { name: "status" }
  | { name: "maketrade"; instrument?: string; direction?: TradeDirection }
  | { name: "closeall" }
  | { name: "stop" }
  | { name: "start" }
  | { name: "dailyreport" }
  | { name: "weeklyreport" }
  | { name: "opentrades" }
  | { name: "help" };

export type ParseResult = { ok: true; command: OperatorCommand } | { ok: false; message: string };

export const HELP_TEXT = [
  "Commands:",
  "status - engine, account and risk state",
  "maketrade [INSTRUMENT] [long|short] - open a trade now",
  "closeall - close every open trade",
  "stop / start - pause or resume scanning",
  "dailyreport / weeklyreport - closed trade summary",
  "opentrades - list open trades",
  "help - this list"
].join("\n");

/** Parses one chat line. A leading slash and a trailing @botname are accepted. */
export function parseCommand(text: string): ParseResult {
  const [head, ...args] = text.trim().split(/\s+/);
  const name = (head ?? "").replace(/^\//, "").replace(/@\S*$/, "").toLowerCase();

  if (name === "maketrade") {
    let instrument: string | undefined;
    let direction: TradeDirection | undefined;
    for (const arg of args) {
      const lower = arg.toLowerCase();
      if (lower === "long" || lower === "short") {
        direction = lower;
        continue;
      }
      try {
        const { base, quote } = parseInstrument(arg.replace("/", "_"));
        instrument = `${base}_${quote}`;
      } catch {
        return { ok: false, message: `Unknown argument "${arg}". Usage: maketrade [INSTRUMENT] [long|short]` };
      }
    }
    return { ok: true, command: { name: "maketrade", instrument, direction } };
  }

  switch (name) {
    case "status":
    case "closeall":
    case "stop":
    case "start":
    case "dailyreport":
    case "weeklyreport":
    case "opentrades":
    case "help":
      if (args.length > 0) return { ok: false, message: `${name} takes no arguments` };
      return { ok: true, command: { name } };
    default:
      return { ok: false, message: `Unknown command "${head ?? ""}". Send help for the list.` };
  }
}

function signed(value: number, digits: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(digits)}`;
}

export function formatStatus(status: BotStatus): string {
  const state = status.fatalError ? `halted (${status.fatalError})` : status.running ? "running" : "stopped";
  const lines = [`Engine: ${state}`];
  if (status.account) {
    const a = status.account;
    lines.push(`Equity: ${a.equity.toFixed(2)} ${a.currency} (day start ${a.dayStartEquity.toFixed(2)}, peak ${a.peakEquity.toFixed(2)})`);
    lines.push(`Margin available: ${a.marginAvailable.toFixed(2)} ${a.currency}`);
  }
  lines.push(`Open trades: ${status.openTrades.length}`);
  if (status.daily) {
    const d = status.daily;
    lines.push(`Today: ${signed(d.realizedPnl, 2)} realized, ${d.wins}W/${d.losses}L, ${d.tradesOpened} opened`);
  }
  lines.push(`Consecutive losses: ${status.risk.consecutiveLosses}`);
  if (status.haltReason) lines.push(`New trades halted: ${status.haltReason}`);
  if (!status.reconciled) lines.push("Not yet reconciled with the brokerage");
  if (status.lastCycleAt) lines.push(`Last cycle: ${status.lastCycleAt}`);
  if (status.lastError) lines.push(`Last error: ${status.lastError}`);
  return lines.join("\n");
}

export function formatOpenTrades(trades: OpenTrade[]): string {
  if (trades.length === 0) return "No open trades";
  return trades
    .map(
      (t) =>
        `${t.id} ${t.direction.toUpperCase()} ${t.units} ${t.instrument} @ ${t.entryPrice} SL ${t.stopLossPrice} TP ${t.takeProfitPrice} (${signed(t.unrealizedPips, 1)} pips, ${t.lifecycle})`
    )
    .join("\n");
}

/** Maps operator text to engine calls and renders the reply. */
@Injectable()
export class CommandRouter {
  constructor(private readonly engine: BotEngineService) {}

  async handle(text: string): Promise<string> {
    const parsed = parseCommand(text);
    if (!parsed.ok) return parsed.message;

    const command = parsed.command;
    switch (command.name) {
      case "status":
        return formatStatus(this.engine.getStatus());
      case "opentrades":
        return formatOpenTrades(this.engine.getOpenTrades());
      case "maketrade":
        return (await this.engine.manualTrade(command.instrument, command.direction)).message;
      case "closeall":
        return (await this.engine.closeAll()).message;
      case "stop":
        return (await this.engine.stop()).message;
      case "start":
        return (await this.engine.start()).message;
      case "dailyreport":
        return formatTradeReport(this.engine.dailyReport(), this.engine.accountCurrency);
      case "weeklyreport":
        return formatTradeReport(this.engine.weeklyReport(), this.engine.accountCurrency);
      case "help":
        return HELP_TEXT;
    }
  }
}
