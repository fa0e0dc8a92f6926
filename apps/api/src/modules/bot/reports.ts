import type { ClosedTrade } from "@pipwatch/shared";

import { tradeOutcome } from "../lifecycle/performance";

export type ReportPeriod = "daily" | "weekly";

export type InstrumentReportLine = {
  instrument: string;
  trades: number;
  wins: number;
  realizedPips: number;
  realizedPnl: number;
};

export type TradeReport = {
  period: ReportPeriod;
  from: string;
  to: string;
  trades: number;
  wins: number;
  losses: number;
  winRate: number;
  realizedPips: number;
  realizedPnl: number;
  best?: ClosedTrade;
  worst?: ClosedTrade;
  byInstrument: InstrumentReportLine[];
};

function round(value: number, decimals: number): number {
  const pow = 10 ** decimals;
  return Math.round(value * pow) / pow;
}

export function reportWindow(period: ReportPeriod, now: Date): { from: Date; to: Date } {
  if (period === "daily") {
    return { from: new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())), to: now };
  }
  return { from: new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000), to: now };
}

export function buildTradeReport(history: ClosedTrade[], period: ReportPeriod, now: Date): TradeReport {
  const { from, to } = reportWindow(period, now);
  const trades = history.filter((t) => {
    const closedAtMs = Date.parse(t.closedAt);
    return closedAtMs >= from.getTime() && closedAtMs <= to.getTime();
  });

  const lines = new Map<string, InstrumentReportLine>();
  let wins = 0;
  let losses = 0;
  let realizedPips = 0;
  let realizedPnl = 0;
  let best: ClosedTrade | undefined;
  let worst: ClosedTrade | undefined;

  for (const t of trades) {
    const outcome = tradeOutcome(t);
    if (outcome === "WIN") wins += 1;
    else if (outcome === "LOSS") losses += 1;
    realizedPips += t.realizedPips;
    realizedPnl += t.realizedPnl;
    if (!best || t.realizedPnl > best.realizedPnl) best = t;
    if (!worst || t.realizedPnl < worst.realizedPnl) worst = t;

    const line = lines.get(t.instrument) ?? { instrument: t.instrument, trades: 0, wins: 0, realizedPips: 0, realizedPnl: 0 };
    line.trades += 1;
    line.wins += outcome === "WIN" ? 1 : 0;
    line.realizedPips = round(line.realizedPips + t.realizedPips, 1);
    line.realizedPnl = round(line.realizedPnl + t.realizedPnl, 2);
    lines.set(t.instrument, line);
  }

  return {
    period,
    from: from.toISOString(),
    to: to.toISOString(),
    trades: trades.length,
    wins,
    losses,
    winRate: trades.length > 0 ? round(wins / trades.length, 4) : 0,
    realizedPips: round(realizedPips, 1),
    realizedPnl: round(realizedPnl, 2),
    ...(best ? { best } : {}),
    ...(worst ? { worst } : {}),
    byInstrument: [...lines.values()].sort((a, b) => a.instrument.localeCompare(b.instrument))
  };
}

function signed(value: number, decimals: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(decimals)}`;
}

export function formatTradeReport(report: TradeReport, currency = "USD"): string {
  const title = report.period === "daily" ? "Daily report" : "Weekly report";
  if (report.trades === 0) {
    return `${title}: no closed trades since ${report.from.slice(0, 16).replace("T", " ")} UTC`;
  }

  const lines = [
    `${title} (${report.from.slice(0, 10)} to ${report.to.slice(0, 10)})`,
    `Trades: ${report.trades} (${report.wins}W/${report.losses}L, ${(report.winRate * 100).toFixed(0)}% win rate)`,
    `P&L: ${signed(report.realizedPnl, 2)} ${currency} (${signed(report.realizedPips, 1)} pips)`
  ];
  if (report.best) lines.push(`Best: ${report.best.instrument} ${signed(report.best.realizedPnl, 2)}`);
  if (report.worst) lines.push(`Worst: ${report.worst.instrument} ${signed(report.worst.realizedPnl, 2)}`);
  for (const line of report.byInstrument) {
    lines.push(`  ${line.instrument}: ${line.trades} trades, ${signed(line.realizedPips, 1)} pips, ${signed(line.realizedPnl, 2)}`);
  }
  return lines.join("\n");
}
