import { Body, Controller, Get, HttpCode, Post, ServiceUnavailableException } from "@nestjs/common";
import type { Decision, OpenTrade } from "@pipwatch/shared";
import { TradeDirectionSchema } from "@pipwatch/shared";
import { z } from "zod";

import { parseBody } from "../http/parse-body";
import { BotEngineService, type BotStatus, type CommandResult } from "./bot-engine.service";
import { type TradeReport, formatTradeReport } from "./reports";

const ManualTradeBody = z
  .object({
    instrument: z.string().min(1).optional(),
    direction: TradeDirectionSchema.optional()
  })
  .strict();

type ReportResponse = TradeReport & { text: string };

@Controller("bot")
export class BotController {
  constructor(private readonly botEngine: BotEngineService) {}

  @Get("status")
  getStatus(): BotStatus {
    return this.botEngine.getStatus();
  }

  @Get("trades")
  getOpenTrades(): OpenTrade[] {
    return this.botEngine.getOpenTrades();
  }

  @Get("decisions")
  getDecisions(): Decision[] {
    return this.botEngine.getDecisions();
  }

  @Get("reports/daily")
  getDailyReport(): ReportResponse {
    const report = this.botEngine.dailyReport();
    return { ...report, text: formatTradeReport(report, this.botEngine.accountCurrency) };
  }

  @Get("reports/weekly")
  getWeeklyReport(): ReportResponse {
    const report = this.botEngine.weeklyReport();
    return { ...report, text: formatTradeReport(report, this.botEngine.accountCurrency) };
  }

  @Post("start")
  @HttpCode(200)
  async start(): Promise<CommandResult> {
    return orUnavailable(await this.botEngine.start());
  }

  @Post("stop")
  @HttpCode(200)
  async stop(): Promise<CommandResult> {
    return await this.botEngine.stop();
  }

  @Post("close-all")
  @HttpCode(200)
  async closeAll(): Promise<CommandResult> {
    return await this.botEngine.closeAll();
  }

  @Post("trade")
  @HttpCode(200)
  async trade(@Body() body: unknown): Promise<CommandResult> {
    const { instrument, direction } = parseBody(ManualTradeBody, body);
    return await this.botEngine.manualTrade(instrument, direction);
  }
}

function orUnavailable(result: CommandResult): CommandResult {
  if (!result.ok) throw new ServiceUnavailableException(result.message);
  return result;
}
