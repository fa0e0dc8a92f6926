import { Body, Controller, Get, Post, Put } from "@nestjs/common";
import type { AppConfig } from "@pipwatch/shared";
import {
  LifecycleSettingsSchema,
  RiskSettingsSchema,
  ScoringSettingsSchema,
  SizingSettingsSchema,
  TradingSettingsSchema,
  isBrokerageConfigured
} from "@pipwatch/shared";

import { parseBody } from "../http/parse-body";
import { ConfigService } from "./config.service";

type PublicConfigView = {
  brokerage: {
    environment: AppConfig["brokerage"]["environment"];
    configured: boolean;
    accountIdHint?: string;
  };
  telegram: { enabled: boolean; chatId?: string };
  api: { host: string; port: number; apiKeyHint?: string };
  trading: AppConfig["trading"];
  risk: AppConfig["risk"];
  sizing: AppConfig["sizing"];
  scoring: AppConfig["scoring"];
  lifecycle: AppConfig["lifecycle"];
};

@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get("public")
  getPublic(): PublicConfigView {
    const config = this.configService.load();
    return {
      brokerage: {
        environment: config.brokerage.environment,
        configured: isBrokerageConfigured(config),
        ...(config.brokerage.accountId ? { accountIdHint: config.brokerage.accountId.slice(-4) } : {})
      },
      telegram: {
        enabled: config.telegram.enabled,
        ...(config.telegram.chatId ? { chatId: config.telegram.chatId } : {})
      },
      api: {
        host: config.api.host,
        port: config.api.port,
        ...(config.api.apiKey ? { apiKeyHint: config.api.apiKey.slice(-6) } : {})
      },
      trading: config.trading,
      risk: config.risk,
      sizing: config.sizing,
      scoring: config.scoring,
      lifecycle: config.lifecycle
    };
  }

  @Put("trading")
  updateTrading(@Body() body: unknown): { ok: true } {
    this.configService.updateSection("trading", parseBody(TradingSettingsSchema.partial().strict(), body));
    return { ok: true };
  }

  @Put("risk")
  updateRisk(@Body() body: unknown): { ok: true } {
    this.configService.updateSection("risk", parseBody(RiskSettingsSchema.partial().strict(), body));
    return { ok: true };
  }

  @Put("sizing")
  updateSizing(@Body() body: unknown): { ok: true } {
    this.configService.updateSection("sizing", parseBody(SizingSettingsSchema.partial().strict(), body));
    return { ok: true };
  }

  @Put("scoring")
  updateScoring(@Body() body: unknown): { ok: true } {
    this.configService.updateSection("scoring", parseBody(ScoringSettingsSchema.partial().strict(), body));
    return { ok: true };
  }

  @Put("lifecycle")
  updateLifecycle(@Body() body: unknown): { ok: true } {
    this.configService.updateSection("lifecycle", parseBody(LifecycleSettingsSchema.partial().strict(), body));
    return { ok: true };
  }

  @Post("rotate-api-key")
  rotateApiKey(): { apiKey: string } {
    return { apiKey: this.configService.rotateApiKey() };
  }
}
