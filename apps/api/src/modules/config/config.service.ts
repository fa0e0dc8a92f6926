import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { BadRequestException, Injectable } from "@nestjs/common";
import type { AppConfig } from "@pipwatch/shared";
import { AppConfigSchema } from "@pipwatch/shared";
import { z } from "zod";

import { resolveDataDir } from "../logging/pino-logger";
import { atomicWriteFile } from "../state/atomic-write";

const SectionSchema = z.record(z.unknown());

type RawConfig = Record<string, unknown>;

function asSection(value: unknown): Record<string, unknown> {
  const parsed = SectionSchema.safeParse(value);
  return parsed.success ? { ...parsed.data } : {};
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Secrets and deployment knobs from the environment win over config.json.
 * The merged result is never written back to disk.
 */
export function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const brokerage = asSection(raw.brokerage);
  const telegram = asSection(raw.telegram);
  const api = asSection(raw.api);

  const apiToken = nonEmpty(env.OANDA_API_TOKEN);
  const accountId = nonEmpty(env.OANDA_ACCOUNT_ID);
  const environment = nonEmpty(env.OANDA_ENVIRONMENT)?.toUpperCase();
  if (apiToken) brokerage.apiToken = apiToken;
  if (accountId) brokerage.accountId = accountId;
  if (environment) brokerage.environment = environment;

  const botToken = nonEmpty(env.TELEGRAM_BOT_TOKEN);
  const chatId = nonEmpty(env.TELEGRAM_CHAT_ID);
  if (botToken) telegram.botToken = botToken;
  if (chatId) telegram.chatId = chatId;
  if (botToken && chatId && telegram.enabled === undefined) telegram.enabled = true;

  const apiKey = nonEmpty(env.API_KEY);
  if (apiKey) api.apiKey = apiKey;
  const port = nonEmpty(env.PORT);
  if (port) api.port = Number.parseInt(port, 10);

  return { ...raw, brokerage, telegram, api };
}

@Injectable()
export class ConfigService {
  private cachedConfig: AppConfig | null = null;
  private cachedMtimeMs: number | null = null;

  get dataDir(): string {
    return resolveDataDir();
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  private readFileConfig(): RawConfig {
    if (!fs.existsSync(this.configPath)) return {};
    const raw = fs.readFileSync(this.configPath, "utf-8");
    return SectionSchema.parse(JSON.parse(raw));
  }

  migrateOnStartup(): { migrated: boolean; reason: "not_initialized" | "up_to_date" | "normalized" } {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return { migrated: false, reason: "not_initialized" };
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    const normalized = AppConfigSchema.parse(JSON.parse(raw));
    const nextJson = JSON.stringify(normalized, null, 2);
    this.cachedConfig = null;
    if (raw.trim() === nextJson.trim()) {
      return { migrated: false, reason: "up_to_date" };
    }

    atomicWriteFile(this.configPath, nextJson);
    return { migrated: true, reason: "normalized" };
  }

  load(): AppConfig {
    const mtimeMs = fs.existsSync(this.configPath) ? fs.statSync(this.configPath).mtimeMs : -1;
    if (this.cachedConfig && this.cachedMtimeMs === mtimeMs) {
      return this.cachedConfig;
    }

    const parsed = AppConfigSchema.parse(applyEnvOverrides(this.readFileConfig()));
    this.cachedConfig = parsed;
    this.cachedMtimeMs = mtimeMs;
    return parsed;
  }

  private saveFileConfig(next: RawConfig): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.configPath, JSON.stringify(next, null, 2));
    this.cachedConfig = null;
  }

  updateSection(
    section: "trading" | "risk" | "sizing" | "scoring" | "lifecycle",
    patch: Record<string, unknown>
  ): AppConfig {
    const current = this.readFileConfig();
    const next: RawConfig = {
      ...current,
      [section]: { ...asSection(current[section]), ...patch }
    };

    const result = AppConfigSchema.safeParse(applyEnvOverrides(next));
    if (!result.success) {
      throw new BadRequestException(result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }

    this.saveFileConfig(next);
    return this.load();
  }

  rotateApiKey(): string {
    const current = this.readFileConfig();
    const apiKey = crypto.randomBytes(32).toString("hex");
    this.saveFileConfig({ ...current, api: { ...asSection(current.api), apiKey } });
    return apiKey;
  }
}
