import fs from "node:fs";
import path from "node:path";

import type { BotState, OpenTrade } from "@pipwatch/shared";
import { BotStateSchema, DECISION_LIMIT, TRADE_HISTORY_LIMIT, defaultBotState } from "@pipwatch/shared";

import { StateCorruptionError, errorMessage } from "../errors/trading-errors";
import type { AppLogger } from "../logging/pino-logger";
import { atomicWriteFile } from "./atomic-write";

export const STATE_FILE_NAME = "state.json";

/**
 * Durable BotState in a single JSON file.
 * Writes go through a temp file and a rename, so a crash leaves either the old or the new document.
 */
export class StateStore {
  constructor(
    readonly filePath: string,
    private readonly logger: AppLogger
  ) {}

  static inDataDir(dataDir: string, logger: AppLogger): StateStore {
    return new StateStore(path.join(dataDir, STATE_FILE_NAME), logger);
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /** Missing file is a first boot. Anything unreadable throws and the file is left as it is. */
  load(): BotState {
    if (!this.exists()) {
      this.logger.info({ path: this.filePath }, "No state file; starting empty");
      return defaultBotState();
    }

    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      throw new StateCorruptionError(`Cannot read ${this.filePath}: ${errorMessage(err)}`, this.filePath, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StateCorruptionError(`${this.filePath} is not valid JSON: ${errorMessage(err)}`, this.filePath, { cause: err });
    }

    const parsed = BotStateSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new StateCorruptionError(`${this.filePath} failed validation: ${issues}`, this.filePath, { cause: parsed.error });
    }
    return parsed.data;
  }

  save(state: BotState): BotState {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const next: BotState = {
      ...state,
      updatedAt: new Date().toISOString(),
      tradeHistory: state.tradeHistory.slice(0, TRADE_HISTORY_LIMIT),
      decisions: state.decisions.slice(0, DECISION_LIMIT)
    };
    atomicWriteFile(this.filePath, JSON.stringify(next, null, 2));
    return next;
  }
}

/**
 * Drops locally known trades the brokerage no longer reports open.
 * Remote trades unknown locally are left alone; they were not opened by this engine.
 */
export function reconcileOpenTrades(state: BotState, remoteIds: Iterable<string>): { state: BotState; dropped: OpenTrade[] } {
  const remote = new Set(remoteIds);
  const kept: Record<string, OpenTrade> = {};
  const dropped: OpenTrade[] = [];
  for (const [id, trade] of Object.entries(state.openTrades)) {
    if (remote.has(id)) kept[id] = trade;
    else dropped.push(trade);
  }
  return { state: { ...state, openTrades: kept }, dropped };
}
