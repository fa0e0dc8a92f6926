import fs from "node:fs";
import path from "node:path";

import pino from "pino";

export const APP_LOGGER = Symbol("APP_LOGGER");

export type AppLogger = pino.Logger;

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function resolveDataDir(): string {
  return process.env.DATA_DIR ?? path.resolve(process.cwd(), "data");
}

export function createLogger(): AppLogger {
  const logDir = process.env.LOG_DIR ?? path.join(resolveDataDir(), "logs");
  ensureDir(logDir);

  const destination = pino.destination({
    dest: path.join(logDir, "engine.log"),
    sync: false
  });

  return pino(
    {
      level: process.env.LOG_LEVEL ?? "info",
      base: undefined
    },
    pino.multistream([{ stream: process.stdout }, { stream: destination }])
  );
}
