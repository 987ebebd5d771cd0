import { pino } from "pino";
import type { Logger } from "pino";

export const logger: Logger = pino({
  level: process.env["LOG_LEVEL"] ?? "info",
  base: { app: "minutes-bot" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** モジュール名を付与した子ロガーを作成 */
export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
