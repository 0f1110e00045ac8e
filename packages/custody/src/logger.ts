/**
 * @custodia/custody — Logging.
 *
 * Structured JSON via pino; pretty-printed through pino-pretty when
 * requested in development.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export type LoggerConfig = Pick<AppConfig, "LOG_LEVEL" | "LOG_PRETTY" | "NODE_ENV">;

export function createLogger(config: LoggerConfig): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.LOG_PRETTY && config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Default for engines constructed without a logger. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
