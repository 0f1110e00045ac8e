/**
 * @custodia/custody — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { CustodyEngineOptions } from "./engine.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    LOG_PRETTY: z
      .string()
      .transform((v) => v === "true")
      .default("false"),

    // Listing
    HISTORY_PAGE_SIZE: z.coerce.number().int().min(1).default(50),
    HISTORY_PAGE_MAX: z.coerce.number().int().min(1).default(500),
  })
  .refine((c) => c.HISTORY_PAGE_SIZE <= c.HISTORY_PAGE_MAX, {
    message: "HISTORY_PAGE_SIZE must not exceed HISTORY_PAGE_MAX",
    path: ["HISTORY_PAGE_SIZE"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/** The config-driven part of an engine's options. */
export type ConfiguredEngineOptions = Pick<CustodyEngineOptions, "logger" | "pageSize" | "pageMax">;

export function engineOptionsFromConfig(
  config: AppConfig,
  logger?: Logger,
): ConfiguredEngineOptions {
  return {
    logger,
    pageSize: config.HISTORY_PAGE_SIZE,
    pageMax: config.HISTORY_PAGE_MAX,
  };
}
