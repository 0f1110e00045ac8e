/**
 * Tests for configuration loading.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { engineOptionsFromConfig, loadConfig } from "../src/config.js";
import { createLogger } from "../src/logger.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      NODE_ENV: "development",
      LOG_LEVEL: "info",
      LOG_PRETTY: false,
      HISTORY_PAGE_SIZE: 50,
      HISTORY_PAGE_MAX: 500,
    });
  });

  it("coerces environment strings", () => {
    const config = loadConfig({
      NODE_ENV: "test",
      LOG_LEVEL: "debug",
      LOG_PRETTY: "true",
      HISTORY_PAGE_SIZE: "20",
      HISTORY_PAGE_MAX: "40",
    });

    expect(config.LOG_PRETTY).toBe(true);
    expect(config.HISTORY_PAGE_SIZE).toBe(20);
    expect(config.HISTORY_PAGE_MAX).toBe(40);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
    expect(() => loadConfig({ HISTORY_PAGE_SIZE: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ HISTORY_PAGE_SIZE: "600" })).toThrow(/HISTORY_PAGE_MAX/);
  });
});

describe("engineOptionsFromConfig", () => {
  it("maps page settings and passes the logger through", () => {
    const config = loadConfig({ LOG_LEVEL: "silent", HISTORY_PAGE_SIZE: "5" });
    const logger = createLogger(config);
    const options = engineOptionsFromConfig(config, logger);

    expect(options).toEqual({ logger, pageSize: 5, pageMax: 500 });
    expect(logger.level).toBe("silent");
  });
});
