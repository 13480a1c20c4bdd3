import { describe, it, expect } from "vitest";
import { parseLogLevel, resolveLogConfig } from "./logger.js";
import type { PersistedConfig } from "./persisted-config.js";

describe("resolveLogConfig", () => {
  it("returns defaults when no config or env vars", () => {
    const result = resolveLogConfig(undefined, {});
    expect(result).toEqual({ level: "info", format: "pretty" });
  });

  it("uses config.json values over defaults", () => {
    const config: PersistedConfig = {
      log: {
        level: "debug",
        format: "json",
      },
    };
    const result = resolveLogConfig(config, {});
    expect(result).toEqual({ level: "debug", format: "json" });
  });

  it("uses env RELAY_EXCHANGE_LOG over config.json level", () => {
    const config: PersistedConfig = {
      log: {
        level: "debug",
        format: "json",
      },
    };
    const result = resolveLogConfig(config, { RELAY_EXCHANGE_LOG: "warn" });
    expect(result).toEqual({ level: "warn", format: "json" });
  });

  it("uses env RELAY_EXCHANGE_LOG_FORMAT over config.json format", () => {
    const config: PersistedConfig = {
      log: {
        level: "debug",
        format: "json",
      },
    };
    const result = resolveLogConfig(config, { RELAY_EXCHANGE_LOG_FORMAT: "pretty" });
    expect(result).toEqual({ level: "debug", format: "pretty" });
  });

  it("ignores env values it does not recognize", () => {
    const config: PersistedConfig = { log: { level: "error" } };
    const result = resolveLogConfig(config, {
      RELAY_EXCHANGE_LOG: "loud",
      RELAY_EXCHANGE_LOG_FORMAT: "xml",
    });
    expect(result).toEqual({ level: "error", format: "pretty" });
  });

  it("handles empty log object in config", () => {
    const result = resolveLogConfig({ log: {} }, {});
    expect(result).toEqual({ level: "info", format: "pretty" });
  });

  it("supports all log levels", () => {
    const levels = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

    for (const level of levels) {
      const result = resolveLogConfig(undefined, { RELAY_EXCHANGE_LOG: level.toUpperCase() });
      expect(result.level).toBe(level);
    }
  });
});

describe("parseLogLevel", () => {
  it("returns undefined for missing or unknown levels", () => {
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(" Warn ")).toBe("warn");
  });
});
