import pino from "pino";
import type { PersistedConfig } from "./persisted-config.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogFormat = "pretty" | "json";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];
const LOG_FORMATS: readonly LogFormat[] = ["pretty", "json"];

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
}

function parseFormat(value: string | undefined): LogFormat | undefined {
  return LOG_FORMATS.find((format) => format === value?.trim().toLowerCase());
}

export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const level: LogLevel =
    parseLogLevel(env.RELAY_EXCHANGE_LOG) ?? persistedConfig?.log?.level ?? "info";
  const format: LogFormat =
    parseFormat(env.RELAY_EXCHANGE_LOG_FORMAT) ?? persistedConfig?.log?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(
  persistedConfig: PersistedConfig | undefined,
  overrides: Partial<ResolvedLogConfig> = {}
): pino.Logger {
  const config = { ...resolveLogConfig(persistedConfig), ...overrides };

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  return pino({
    level: config.level,
    transport,
  });
}
