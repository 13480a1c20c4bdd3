import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";

const LogConfigSchema = z
  .object({
    level: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .optional(),
    format: z.enum(["pretty", "json"]).optional(),
  })
  .strict();

export const PersistedConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
        publicUrl: z.string().url().optional(),
      })
      .strict()
      .optional(),
    exchange: z
      .object({
        route: z.string().optional(),
        pollTimeoutMs: z.number().int().positive().optional(),
        abandonTimeoutMs: z.number().int().positive().optional(),
        keepAliveTimeoutMs: z.number().int().positive().optional(),
        outboundQueueLimit: z.number().int().positive().optional(),
        scriptCache: z.boolean().optional(),
      })
      .strict()
      .optional(),
    log: LogConfigSchema.optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

type LoggerLike = {
  info(obj: object, msg?: string): void;
};

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("\n");
}

/** Read an optional JSON config file. A missing file yields an empty config. */
export function loadPersistedConfig(configPath: string | undefined, logger?: LoggerLike): PersistedConfig {
  if (!configPath || !existsSync(configPath)) {
    return {};
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Failed to read ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Invalid JSON in ${configPath}: ${message}`);
  }

  const result = PersistedConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`[Config] Invalid config in ${configPath}:\n${formatIssues(result.error)}`);
  }

  logger?.info({ configPath }, "config_loaded");
  return result.data;
}
