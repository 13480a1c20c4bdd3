import { z } from "zod";
import { formatIssues, type PersistedConfig } from "./persisted-config.js";

export const DEFAULT_PORT = 6767;
export const DEFAULT_HOST = "127.0.0.1";

const EnvBooleanSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => !["0", "false", "no", "off"].includes(value));

const ExchangeConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  route: z.string(),
  publicUrl: z.string().url().optional(),
  pollTimeoutMs: z.coerce.number().int().positive(),
  abandonTimeoutMs: z.coerce.number().int().positive(),
  keepAliveTimeoutMs: z.coerce.number().int().positive(),
  outboundQueueLimit: z.coerce.number().int().positive(),
  scriptCache: z.boolean(),
});

export type ExchangeConfig = z.infer<typeof ExchangeConfigSchema>;

export type CliConfigOverrides = Partial<
  Pick<ExchangeConfig, "host" | "port" | "route" | "publicUrl" | "scriptCache">
>;

/** Origin browsers reach a server bound to `host:port` on. Wildcard hosts become `localhost`. */
export function defaultPublicUrl(host: string, port: number): string {
  const reachable = host === "0.0.0.0" || host === "::" ? "localhost" : host;
  return `http://${reachable.includes(":") ? `[${reachable}]` : reachable}:${port}`;
}

/**
 * Merge defaults, the persisted config file, environment variables and CLI
 * overrides (highest last) into a validated config. Without an explicit
 * `publicUrl` the server derives one from the address it binds.
 */
export function loadConfig(
  persisted: PersistedConfig = {},
  overrides: CliConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ExchangeConfig {
  const host = overrides.host ?? env.RELAY_EXCHANGE_HOST ?? persisted.server?.host ?? DEFAULT_HOST;
  const port = overrides.port ?? env.RELAY_EXCHANGE_PORT ?? env.PORT ?? persisted.server?.port ?? DEFAULT_PORT;
  const pollTimeoutMs =
    env.RELAY_EXCHANGE_POLL_TIMEOUT_MS ?? persisted.exchange?.pollTimeoutMs ?? 25_000;
  const envScriptCache =
    env.RELAY_EXCHANGE_SCRIPT_CACHE !== undefined
      ? EnvBooleanSchema.parse(env.RELAY_EXCHANGE_SCRIPT_CACHE)
      : undefined;

  const candidate = {
    host,
    port,
    route: overrides.route ?? env.RELAY_EXCHANGE_ROUTE ?? persisted.exchange?.route ?? "/relay",
    publicUrl: overrides.publicUrl ?? env.RELAY_EXCHANGE_PUBLIC_URL ?? persisted.server?.publicUrl,
    pollTimeoutMs,
    abandonTimeoutMs:
      env.RELAY_EXCHANGE_ABANDON_TIMEOUT_MS ??
      persisted.exchange?.abandonTimeoutMs ??
      Number(pollTimeoutMs) * 3,
    keepAliveTimeoutMs:
      env.RELAY_EXCHANGE_KEEPALIVE_TIMEOUT_MS ?? persisted.exchange?.keepAliveTimeoutMs ?? 40_000,
    outboundQueueLimit:
      env.RELAY_EXCHANGE_QUEUE_LIMIT ?? persisted.exchange?.outboundQueueLimit ?? 10 * 1024,
    scriptCache: overrides.scriptCache ?? envScriptCache ?? persisted.exchange?.scriptCache ?? true,
  };

  const result = ExchangeConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`[Config] Invalid configuration:\n${formatIssues(result.error)}`);
  }
  return result.data;
}
