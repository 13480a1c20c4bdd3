#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { loadConfig, type CliConfigOverrides } from "./config.js";
import { createRelayExchangeServer } from "./bootstrap.js";
import { createRootLogger, parseLogLevel } from "./logger.js";
import { loadPersistedConfig } from "./persisted-config.js";
import { Chat } from "./demo/chat-relay.js";

interface StartOptions {
  port?: string;
  host?: string;
  route?: string;
  publicUrl?: string;
  config?: string;
  scriptCache?: boolean;
  logLevel?: string;
}

const SHUTDOWN_GRACE_MS = 10_000;

function parsePort(raw: string): number {
  const port = Number.parseInt(raw, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port '${raw}'`);
  }
  return port;
}

async function runStart(options: StartOptions): Promise<void> {
  const configPath = options.config ?? process.env.RELAY_EXCHANGE_CONFIG;
  const persisted = loadPersistedConfig(configPath);
  const level = parseLogLevel(options.logLevel);
  if (options.logLevel && !level) {
    throw new Error(`Invalid log level '${options.logLevel}'`);
  }
  const logger = createRootLogger(persisted, level ? { level } : {});

  const overrides: CliConfigOverrides = {};
  if (options.port) overrides.port = parsePort(options.port);
  if (options.host) overrides.host = options.host;
  if (options.route) overrides.route = options.route;
  if (options.publicUrl) overrides.publicUrl = options.publicUrl;
  if (options.scriptCache === false) overrides.scriptCache = false;

  const config = loadConfig(persisted, overrides);
  const server = createRelayExchangeServer({ config, logger, relays: [Chat] });
  await server.listen();

  let shuttingDown = false;
  const handleShutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutdown_requested");

    const forceExit = setTimeout(() => {
      logger.warn("shutdown_timeout_forcing_exit");
      process.exit(1);
    }, SHUTDOWN_GRACE_MS);
    forceExit.unref();

    try {
      await server.close();
      logger.info("server_closed");
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "shutdown_failed");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void handleShutdown("SIGTERM"));
  process.on("SIGINT", () => void handleShutdown("SIGINT"));
}

export function createCli(): Command {
  const program = new Command();

  program
    .name("relay-exchange")
    .description("Real-time relay hub for browser clients over WebSocket or long-poll");

  program
    .command("start")
    .description("Start the relay exchange with the sample Chat relay")
    .option("--port <port>", "Port to listen on (default: 6767)")
    .option("--host <host>", "Interface to bind (default: 127.0.0.1)")
    .option("--route <route>", "Route the exchange is mounted at (default: /relay)")
    .option("--public-url <url>", "Scheme and host browsers reach the server on")
    .option("--config <path>", "JSON config file")
    .option("--no-script-cache", "Regenerate the client script on every request")
    .option("--log-level <level>", "trace | debug | info | warn | error | fatal")
    .action(async (options: StartOptions) => {
      await runStart(options);
    });

  return program;
}

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${message}\n`);
    process.exit(1);
  });
