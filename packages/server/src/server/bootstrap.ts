import express, { type Express } from "express";
import { createServer as createHTTPServer, type Server as HTTPServer } from "node:http";
import type { AddressInfo } from "node:net";
import type pino from "pino";
import { defaultPublicUrl, type ExchangeConfig } from "./config.js";
import { Exchange } from "./exchange.js";
import { createExchangeRouter } from "./http-router.js";
import type { RelayConstructor } from "./relay-registry.js";
import type { ScriptTransform } from "./client-script/script-cache.js";

export type RelayExchangeServerOptions = {
  config: ExchangeConfig;
  logger: pino.Logger;
  relays?: RelayConstructor[];
  scriptTransform?: ScriptTransform;
};

export type RelayExchangeServer = {
  app: Express;
  httpServer: HTTPServer;
  exchange: Exchange;
  listen: () => Promise<AddressInfo>;
  close: () => Promise<void>;
};

export function createRelayExchangeServer({
  config,
  logger,
  relays = [],
  scriptTransform,
}: RelayExchangeServerOptions): RelayExchangeServer {
  const serverLogger = logger.child({ module: "bootstrap" });
  const exchange = new Exchange({
    logger,
    route: config.route,
    publicUrl: config.publicUrl,
    pollTimeoutMs: config.pollTimeoutMs,
    abandonTimeoutMs: config.abandonTimeoutMs,
    keepAliveTimeoutMs: config.keepAliveTimeoutMs,
    outboundQueueLimit: config.outboundQueueLimit,
    scriptCache: config.scriptCache,
    scriptTransform,
  });
  for (const relay of relays) {
    exchange.registerRelay(relay);
  }

  const app = express();

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString(), ...exchange.stats() });
  });

  app.use(exchange.route || "/", createExchangeRouter(exchange, logger));

  const httpServer = createHTTPServer(app);
  exchange.attach(httpServer);

  const listen = () =>
    new Promise<AddressInfo>((resolve, reject) => {
      const onError = (error: Error) => {
        httpServer.off("listening", onListening);
        reject(error);
      };
      const onListening = () => {
        httpServer.off("error", onError);
        const address = httpServer.address();
        if (!address || typeof address === "string") {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }
        if (!config.publicUrl) {
          exchange.setPublicUrl(defaultPublicUrl(config.host, address.port));
        }
        serverLogger.info(
          { host: address.address, port: address.port, route: exchange.route },
          "relay_exchange_listening"
        );
        resolve(address);
      };
      httpServer.once("error", onError);
      httpServer.once("listening", onListening);
      httpServer.listen(config.port, config.host);
    });

  const close = async () => {
    await exchange.close();
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
      httpServer.closeAllConnections();
    });
  };

  return { app, httpServer, exchange, listen, close };
}
