import { createRelayExchangeServer, type RelayExchangeServer } from "../bootstrap.js";
import { loadConfig, type ExchangeConfig } from "../config.js";
import type { RelayConstructor } from "../relay-registry.js";
import { createTestLogger } from "./test-logger.js";

type TestRelayExchangeServerOptions = {
  relays?: RelayConstructor[];
  config?: Partial<ExchangeConfig>;
};

export type TestRelayExchangeServer = {
  server: RelayExchangeServer;
  port: number;
  baseUrl: string;
  wsUrl: string;
  close: () => Promise<void>;
};

export async function createTestRelayExchangeServer(
  options: TestRelayExchangeServerOptions = {}
): Promise<TestRelayExchangeServer> {
  const config: ExchangeConfig = {
    ...loadConfig({}, { host: "127.0.0.1", port: 0 }, {}),
    ...options.config,
  };
  const server = createRelayExchangeServer({
    config,
    logger: createTestLogger(),
    relays: options.relays,
  });
  const address = await server.listen();

  return {
    server,
    port: address.port,
    baseUrl: `http://127.0.0.1:${address.port}${server.exchange.route}`,
    wsUrl: `ws://127.0.0.1:${address.port}${server.exchange.route}/ws`,
    close: () => server.close(),
  };
}
