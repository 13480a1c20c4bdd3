export { Exchange, DEFAULT_ROUTE, type ExchangeOptions, type ExchangeStats } from "./exchange.js";
export {
  RelayRegistry,
  collectRelayMethods,
  type ClientOperations,
  type RelayConstructor,
  type RelayDefinition,
  type RelayDescription,
  type RelayHandle,
  type RelayHandleIdentity,
  type RelayHandleOrigin,
  type RegisterRelayOptions,
} from "./relay-registry.js";
export { GroupRegistry, GLOBAL_GROUP, type ClientRecord } from "./group-registry.js";
export type { Transport, TransportHost } from "./transports/transport.js";
export { WebSocketTransport, SocketConnection, type SocketLike } from "./transports/websocket-transport.js";
export { LongPollTransport, type PollState } from "./transports/long-poll-transport.js";
export { createExchangeRouter } from "./http-router.js";
export {
  createRelayExchangeServer,
  type RelayExchangeServer,
  type RelayExchangeServerOptions,
} from "./bootstrap.js";
export { ScriptCache, type ScriptTransform } from "./client-script/script-cache.js";
export { ClientScriptGenerator } from "./client-script/client-script-generator.js";
export { loadConfig, type ExchangeConfig, type CliConfigOverrides } from "./config.js";
export { createRootLogger, resolveLogConfig, type LogLevel, type LogFormat } from "./logger.js";
export { loadPersistedConfig, type PersistedConfig } from "./persisted-config.js";
export { decodeEnvelope } from "./envelope.js";
export * from "./errors.js";
export * from "../shared/messages.js";
