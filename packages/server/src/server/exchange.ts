import type { IncomingMessage, Server as HTTPServer } from "node:http";
import type { Duplex } from "node:stream";
import type pino from "pino";
import { v4 as uuidv4 } from "uuid";
import {
  NegotiationRequestSchema,
  TransportKindSchema,
  type Envelope,
  type NegotiationResponse,
  type PollPayload,
  type TransportKind,
} from "../shared/messages.js";
import { ClientScriptGenerator, stripScheme } from "./client-script/client-script-generator.js";
import { ScriptCache, type ScriptTransform } from "./client-script/script-cache.js";
import { decodeEnvelope } from "./envelope.js";
import {
  NegotiationError,
  UnknownConnectionError,
  UnknownMethodError,
  UnknownRelayError,
} from "./errors.js";
import { GLOBAL_GROUP, GroupRegistry, type ClientRecord } from "./group-registry.js";
import {
  RelayRegistry,
  type ClientOperations,
  type RegisterRelayOptions,
  type RelayConstructor,
  type RelayDefinition,
  type RelayDescription,
  type RelayHandle,
  type RelayHandleIdentity,
} from "./relay-registry.js";
import { DEFAULT_POLL_TIMEOUT_MS, LongPollTransport } from "./transports/long-poll-transport.js";
import type { Transport, TransportHost } from "./transports/transport.js";
import { WebSocketTransport } from "./transports/websocket-transport.js";

export const DEFAULT_ROUTE = "/relay";
export const DEFAULT_TRANSPORT: TransportKind = "longpoll";

export type ExchangeOptions = {
  logger: pino.Logger;
  /** Path the HTTP router is mounted at; socket upgrades arrive on `<route>/ws`. */
  route?: string;
  /** Scheme and host the client script points browsers at, e.g. `http://localhost:6767`. */
  publicUrl?: string;
  pollTimeoutMs?: number;
  abandonTimeoutMs?: number;
  keepAliveTimeoutMs?: number;
  outboundQueueLimit?: number;
  scriptCache?: boolean;
  scriptTransform?: ScriptTransform;
  scriptGenerator?: ClientScriptGenerator;
  generateConnectionId?: () => string;
};

export type ExchangeStats = {
  clients: number;
  groups: number;
  connections: Record<TransportKind, number>;
};

/**
 * The hub. Composes the group registry, the relay registry and both
 * transports, and exposes the negotiate / upgrade / long-poll / server-call
 * entry points used by the HTTP router.
 */
export class Exchange implements TransportHost {
  readonly groups: GroupRegistry;
  readonly relays: RelayRegistry;
  readonly websocket: WebSocketTransport;
  readonly longPoll: LongPollTransport;
  readonly route: string;
  private readonly logger: pino.Logger;
  private publicUrl: string;
  private readonly abandonTimeoutMs: number;
  private readonly pendingUpgrades = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly transports: Record<TransportKind, Transport>;
  private readonly scripts: ScriptCache;
  private readonly scriptGenerator: ClientScriptGenerator;
  private readonly generateConnectionId: () => string;
  private readonly attachedServers = new Set<HTTPServer>();

  constructor(options: ExchangeOptions) {
    this.logger = options.logger.child({ module: "exchange" });
    this.route = normalizeRoute(options.route ?? DEFAULT_ROUTE);
    this.publicUrl = (options.publicUrl ?? "").replace(/\/+$/, "");
    this.abandonTimeoutMs =
      options.abandonTimeoutMs ?? (options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS) * 3;
    this.generateConnectionId = options.generateConnectionId ?? (() => uuidv4());

    this.groups = new GroupRegistry(options.logger);
    this.relays = new RelayRegistry({
      logger: options.logger,
      createClientOperations: (identity) => this.createClientOperations(identity),
    });
    this.websocket = new WebSocketTransport({
      logger: options.logger,
      host: this,
      keepAliveTimeoutMs: options.keepAliveTimeoutMs,
      outboundQueueLimit: options.outboundQueueLimit,
    });
    this.longPoll = new LongPollTransport({
      logger: options.logger,
      host: this,
      pollTimeoutMs: options.pollTimeoutMs,
      abandonTimeoutMs: this.abandonTimeoutMs,
      queueLimit: options.outboundQueueLimit,
    });
    this.transports = {
      websocket: this.websocket,
      longpoll: this.longPoll,
    };
    this.scripts = new ScriptCache({
      enabled: options.scriptCache ?? true,
      transform: options.scriptTransform,
    });
    this.scriptGenerator = options.scriptGenerator ?? new ClientScriptGenerator();
  }

  registerRelay(relay: RelayConstructor, options?: RegisterRelayOptions): RelayDefinition {
    const definition = this.relays.register(relay, options);
    this.scripts.invalidate();
    return definition;
  }

  /**
   * Server-initiated handle with a throwaway connection id. `clients.call`
   * on it broadcasts to every client.
   */
  relay(relay: string | RelayConstructor): RelayHandle {
    const name = typeof relay === "string" ? relay : this.relays.nameOf(relay) ?? relay.name;
    return this.relays.resolve(name, `srv_${this.generateConnectionId()}`, "server");
  }

  negotiate(body: unknown): NegotiationResponse {
    const parsed = NegotiationRequestSchema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new NegotiationError("Negotiation body must be an object with an optional string 'T'");
    }
    const requested = parsed.data.T || DEFAULT_TRANSPORT;
    const kind = TransportKindSchema.safeParse(requested);
    if (!kind.success) {
      throw new NegotiationError(`Unsupported transport '${requested}'`);
    }

    const connectionID = this.generateConnectionId();
    this.groups.addClient(connectionID, kind.data);
    if (kind.data === "longpoll") {
      this.longPoll.open(connectionID);
    } else {
      this.expectUpgrade(connectionID);
    }
    this.logger.info({ connectionId: connectionID, transport: kind.data }, "client_negotiated");
    return { ConnectionID: connectionID };
  }

  /**
   * Accept a socket upgrade for `<route>/ws?connectionId=...`.
   * Returns false when the request is not addressed to this exchange.
   */
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): boolean {
    const url = new URL(request.url ?? "/", "http://localhost");
    if (url.pathname !== `${this.route}/ws`) {
      return false;
    }

    const connectionID = url.searchParams.get("connectionId") ?? "";
    const client = this.groups.lookupClient(connectionID);
    if (!client || client.transport !== "websocket") {
      this.logger.warn({ connectionId: connectionID }, "ws_upgrade_rejected");
      socket.write("HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return true;
    }

    this.websocket.handleUpgrade(request, socket, head, connectionID);
    return true;
  }

  /** Listen for socket upgrades on an HTTP server. */
  attach(server: HTTPServer): void {
    if (this.attachedServers.has(server)) return;
    this.attachedServers.add(server);
    server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      const claimed = this.handleUpgrade(request, socket, head);
      if (!claimed && server.listenerCount("upgrade") === 1) {
        socket.destroy();
      }
    });
  }

  awaitLongPoll(connectionID: string, signal?: AbortSignal): Promise<PollPayload> {
    if (!this.longPoll.hasConnection(connectionID)) {
      return Promise.reject(new UnknownConnectionError(connectionID));
    }
    return this.longPoll.wait(connectionID, signal);
  }

  /**
   * Inbound server call over HTTP. Decodes synchronously (malformed bodies
   * throw `DecodeError`) and runs the relay method without waiting for it.
   */
  callServer(connectionID: string, body: unknown): void {
    if (!this.groups.lookupClient(connectionID)) {
      throw new UnknownConnectionError(connectionID);
    }
    const envelope = decodeEnvelope(body);
    this.handleInbound({ ...envelope, isServerCall: true }, connectionID);
  }

  handleInbound(envelope: Envelope, receivedOn: string): void {
    const log = this.logger.child({ relay: envelope.relayName, method: envelope.method });

    if (envelope.isServerCall) {
      let handle: RelayHandle;
      try {
        handle = this.relays.resolve(envelope.relayName, receivedOn);
      } catch (error) {
        this.logResolveFailure(log, error, receivedOn);
        return;
      }
      this.dispatchDetached(handle, envelope.method, envelope.arguments);
      return;
    }

    // Re-delivery: the sender addresses another client's proxy directly.
    if (!this.relays.has(envelope.relayName)) {
      this.logResolveFailure(log, new UnknownRelayError(envelope.relayName), receivedOn);
      return;
    }
    const target = this.groups.lookupClient(envelope.connectionID);
    if (!target) {
      log.debug({ connectionId: envelope.connectionID, from: receivedOn }, "redelivery_miss");
      return;
    }
    this.deliver(target, envelope.relayName, envelope.method, envelope.arguments);
  }

  /** Run a server call to completion. Rejects with registry errors or whatever the method throws. */
  dispatch(handle: RelayHandle, method: string, args: unknown[]): Promise<unknown> {
    return this.relays.dispatchServerCall(handle, method, args);
  }

  connectionClosed(connectionID: string, kind: TransportKind): void {
    this.clearPendingUpgrade(connectionID);
    this.groups.removeFromAllGroups(connectionID);
    this.logger.info({ connectionId: connectionID, transport: kind }, "client_disconnected");
  }

  /** Point generated client scripts at another origin, e.g. once the listen port is known. */
  setPublicUrl(publicUrl: string): void {
    this.publicUrl = publicUrl.replace(/\/+$/, "");
    this.scripts.invalidate();
  }

  clientScript(mountPath: string = this.route): string {
    const route = `${this.publicUrl}${normalizeRoute(mountPath)}`;
    return this.scripts.getOrGenerate(route, () =>
      this.scriptGenerator.render({
        baseUrl: stripScheme(route),
        route,
        relays: this.describeRelays(),
      })
    );
  }

  /** Registered relays and their method names, in registration order. */
  describeRelays(): RelayDescription[] {
    return this.relays.describe();
  }

  stats(): ExchangeStats {
    return {
      clients: this.groups.clientCount(),
      groups: this.groups.groupNames().length,
      connections: {
        websocket: this.websocket.connectionCount(),
        longpoll: this.longPoll.connectionCount(),
      },
    };
  }

  async close(): Promise<void> {
    for (const timer of this.pendingUpgrades.values()) {
      clearTimeout(timer);
    }
    this.pendingUpgrades.clear();
    await Promise.all([this.websocket.close(), this.longPoll.close()]);
    this.logger.info("exchange_closed");
  }

  private createClientOperations(identity: RelayHandleIdentity): ClientOperations {
    const isBound = identity.origin === "client" && identity.connectionID !== "";

    const callGroup = (group: string, method: string, args: unknown[]) => {
      const delivered = this.groups.forEachInGroup(group, (client) => {
        this.deliver(client, identity.name, method, args);
      });
      if (delivered === 0) {
        this.logger.debug({ group, relay: identity.name, method }, "group_call_no_members");
      }
    };

    const callGroupExcept = (group: string, method: string, args: unknown[]) => {
      this.groups.forEachInGroup(group, (client) => {
        if (client.connectionID === identity.connectionID) return;
        this.deliver(client, identity.name, method, args);
      });
    };

    const callClient = (connectionID: string, method: string, args: unknown[]) => {
      const client = this.groups.lookupClient(connectionID);
      if (!client) {
        this.logger.debug({ connectionId: connectionID, relay: identity.name, method }, "client_call_miss");
        return;
      }
      this.deliver(client, identity.name, method, args);
    };

    return {
      call: (method, ...args) => {
        if (!isBound) {
          callGroup(GLOBAL_GROUP, method, args);
          return;
        }
        callClient(identity.connectionID, method, args);
      },
      callClient: (connectionID, method, ...args) => callClient(connectionID, method, args),
      all: (method, ...args) => callGroup(GLOBAL_GROUP, method, args),
      others: (method, ...args) => callGroupExcept(GLOBAL_GROUP, method, args),
      callGroup: (group, method, ...args) => callGroup(group, method, args),
      callGroupExcept: (group, method, ...args) => callGroupExcept(group, method, args),
      addToGroup: (group) => {
        this.groups.addToGroup(group, identity.connectionID);
      },
      removeFromGroup: (group) => {
        if (group === GLOBAL_GROUP) {
          this.logger.warn({ connectionId: identity.connectionID }, "global_group_leave_ignored");
          return;
        }
        this.groups.removeFromGroup(group, identity.connectionID);
      },
    };
  }

  // A websocket client that never completes its upgrade is dropped like an abandoned poller.
  private expectUpgrade(connectionID: string): void {
    const timer = setTimeout(() => {
      this.pendingUpgrades.delete(connectionID);
      if (this.websocket.hasConnection(connectionID)) return;
      this.logger.info({ connectionId: connectionID }, "ws_upgrade_abandoned");
      this.connectionClosed(connectionID, "websocket");
    }, this.abandonTimeoutMs);
    timer.unref();
    this.pendingUpgrades.set(connectionID, timer);
  }

  private clearPendingUpgrade(connectionID: string): void {
    const timer = this.pendingUpgrades.get(connectionID);
    if (timer) {
      clearTimeout(timer);
      this.pendingUpgrades.delete(connectionID);
    }
  }

  private deliver(client: ClientRecord, relayName: string, method: string, args: unknown[]): void {
    this.transports[client.transport].callClientFunction(
      { name: relayName, connectionID: client.connectionID, origin: "client" },
      method,
      args
    );
  }

  private dispatchDetached(handle: RelayHandle, method: string, args: unknown[]): void {
    const log = this.logger.child({ relay: handle.name, method, connectionId: handle.connectionID });
    // Runs after the caller's turn, so the HTTP response or socket read is never held by relay code.
    void Promise.resolve()
      .then(() => this.dispatch(handle, method, args))
      .then(
        () => {
          log.debug("relay_call_completed");
        },
        (error: unknown) => {
          if (error instanceof UnknownMethodError) {
            log.warn({ err: error }, "relay_unknown_method");
            return;
          }
          log.error({ err: error }, "relay_call_failed");
        }
      );
  }

  private logResolveFailure(log: pino.Logger, error: unknown, connectionID: string): void {
    if (error instanceof UnknownRelayError) {
      log.warn({ connectionId: connectionID }, "relay_unknown");
      return;
    }
    log.error({ err: error, connectionId: connectionID }, "relay_resolve_failed");
  }
}

export function normalizeRoute(route: string): string {
  const trimmed = route.trim().replace(/\/+$/, "");
  if (!trimmed) return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}
