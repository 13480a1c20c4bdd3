import { EventEmitter } from "node:events";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, type RawData } from "ws";
import type pino from "pino";
import { encodeClientCall } from "../../shared/messages.js";
import { decodeEnvelope } from "../envelope.js";
import { DecodeError, toError } from "../errors.js";
import type { RelayHandleIdentity } from "../relay-registry.js";
import type { Transport, TransportHost } from "./transport.js";

const WS_OPEN = 1;

export const DEFAULT_KEEPALIVE_TIMEOUT_MS = 40_000;
export const DEFAULT_OUTBOUND_QUEUE_LIMIT = 10 * 1024;

/** The subset of a `ws` socket the transport drives. */
export interface SocketLike {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "pong", listener: () => void): unknown;
  on(event: "close", listener: (code: number) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type SocketConnectionState = "connecting" | "open" | "closing" | "closed";

type ConnectionEvent =
  | { type: "connected"; connection: SocketConnection }
  | { type: "disconnected"; connection: SocketConnection };

type WebSocketTransportOptions = {
  logger: pino.Logger;
  host: TransportHost;
  keepAliveTimeoutMs?: number;
  outboundQueueLimit?: number;
};

/**
 * One upgraded socket bound to a connection id. Owns its outbound queue and
 * keep-alive timer; never touches the transport's connection table directly.
 */
export class SocketConnection {
  private stateValue: SocketConnectionState = "connecting";
  private readonly queue: string[] = [];
  private draining = false;
  private keepAliveInterval: ReturnType<typeof setInterval> | null = null;
  private lastPongAt = Date.now();

  constructor(
    readonly id: string,
    private readonly socket: SocketLike,
    private readonly queueLimit: number,
    private readonly logger: pino.Logger,
    private readonly onClosing: (connection: SocketConnection) => void
  ) {}

  get state(): SocketConnectionState {
    return this.stateValue;
  }

  get pending(): number {
    return this.queue.length;
  }

  markOpen(): void {
    if (this.stateValue === "connecting") {
      this.stateValue = "open";
    }
  }

  enqueue(frame: string): boolean {
    if (this.stateValue !== "open") {
      return false;
    }
    if (this.queue.length >= this.queueLimit) {
      this.logger.warn({ queueLimit: this.queueLimit }, "ws_outbound_queue_full_dropping");
      return false;
    }
    this.queue.push(frame);
    void this.drain();
    return true;
  }

  startKeepAlive(timeoutMs: number): void {
    this.lastPongAt = Date.now();
    this.socket.on("pong", () => {
      this.lastPongAt = Date.now();
    });

    const checkLiveness = () => {
      if (this.stateValue !== "open") return;
      const silentForMs = Date.now() - this.lastPongAt;
      if (silentForMs > timeoutMs) {
        this.logger.warn({ silentForMs, timeoutMs }, "ws_keepalive_timeout_terminating");
        this.stopKeepAlive();
        this.socket.terminate();
        return;
      }
      try {
        this.socket.ping();
      } catch (error) {
        this.fail(toError(error));
      }
    };

    checkLiveness();
    this.keepAliveInterval = setInterval(checkLiveness, Math.max(1, Math.floor(timeoutMs / 2)));
  }

  /** Read or write failure, or the peer went away. */
  fail(error?: Error): void {
    if (this.stateValue === "closing" || this.stateValue === "closed") return;
    if (error) {
      this.logger.debug({ err: error }, "ws_connection_lost");
    }
    this.stateValue = "closing";
    this.stopKeepAlive();
    if (this.socket.readyState === WS_OPEN) {
      this.socket.close();
    }
    this.onClosing(this);
  }

  /** Final step once the transport has dropped this connection from its table. */
  release(): void {
    this.stateValue = "closed";
    this.stopKeepAlive();
    this.queue.length = 0;
  }

  close(): void {
    this.fail();
  }

  private stopKeepAlive(): void {
    if (this.keepAliveInterval) {
      clearInterval(this.keepAliveInterval);
      this.keepAliveInterval = null;
    }
  }

  // Single consumer per queue: frames leave in enqueue order.
  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      while (this.stateValue === "open" && this.queue.length > 0) {
        const frame = this.queue.shift();
        if (frame === undefined) break;
        await this.write(frame);
      }
    } catch (error) {
      this.fail(toError(error));
    } finally {
      this.draining = false;
    }
  }

  private write(frame: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.send(frame, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * Persistent socket transport. The connection table is mutated only by the
 * event listener in `handleEvent`; connections report in through
 * `connected` / `disconnected` events rather than writing the table.
 */
export class WebSocketTransport implements Transport {
  readonly kind = "websocket" as const;
  private readonly logger: pino.Logger;
  private readonly host: TransportHost;
  private readonly keepAliveTimeoutMs: number;
  private readonly outboundQueueLimit: number;
  private readonly connections = new Map<string, SocketConnection>();
  private readonly events = new EventEmitter();
  private wss: WebSocketServer | null = null;

  constructor({ logger, host, keepAliveTimeoutMs, outboundQueueLimit }: WebSocketTransportOptions) {
    this.logger = logger.child({ module: "websocket-transport" });
    this.host = host;
    this.keepAliveTimeoutMs = keepAliveTimeoutMs ?? DEFAULT_KEEPALIVE_TIMEOUT_MS;
    this.outboundQueueLimit = outboundQueueLimit ?? DEFAULT_OUTBOUND_QUEUE_LIMIT;
    this.events.on("connection", (event: ConnectionEvent) => {
      this.handleEvent(event);
    });
  }

  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer, connectionID: string): void {
    const wss = this.server();
    wss.handleUpgrade(request, socket, head, (ws) => {
      this.accept(ws, connectionID);
    });
  }

  /** Bind an already-upgraded socket to a connection id and start its duties. */
  accept(socket: SocketLike, connectionID: string): SocketConnection {
    const connectionLogger = this.logger.child({ connectionId: connectionID });
    const connection = new SocketConnection(
      connectionID,
      socket,
      this.outboundQueueLimit,
      connectionLogger,
      (closing) => this.emit({ type: "disconnected", connection: closing })
    );

    socket.on("message", (data) => {
      this.handleFrame(connection, data, connectionLogger);
    });
    socket.on("close", (code) => {
      connectionLogger.debug({ code }, "ws_closed");
      connection.fail();
    });
    socket.on("error", (error) => {
      connectionLogger.warn({ err: error }, "ws_error");
      connection.fail(error);
    });

    connection.markOpen();
    this.emit({ type: "connected", connection });
    connection.startKeepAlive(this.keepAliveTimeoutMs);
    return connection;
  }

  callClientFunction(handle: RelayHandleIdentity, method: string, args: unknown[]): void {
    const connection = this.connections.get(handle.connectionID);
    if (!connection) {
      this.logger.debug({ connectionId: handle.connectionID, relay: handle.name, method }, "ws_delivery_miss");
      return;
    }
    connection.enqueue(encodeClientCall(handle.name, method, args));
  }

  hasConnection(connectionID: string): boolean {
    return this.connections.has(connectionID);
  }

  connectionCount(): number {
    return this.connections.size;
  }

  getConnection(connectionID: string): SocketConnection | undefined {
    return this.connections.get(connectionID);
  }

  async close(): Promise<void> {
    for (const connection of [...this.connections.values()]) {
      connection.close();
    }
    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
    }
  }

  private server(): WebSocketServer {
    if (!this.wss) {
      this.wss = new WebSocketServer({ noServer: true, perMessageDeflate: false });
    }
    return this.wss;
  }

  private emit(event: ConnectionEvent): void {
    this.events.emit("connection", event);
  }

  private handleEvent(event: ConnectionEvent): void {
    const { connection } = event;
    switch (event.type) {
      case "connected": {
        const previous = this.connections.get(connection.id);
        this.connections.set(connection.id, connection);
        this.logger.info({ connectionId: connection.id, total: this.connections.size }, "ws_connection_added");
        if (previous && previous !== connection) {
          // Same id reconnected; the stale socket must not unregister the new one.
          previous.close();
        }
        return;
      }
      case "disconnected": {
        if (this.connections.get(connection.id) !== connection) {
          connection.release();
          return;
        }
        this.connections.delete(connection.id);
        connection.release();
        this.logger.info({ connectionId: connection.id, total: this.connections.size }, "ws_connection_removed");
        this.host.connectionClosed(connection.id, this.kind);
        return;
      }
    }
  }

  private handleFrame(connection: SocketConnection, data: RawData, connectionLogger: pino.Logger): void {
    if (connection.state !== "open") return;
    try {
      const envelope = decodeEnvelope(data);
      this.host.handleInbound(envelope, connection.id);
    } catch (error) {
      if (error instanceof DecodeError) {
        connectionLogger.warn({ err: error }, "ws_frame_dropped");
        return;
      }
      connectionLogger.error({ err: error }, "ws_frame_failed");
    }
  }
}
