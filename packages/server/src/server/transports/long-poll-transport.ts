import type pino from "pino";
import type { ClientCallWire, PollPayload } from "../../shared/messages.js";
import { UnknownConnectionError } from "../errors.js";
import type { RelayHandleIdentity } from "../relay-registry.js";
import type { Transport, TransportHost } from "./transport.js";

export const DEFAULT_POLL_TIMEOUT_MS = 25_000;
export const DEFAULT_POLL_QUEUE_LIMIT = 10 * 1024;

export type PollState = "idle" | "awaiting" | "delivered";

type PollWaiter = {
  resolve: (payload: PollPayload) => void;
  timer: ReturnType<typeof setTimeout>;
};

type PollChannel = {
  connectionID: string;
  state: PollState;
  queue: ClientCallWire[];
  waiter: PollWaiter | null;
  lastSeenAt: number;
};

type LongPollTransportOptions = {
  logger: pino.Logger;
  host: TransportHost;
  pollTimeoutMs?: number;
  abandonTimeoutMs?: number;
  queueLimit?: number;
};

const EMPTY_PAYLOAD: PollPayload = {};

/**
 * HTTP long-poll transport. Each connection id cycles
 * idle -> awaiting -> delivered -> idle, going back to idle directly on
 * timeout. `handOff` closes the cycle once the response is written; the peer
 * is expected to poll again straight after every response.
 */
export class LongPollTransport implements Transport {
  readonly kind = "longpoll" as const;
  private readonly logger: pino.Logger;
  private readonly host: TransportHost;
  private readonly pollTimeoutMs: number;
  private readonly abandonTimeoutMs: number;
  private readonly queueLimit: number;
  private readonly channels = new Map<string, PollChannel>();
  private sweepInterval: ReturnType<typeof setInterval> | null = null;

  constructor({ logger, host, pollTimeoutMs, abandonTimeoutMs, queueLimit }: LongPollTransportOptions) {
    this.logger = logger.child({ module: "longpoll-transport" });
    this.host = host;
    this.pollTimeoutMs = pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
    this.abandonTimeoutMs = abandonTimeoutMs ?? this.pollTimeoutMs * 3;
    this.queueLimit = queueLimit ?? DEFAULT_POLL_QUEUE_LIMIT;
  }

  /** Make a connection id known to the transport (done at negotiate time). */
  open(connectionID: string): void {
    if (this.channels.has(connectionID)) return;
    this.channels.set(connectionID, {
      connectionID,
      state: "idle",
      queue: [],
      waiter: null,
      lastSeenAt: Date.now(),
    });
    this.ensureSweep();
  }

  callClientFunction(handle: RelayHandleIdentity, method: string, args: unknown[]): void {
    const channel = this.channels.get(handle.connectionID);
    if (!channel) {
      this.logger.debug(
        { connectionId: handle.connectionID, relay: handle.name, method },
        "longpoll_delivery_miss"
      );
      return;
    }

    const call: ClientCallWire = { R: handle.name, M: method, A: args };
    if (channel.waiter) {
      this.settle(channel, call);
      return;
    }
    if (channel.queue.length >= this.queueLimit) {
      this.logger.warn(
        { connectionId: channel.connectionID, queueLimit: this.queueLimit },
        "longpoll_queue_full_dropping"
      );
      return;
    }
    channel.queue.push(call);
  }

  /**
   * Park a poll until a call is queued or the poll timeout elapses.
   * Resolves `{}` on timeout, when superseded by a newer poll, or when
   * `signal` aborts.
   */
  wait(connectionID: string, signal?: AbortSignal): Promise<PollPayload> {
    const channel = this.channels.get(connectionID);
    if (!channel) {
      return Promise.reject(new UnknownConnectionError(connectionID));
    }
    channel.lastSeenAt = Date.now();

    const next = channel.queue.shift();
    if (next) {
      channel.state = "delivered";
      return Promise.resolve(next);
    }

    if (channel.waiter) {
      this.settle(channel, EMPTY_PAYLOAD);
    }
    if (signal?.aborted) {
      return Promise.resolve(EMPTY_PAYLOAD);
    }

    return new Promise<PollPayload>((resolve) => {
      const timer = setTimeout(() => {
        if (channel.waiter === waiter) {
          this.settle(channel, EMPTY_PAYLOAD);
        }
      }, this.pollTimeoutMs);
      const waiter: PollWaiter = { resolve, timer };
      channel.waiter = waiter;
      channel.state = "awaiting";

      signal?.addEventListener(
        "abort",
        () => {
          if (channel.waiter === waiter) {
            this.settle(channel, EMPTY_PAYLOAD);
          }
        },
        { once: true }
      );
    });
  }

  /** The delivered response has been written; the channel rests idle until its next poll. */
  handOff(connectionID: string): void {
    const channel = this.channels.get(connectionID);
    if (channel?.state === "delivered") {
      channel.state = "idle";
    }
  }

  stateOf(connectionID: string): PollState | undefined {
    return this.channels.get(connectionID)?.state;
  }

  pendingCount(connectionID: string): number {
    return this.channels.get(connectionID)?.queue.length ?? 0;
  }

  hasConnection(connectionID: string): boolean {
    return this.channels.has(connectionID);
  }

  connectionCount(): number {
    return this.channels.size;
  }

  /** Forget a connection and report it closed. */
  drop(connectionID: string): void {
    const channel = this.channels.get(connectionID);
    if (!channel) return;
    if (channel.waiter) {
      this.settle(channel, EMPTY_PAYLOAD);
    }
    this.channels.delete(connectionID);
    this.logger.info({ connectionId: connectionID, total: this.channels.size }, "longpoll_connection_removed");
    this.host.connectionClosed(connectionID, this.kind);
  }

  /** Drop every channel that has neither polled nor been parked within the abandon window. */
  sweep(now: number = Date.now()): string[] {
    const abandoned: string[] = [];
    for (const channel of this.channels.values()) {
      if (channel.waiter) continue;
      if (now - channel.lastSeenAt > this.abandonTimeoutMs) {
        abandoned.push(channel.connectionID);
      }
    }
    for (const connectionID of abandoned) {
      this.logger.info({ connectionId: connectionID }, "longpoll_peer_abandoned");
      this.drop(connectionID);
    }
    return abandoned;
  }

  async close(): Promise<void> {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
    for (const channel of this.channels.values()) {
      if (channel.waiter) {
        this.settle(channel, EMPTY_PAYLOAD);
      }
    }
    this.channels.clear();
  }

  private settle(channel: PollChannel, payload: PollPayload): void {
    const waiter = channel.waiter;
    if (!waiter) return;
    clearTimeout(waiter.timer);
    channel.waiter = null;
    channel.lastSeenAt = Date.now();
    channel.state = payload === EMPTY_PAYLOAD ? "idle" : "delivered";
    waiter.resolve(payload);
  }

  private ensureSweep(): void {
    if (this.sweepInterval) return;
    const interval = setInterval(() => {
      this.sweep();
    }, Math.max(1, Math.floor(this.abandonTimeoutMs / 2)));
    interval.unref();
    this.sweepInterval = interval;
  }
}
