import { EventEmitter } from "node:events";
import { vi } from "vitest";
import type { SocketLike } from "../transports/websocket-transport.js";

/** In-memory stand-in for a `ws` socket. */
export class MockSocket extends EventEmitter implements SocketLike {
  readyState = 1;
  readonly sent: string[] = [];
  readonly ping = vi.fn();
  autoAck = true;
  private readonly unacked: Array<(err?: Error) => void> = [];

  send(data: string, cb: (err?: Error) => void): void {
    this.sent.push(data);
    if (this.autoAck) {
      queueMicrotask(() => cb());
    } else {
      this.unacked.push(cb);
    }
  }

  close(code = 1000): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    this.emit("close", code);
  }

  terminate(): void {
    this.close(1006);
  }

  failNextWrite(error: Error): void {
    this.unacked.shift()?.(error);
  }
}
