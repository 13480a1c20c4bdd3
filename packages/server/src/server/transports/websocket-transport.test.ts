import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { RelayHandleIdentity } from "../relay-registry.js";
import { MockSocket } from "../test-utils/mock-socket.js";
import { createTestLogger } from "../test-utils/test-logger.js";
import type { TransportHost } from "./transport.js";
import { WebSocketTransport } from "./websocket-transport.js";

function handleFor(connectionID: string): RelayHandleIdentity {
  return { name: "Chat", connectionID, origin: "client" };
}

function createHost() {
  return {
    handleInbound: vi.fn<TransportHost["handleInbound"]>(),
    connectionClosed: vi.fn<TransportHost["connectionClosed"]>(),
  };
}

describe("WebSocketTransport", () => {
  let host: ReturnType<typeof createHost>;
  let transport: WebSocketTransport;

  beforeEach(() => {
    host = createHost();
    transport = new WebSocketTransport({
      logger: createTestLogger(),
      host,
      keepAliveTimeoutMs: 60_000,
      outboundQueueLimit: 2,
    });
  });

  afterEach(async () => {
    await transport.close();
  });

  test("accepted sockets are registered under their connection id", () => {
    const connection = transport.accept(new MockSocket(), "conn-1");

    expect(connection.state).toBe("open");
    expect(transport.hasConnection("conn-1")).toBe(true);
    expect(transport.connectionCount()).toBe(1);
  });

  test("client calls are written in the order they were made", async () => {
    const socket = new MockSocket();
    transport.accept(socket, "conn-1");

    transport.callClientFunction(handleFor("conn-1"), "First", [1]);
    transport.callClientFunction(handleFor("conn-1"), "Second", [2]);
    transport.callClientFunction(handleFor("conn-1"), "Third", [3]);

    await vi.waitFor(() => expect(socket.sent).toHaveLength(3));
    expect(socket.sent.map((frame) => JSON.parse(frame))).toEqual([
      { R: "Chat", M: "First", A: [1] },
      { R: "Chat", M: "Second", A: [2] },
      { R: "Chat", M: "Third", A: [3] },
    ]);
  });

  test("frames beyond the outbound queue limit are dropped", () => {
    const socket = new MockSocket();
    socket.autoAck = false;
    transport.accept(socket, "conn-1");

    for (const method of ["A", "B", "C", "D"]) {
      transport.callClientFunction(handleFor("conn-1"), method, []);
    }

    // "A" is in flight, "B" and "C" fill the queue, "D" is dropped.
    expect(socket.sent).toHaveLength(1);
    expect(transport.getConnection("conn-1")?.pending).toBe(2);
  });

  test("a failed write closes the connection", async () => {
    const socket = new MockSocket();
    socket.autoAck = false;
    transport.accept(socket, "conn-1");
    transport.callClientFunction(handleFor("conn-1"), "A", []);

    socket.failNextWrite(new Error("broken pipe"));

    await vi.waitFor(() => expect(host.connectionClosed).toHaveBeenCalledWith("conn-1", "websocket"));
    expect(transport.hasConnection("conn-1")).toBe(false);
  });

  test("inbound frames are decoded and handed to the host with the socket's id", () => {
    const socket = new MockSocket();
    transport.accept(socket, "conn-1");

    socket.emit("message", Buffer.from(JSON.stringify({ S: true, R: "Chat", M: "Broadcast", A: ["hi"] })));

    expect(host.handleInbound).toHaveBeenCalledWith(
      { isServerCall: true, relayName: "Chat", method: "Broadcast", arguments: ["hi"], connectionID: "" },
      "conn-1"
    );
  });

  test("undecodable frames are dropped without closing the socket", () => {
    const socket = new MockSocket();
    transport.accept(socket, "conn-1");

    socket.emit("message", Buffer.from("not json"));
    socket.emit("message", Buffer.from('{"R":"Chat"}'));

    expect(host.handleInbound).not.toHaveBeenCalled();
    expect(transport.hasConnection("conn-1")).toBe(true);
  });

  test("a peer close removes the connection and reports it once", () => {
    const socket = new MockSocket();
    transport.accept(socket, "conn-1");

    socket.close();
    socket.emit("error", new Error("late error"));

    expect(transport.hasConnection("conn-1")).toBe(false);
    expect(host.connectionClosed).toHaveBeenCalledTimes(1);
    expect(host.connectionClosed).toHaveBeenCalledWith("conn-1", "websocket");
  });

  test("a reconnect with the same id replaces the stale socket", () => {
    const stale = new MockSocket();
    const fresh = new MockSocket();
    transport.accept(stale, "conn-1");
    const connection = transport.accept(fresh, "conn-1");

    expect(stale.readyState).toBe(3);
    expect(transport.getConnection("conn-1")).toBe(connection);
    expect(transport.connectionCount()).toBe(1);
    expect(host.connectionClosed).not.toHaveBeenCalled();
  });

  test("calls to unknown connections are ignored", () => {
    transport.callClientFunction(handleFor("ghost"), "Message", []);
    expect(transport.connectionCount()).toBe(0);
  });

  test("close shuts every socket", async () => {
    const first = new MockSocket();
    const second = new MockSocket();
    transport.accept(first, "conn-1");
    transport.accept(second, "conn-2");

    await transport.close();

    expect(first.readyState).toBe(3);
    expect(second.readyState).toBe(3);
    expect(transport.connectionCount()).toBe(0);
  });
});

describe("WebSocketTransport keep-alive", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("pings every half timeout and terminates a silent peer", async () => {
    const host = createHost();
    const transport = new WebSocketTransport({ logger: createTestLogger(), host, keepAliveTimeoutMs: 1_000 });
    const socket = new MockSocket();
    transport.accept(socket, "conn-1");
    expect(socket.ping).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(1_000);
    expect(socket.ping).toHaveBeenCalledTimes(3);
    expect(transport.hasConnection("conn-1")).toBe(true);

    vi.advanceTimersByTime(500);
    expect(socket.ping).toHaveBeenCalledTimes(3);
    expect(socket.readyState).toBe(3);
    expect(transport.hasConnection("conn-1")).toBe(false);
    expect(host.connectionClosed).toHaveBeenCalledWith("conn-1", "websocket");

    await transport.close();
  });

  test("a pong keeps the connection open", async () => {
    const transport = new WebSocketTransport({
      logger: createTestLogger(),
      host: createHost(),
      keepAliveTimeoutMs: 1_000,
    });
    const socket = new MockSocket();
    transport.accept(socket, "conn-1");

    vi.advanceTimersByTime(900);
    socket.emit("pong");
    vi.advanceTimersByTime(600);

    expect(socket.readyState).toBe(1);
    expect(transport.hasConnection("conn-1")).toBe(true);

    await transport.close();
  });
});
