import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { UnknownConnectionError } from "../errors.js";
import type { RelayHandleIdentity } from "../relay-registry.js";
import { createTestLogger } from "../test-utils/test-logger.js";
import { LongPollTransport } from "./long-poll-transport.js";
import type { TransportHost } from "./transport.js";

function handleFor(connectionID: string): RelayHandleIdentity {
  return { name: "Chat", connectionID, origin: "client" };
}

function createHost() {
  return {
    handleInbound: vi.fn<TransportHost["handleInbound"]>(),
    connectionClosed: vi.fn<TransportHost["connectionClosed"]>(),
  };
}

describe("LongPollTransport", () => {
  let host: ReturnType<typeof createHost>;
  let transport: LongPollTransport;

  beforeEach(() => {
    vi.useFakeTimers();
    host = createHost();
    transport = new LongPollTransport({
      logger: createTestLogger(),
      host,
      pollTimeoutMs: 1_000,
      abandonTimeoutMs: 300,
      queueLimit: 2,
    });
    transport.open("conn-1");
  });

  afterEach(async () => {
    await transport.close();
    vi.useRealTimers();
  });

  test("polling an unknown connection is rejected", async () => {
    await expect(transport.wait("ghost")).rejects.toBeInstanceOf(UnknownConnectionError);
  });

  test("a parked poll is answered by the next call", async () => {
    const poll = transport.wait("conn-1");
    expect(transport.stateOf("conn-1")).toBe("awaiting");

    transport.callClientFunction(handleFor("conn-1"), "Message", ["conn-2", "hello"]);

    await expect(poll).resolves.toEqual({ R: "Chat", M: "Message", A: ["conn-2", "hello"] });
    expect(transport.stateOf("conn-1")).toBe("delivered");
  });

  test("handing off a delivered response returns the channel to idle", async () => {
    transport.callClientFunction(handleFor("conn-1"), "Message", []);
    await transport.wait("conn-1");
    expect(transport.stateOf("conn-1")).toBe("delivered");

    transport.handOff("conn-1");
    expect(transport.stateOf("conn-1")).toBe("idle");
  });

  test("hand-off leaves a parked poll awaiting", () => {
    void transport.wait("conn-1");
    transport.handOff("conn-1");
    expect(transport.stateOf("conn-1")).toBe("awaiting");
  });

  test("calls made between polls are queued and delivered in order", async () => {
    transport.callClientFunction(handleFor("conn-1"), "First", []);
    transport.callClientFunction(handleFor("conn-1"), "Second", [2]);
    expect(transport.pendingCount("conn-1")).toBe(2);

    await expect(transport.wait("conn-1")).resolves.toEqual({ R: "Chat", M: "First", A: [] });
    await expect(transport.wait("conn-1")).resolves.toEqual({ R: "Chat", M: "Second", A: [2] });
    expect(transport.pendingCount("conn-1")).toBe(0);
  });

  test("calls beyond the queue limit are dropped", async () => {
    transport.callClientFunction(handleFor("conn-1"), "First", []);
    transport.callClientFunction(handleFor("conn-1"), "Second", []);
    transport.callClientFunction(handleFor("conn-1"), "Third", []);

    expect(transport.pendingCount("conn-1")).toBe(2);
    await expect(transport.wait("conn-1")).resolves.toMatchObject({ M: "First" });
    await expect(transport.wait("conn-1")).resolves.toMatchObject({ M: "Second" });
  });

  test("an unanswered poll resolves empty after the poll timeout", async () => {
    const poll = transport.wait("conn-1");
    vi.advanceTimersByTime(999);
    expect(transport.stateOf("conn-1")).toBe("awaiting");

    vi.advanceTimersByTime(1);
    await expect(poll).resolves.toEqual({});
    expect(transport.stateOf("conn-1")).toBe("idle");
  });

  test("a newer poll supersedes the parked one", async () => {
    const first = transport.wait("conn-1");
    const second = transport.wait("conn-1");

    await expect(first).resolves.toEqual({});
    transport.callClientFunction(handleFor("conn-1"), "Message", ["x"]);
    await expect(second).resolves.toEqual({ R: "Chat", M: "Message", A: ["x"] });
  });

  test("an aborted poll resolves empty and leaves later calls queued", async () => {
    const controller = new AbortController();
    const poll = transport.wait("conn-1", controller.signal);
    controller.abort();

    await expect(poll).resolves.toEqual({});
    transport.callClientFunction(handleFor("conn-1"), "Message", []);
    expect(transport.pendingCount("conn-1")).toBe(1);
  });

  test("a poll whose request already went away resolves empty at once", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(transport.wait("conn-1", controller.signal)).resolves.toEqual({});
    expect(transport.stateOf("conn-1")).toBe("idle");
  });

  test("calls for unknown connections are ignored", () => {
    transport.callClientFunction(handleFor("ghost"), "Message", []);
    expect(transport.hasConnection("ghost")).toBe(false);
    expect(transport.connectionCount()).toBe(1);
  });

  test("peers that stop polling are swept and reported closed", () => {
    transport.open("conn-2");
    vi.advanceTimersByTime(450);

    expect(transport.hasConnection("conn-1")).toBe(false);
    expect(transport.hasConnection("conn-2")).toBe(false);
    expect(host.connectionClosed).toHaveBeenCalledWith("conn-1", "longpoll");
    expect(host.connectionClosed).toHaveBeenCalledWith("conn-2", "longpoll");
  });

  test("a parked poll keeps its connection alive", () => {
    void transport.wait("conn-1");
    expect(transport.sweep(Date.now() + 10_000)).toEqual([]);
    expect(transport.hasConnection("conn-1")).toBe(true);
  });

  test("drop answers the parked poll and reports the connection once", async () => {
    const poll = transport.wait("conn-1");
    transport.drop("conn-1");
    transport.drop("conn-1");

    await expect(poll).resolves.toEqual({});
    expect(host.connectionClosed).toHaveBeenCalledTimes(1);
  });
});
