import { describe, expect, test } from "vitest";
import { encodeEnvelope, type Envelope } from "../shared/messages.js";
import { decodeEnvelope } from "./envelope.js";
import { DecodeError } from "./errors.js";

describe("decodeEnvelope", () => {
  test("decodes a JSON frame into an envelope", () => {
    const frame = JSON.stringify({ S: true, R: "Chat", M: "Broadcast", A: ["hi"], C: "conn-1" });
    expect(decodeEnvelope(frame)).toEqual({
      isServerCall: true,
      relayName: "Chat",
      method: "Broadcast",
      arguments: ["hi"],
      connectionID: "conn-1",
    });
  });

  test("decodes socket buffers and pre-parsed bodies", () => {
    const wire = { S: false, R: "Chat", M: "Message", A: [1, { nested: true }], C: "conn-2" };
    expect(decodeEnvelope(Buffer.from(JSON.stringify(wire)))).toEqual(decodeEnvelope(wire));
    expect(decodeEnvelope([Buffer.from('{"R":"Chat",'), Buffer.from('"M":"Ping"}')])).toMatchObject({
      relayName: "Chat",
      method: "Ping",
    });
  });

  test("fills in omitted S, A and C", () => {
    expect(decodeEnvelope('{"R":"Chat","M":"Ping"}')).toEqual({
      isServerCall: false,
      relayName: "Chat",
      method: "Ping",
      arguments: [],
      connectionID: "",
    });
  });

  test("round-trips through encodeEnvelope", () => {
    const envelope: Envelope = {
      isServerCall: true,
      relayName: "Chat",
      method: "Whisper",
      arguments: ["conn-9", "psst", null, 3.5],
      connectionID: "conn-1",
    };
    expect(decodeEnvelope(encodeEnvelope(envelope))).toEqual(envelope);
  });

  test("rejects frames that are not JSON", () => {
    expect(() => decodeEnvelope("{not json")).toThrow(DecodeError);
  });

  test("rejects envelopes missing the relay or method", () => {
    expect(() => decodeEnvelope('{"M":"Ping"}')).toThrow(/Malformed envelope: R:/);
    expect(() => decodeEnvelope({ R: "Chat", M: "" })).toThrow(DecodeError);
    expect(() => decodeEnvelope({ R: "Chat", M: "Ping", A: "not-a-list" })).toThrow(DecodeError);
  });
});
