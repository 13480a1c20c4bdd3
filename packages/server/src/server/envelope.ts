import {
  EnvelopeWireSchema,
  fromWire,
  rawDataToString,
  type Envelope,
} from "../shared/messages.js";
import { DecodeError } from "./errors.js";

/**
 * Decode an inbound frame or request body into an envelope.
 * Accepts raw socket data, a JSON string, or an already-parsed body.
 */
export function decodeEnvelope(raw: unknown): Envelope {
  let parsed: unknown = raw;
  if (isFrameData(raw)) {
    const text = rawDataToString(raw);
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DecodeError(`Envelope is not valid JSON: ${message}`);
    }
  }

  const result = EnvelopeWireSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    throw new DecodeError(`Malformed envelope: ${issues}`);
  }
  return fromWire(result.data);
}

function isFrameData(raw: unknown): boolean {
  if (typeof raw === "string" || Buffer.isBuffer(raw) || raw instanceof ArrayBuffer) {
    return true;
  }
  return Array.isArray(raw) && raw.length > 0 && raw.every((chunk) => Buffer.isBuffer(chunk));
}
