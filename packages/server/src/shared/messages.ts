import { z } from 'zod'

export const TRANSPORT_KINDS = ['websocket', 'longpoll'] as const
export type TransportKind = (typeof TRANSPORT_KINDS)[number]

export const TransportKindSchema = z.enum(TRANSPORT_KINDS)

// Wire keys are single letters to keep frames small:
// S = server call flag, R = relay, M = method, A = arguments, C = connection id.
export const EnvelopeWireSchema = z.object({
  S: z.boolean().optional().default(false),
  R: z.string().min(1),
  M: z.string().min(1),
  A: z.array(z.unknown()).optional().default([]),
  C: z.string().optional().default(''),
})

export type EnvelopeWire = z.infer<typeof EnvelopeWireSchema>

export interface Envelope {
  isServerCall: boolean
  relayName: string
  method: string
  arguments: unknown[]
  connectionID: string
}

/**
 * Outbound shorthand delivered to browser stubs. The stub only needs the
 * relay, method and arguments, so `S` and `C` are omitted.
 */
export const ClientCallWireSchema = z.object({
  R: z.string(),
  M: z.string(),
  A: z.array(z.unknown()),
})

export type ClientCallWire = z.infer<typeof ClientCallWireSchema>

/** Long-poll payload: one client call, or `{}` when the poll timed out. */
export type PollPayload = ClientCallWire | Record<string, never>

export const NegotiationRequestSchema = z.object({
  T: z.string().trim().toLowerCase().optional(),
})

export type NegotiationRequest = z.infer<typeof NegotiationRequestSchema>

export interface NegotiationResponse {
  ConnectionID: string
}

export function toWire(envelope: Envelope): EnvelopeWire {
  return {
    S: envelope.isServerCall,
    R: envelope.relayName,
    M: envelope.method,
    A: envelope.arguments,
    C: envelope.connectionID,
  }
}

export function fromWire(wire: EnvelopeWire): Envelope {
  return {
    isServerCall: wire.S,
    relayName: wire.R,
    method: wire.M,
    arguments: wire.A,
    connectionID: wire.C,
  }
}

export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify(toWire(envelope))
}

export function encodeClientCall(relayName: string, method: string, args: unknown[]): string {
  const wire: ClientCallWire = { R: relayName, M: method, A: args }
  return JSON.stringify(wire)
}

export function rawDataToString(raw: unknown): string {
  if (typeof raw === 'string') return raw
  if (Buffer.isBuffer(raw)) return raw.toString('utf8')
  if (Array.isArray(raw) && raw.every((chunk): chunk is Buffer => Buffer.isBuffer(chunk))) {
    return Buffer.concat(raw).toString('utf8')
  }
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8')
  return String(raw)
}
