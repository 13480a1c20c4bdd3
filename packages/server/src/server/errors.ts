export type ExchangeErrorCode =
  | "unknown_relay"
  | "unknown_method"
  | "duplicate_relay"
  | "invalid_relay"
  | "decode_error"
  | "unknown_connection"
  | "negotiation_failed";

export class ExchangeError extends Error {
  constructor(
    message: string,
    public readonly code: ExchangeErrorCode
  ) {
    super(message);
    this.name = "ExchangeError";
  }
}

export class UnknownRelayError extends ExchangeError {
  constructor(public readonly relayName: string) {
    super(`Relay '${relayName}' is not registered`, "unknown_relay");
    this.name = "UnknownRelayError";
  }
}

export class UnknownMethodError extends ExchangeError {
  constructor(
    public readonly relayName: string,
    public readonly method: string
  ) {
    super(`Method '${method}' does not exist on relay '${relayName}'`, "unknown_method");
    this.name = "UnknownMethodError";
  }
}

export class DuplicateRelayError extends ExchangeError {
  constructor(public readonly relayName: string) {
    super(`Relay '${relayName}' is already registered`, "duplicate_relay");
    this.name = "DuplicateRelayError";
  }
}

export class InvalidRelayError extends ExchangeError {
  constructor(message: string) {
    super(message, "invalid_relay");
    this.name = "InvalidRelayError";
  }
}

export class DecodeError extends ExchangeError {
  constructor(message: string) {
    super(message, "decode_error");
    this.name = "DecodeError";
  }
}

export class UnknownConnectionError extends ExchangeError {
  constructor(public readonly connectionId: string) {
    super(`Connection '${connectionId}' has not negotiated`, "unknown_connection");
    this.name = "UnknownConnectionError";
  }
}

export class NegotiationError extends ExchangeError {
  constructor(message: string) {
    super(message, "negotiation_failed");
    this.name = "NegotiationError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
