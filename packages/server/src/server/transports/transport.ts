import type { Envelope, TransportKind } from "../../shared/messages.js";
import type { RelayHandleIdentity } from "../relay-registry.js";

/**
 * Delivery mechanism for one transport kind. Implementations own their
 * connection state; the exchange only ever sees connection ids.
 */
export interface Transport {
  readonly kind: TransportKind;
  /**
   * Queue a client call for the connection carried by `handle`.
   * Unknown connection ids are a silent no-op.
   */
  callClientFunction(handle: RelayHandleIdentity, method: string, args: unknown[]): void;
  hasConnection(connectionID: string): boolean;
  connectionCount(): number;
  close(): Promise<void>;
}

/** Callbacks a transport uses to hand work back to the exchange. */
export interface TransportHost {
  handleInbound(envelope: Envelope, receivedOn: string): void;
  connectionClosed(connectionID: string, kind: TransportKind): void;
}
