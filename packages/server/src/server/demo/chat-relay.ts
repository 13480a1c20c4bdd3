import type { RelayHandle } from "../relay-registry.js";

/**
 * Sample relay served by the CLI. Browsers call `broadcast`, `whisper`,
 * `join`, `leave` and `say`; the hub calls back `message` on their client proxy.
 */
export class Chat {
  Broadcast(relay: RelayHandle, text: string): void {
    relay.clients.all("Message", relay.connectionID, text);
  }

  Whisper(relay: RelayHandle, connectionId: string, text: string): void {
    relay.clients.callClient(connectionId, "Message", relay.connectionID, text);
  }

  Join(relay: RelayHandle, room: string): void {
    relay.clients.addToGroup(room);
    relay.clients.callGroupExcept(room, "Joined", relay.connectionID, room);
  }

  Leave(relay: RelayHandle, room: string): void {
    relay.clients.callGroupExcept(room, "Left", relay.connectionID, room);
    relay.clients.removeFromGroup(room);
  }

  Say(relay: RelayHandle, room: string, text: string): void {
    relay.clients.callGroup(room, "Message", relay.connectionID, text);
  }
}
