import type pino from "pino";
import type { TransportKind } from "../shared/messages.js";

export const GLOBAL_GROUP = "Global";

export interface ClientRecord {
  readonly connectionID: string;
  readonly transport: TransportKind;
}

/**
 * Connection and group membership for the exchange.
 *
 * All reads and writes of membership go through this class and every
 * operation runs to completion synchronously, so the event loop is the one
 * lock guarding the maps: no caller can observe a half-applied change, and no
 * `await` ever happens while membership is being read or written. Broadcasts
 * iterate a snapshot taken at the start of the call.
 *
 * `Global` holds every negotiated client and doubles as the id -> record
 * index. Named groups are created on first join and dropped once empty.
 */
export class GroupRegistry {
  private readonly logger: pino.Logger;
  private readonly groups = new Map<string, ClientRecord[]>();

  constructor(logger: pino.Logger) {
    this.logger = logger.child({ module: "group-registry" });
  }

  addClient(connectionID: string, transport: TransportKind): ClientRecord {
    const existing = this.lookupClient(connectionID);
    if (existing) {
      return existing;
    }
    const client: ClientRecord = { connectionID, transport };
    this.members(GLOBAL_GROUP, true).push(client);
    this.logger.debug({ connectionId: connectionID, transport }, "client_added");
    return client;
  }

  /** O(n) scan of `Global`. */
  lookupClient(connectionID: string): ClientRecord | undefined {
    return this.groups.get(GLOBAL_GROUP)?.find((client) => client.connectionID === connectionID);
  }

  /**
   * Join a group by connection id. Idempotent; returns false when the id has
   * not negotiated.
   */
  addToGroup(group: string, connectionID: string): boolean {
    const client = this.lookupClient(connectionID);
    if (!client) {
      this.logger.debug({ connectionId: connectionID, group }, "group_join_unknown_client");
      return false;
    }
    if (this.indexInGroup(group, connectionID) === -1) {
      this.members(group, true).push(client);
      this.logger.debug({ connectionId: connectionID, group }, "group_joined");
    }
    return true;
  }

  /** Leave a group by connection id. Idempotent; empty groups are deleted. */
  removeFromGroup(group: string, connectionID: string): boolean {
    const index = this.indexInGroup(group, connectionID);
    if (index === -1) {
      return false;
    }
    const members = this.members(group, false);
    members.splice(index, 1);
    if (members.length === 0) {
      this.groups.delete(group);
    }
    this.logger.debug({ connectionId: connectionID, group }, "group_left");
    return true;
  }

  /** Drop a connection from every group, `Global` included. */
  removeFromAllGroups(connectionID: string): void {
    for (const group of [...this.groups.keys()]) {
      this.removeFromGroup(group, connectionID);
    }
    this.logger.debug({ connectionId: connectionID }, "client_removed_from_all_groups");
  }

  /** Runs `fn` over a snapshot of the group taken before the first call. */
  forEachInGroup(group: string, fn: (client: ClientRecord) => void): number {
    const snapshot = this.snapshot(group);
    for (const client of snapshot) {
      fn(client);
    }
    return snapshot.length;
  }

  snapshot(group: string): ClientRecord[] {
    return [...(this.groups.get(group) ?? [])];
  }

  isMember(group: string, connectionID: string): boolean {
    return this.indexInGroup(group, connectionID) !== -1;
  }

  groupNames(): string[] {
    return [...this.groups.keys()];
  }

  clientCount(): number {
    return this.groups.get(GLOBAL_GROUP)?.length ?? 0;
  }

  private indexInGroup(group: string, connectionID: string): number {
    return this.groups.get(group)?.findIndex((client) => client.connectionID === connectionID) ?? -1;
  }

  private members(group: string, create: boolean): ClientRecord[] {
    let members = this.groups.get(group);
    if (!members) {
      members = [];
      if (create) {
        this.groups.set(group, members);
      }
    }
    return members;
  }
}
