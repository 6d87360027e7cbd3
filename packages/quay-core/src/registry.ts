// Routing table from connection IDs to connections.

import { DispatchError } from "./errors.ts";
import { hex } from "./logging.ts";

/**
 * Maps connection IDs to the connection they route to.
 *
 * An ID routes to at most one connection; a connection may hold any number
 * of IDs at once, and the registry keeps that reverse mapping too so a
 * connection's IDs can be listed or evicted together.
 */
export class ConnectionRegistry<C extends object> {
  private byId = new Map<string, C>();
  private idsByConnection = new Map<C, Set<string>>();

  lookup(connectionId: Uint8Array): C | undefined {
    return this.byId.get(hex(connectionId));
  }

  has(connectionId: Uint8Array): boolean {
    return this.byId.has(hex(connectionId));
  }

  /** Route `connectionId` to `connection`, replacing any previous route. */
  insert(connectionId: Uint8Array, connection: C): void {
    const key = hex(connectionId);
    const previous = this.byId.get(key);
    if (previous !== undefined && previous !== connection) {
      this.unlink(previous, key);
    }
    this.byId.set(key, connection);

    let ids = this.idsByConnection.get(connection);
    if (!ids) {
      ids = new Set();
      this.idsByConnection.set(connection, ids);
    }
    ids.add(key);
  }

  /**
   * Remove the route for `connectionId`.
   *
   * @throws DispatchError if the ID is not registered
   */
  remove(connectionId: Uint8Array): void {
    const key = hex(connectionId);
    const connection = this.byId.get(key);
    if (connection === undefined) {
      throw DispatchError.unknownConnectionId(connectionId);
    }
    this.byId.delete(key);
    this.unlink(connection, key);
  }

  /** IDs currently routing to `connection`, in insertion order. */
  idsOf(connection: C): Uint8Array[] {
    const ids = this.idsByConnection.get(connection);
    if (!ids) return [];
    return Array.from(ids, (key) => Uint8Array.from(Buffer.from(key, "hex")));
  }

  /** Remove every route to `connection`; returns how many were removed. */
  evict(connection: C): number {
    const ids = this.idsByConnection.get(connection);
    if (!ids) return 0;
    for (const key of ids) {
      this.byId.delete(key);
    }
    this.idsByConnection.delete(connection);
    return ids.size;
  }

  /** Number of registered IDs. */
  get size(): number {
    return this.byId.size;
  }

  private unlink(connection: C, key: string): void {
    const ids = this.idsByConnection.get(connection);
    if (!ids) return;
    ids.delete(key);
    if (ids.size === 0) {
      this.idsByConnection.delete(connection);
    }
  }
}
