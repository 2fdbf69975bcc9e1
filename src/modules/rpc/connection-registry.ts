import type { NodeKey } from '../../infra/contracts/node-record.dto';

/**
 * node key → currently active connection. At most one entry per key; a newer
 * connection for the same key replaces the older one.
 * All operations are synchronous, so they never interleave on the event loop.
 */
export class ConnectionRegistry<C extends object> {
  private readonly connections = new Map<NodeKey, C>();

  /**
   * Insert or overwrite the entry for key.
   * @returns The superseded connection when a different instance was on record
   */
  register(key: NodeKey, conn: C): C | undefined {
    const previous = this.connections.get(key);
    this.connections.set(key, conn);
    return previous !== undefined && previous !== conn ? previous : undefined;
  }

  get(key: NodeKey): C | undefined {
    return this.connections.get(key);
  }

  /**
   * Remove the entry only if conn is the instance on record. A stale connection's
   * teardown therefore cannot evict the connection that replaced it.
   * @returns true when the entry was removed
   */
  unregister(key: NodeKey, conn: C): boolean {
    if (this.connections.get(key) !== conn) return false;
    this.connections.delete(key);
    return true;
  }

  isConnected(key: NodeKey): boolean {
    return this.connections.has(key);
  }

  keys(): NodeKey[] {
    return [...this.connections.keys()];
  }

  get size(): number {
    return this.connections.size;
  }
}
