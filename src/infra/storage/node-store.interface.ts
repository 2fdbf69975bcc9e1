import type { NodeKey, NodeRecord } from '../contracts/node-record.dto';

/** Filter for NodeStore.list. */
export interface NodeListFilter {
  uuid?: string;
}

/**
 * NodeStore: durable uuid → node key mapping.
 * The key is assigned once, on the first registration of a uuid, and never changes.
 */
export interface NodeStore {
  /**
   * Return the record for uuid, creating it when absent.
   * Concurrent calls for the same uuid resolve to the same record.
   * @param uuid - External node identifier
   */
  findOrCreate(uuid: string): Promise<NodeRecord>;
  /**
   * @param id - Node key
   * @returns Record or null when unknown
   */
  findById(id: NodeKey): Promise<NodeRecord | null>;
  /** All records ordered by key, optionally filtered. */
  list(filter?: NodeListFilter): Promise<NodeRecord[]>;
}

/** NestJS injection token for NodeStore. */
export const NODE_STORE = 'NodeStore' as const;
