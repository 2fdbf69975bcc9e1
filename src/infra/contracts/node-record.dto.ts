/** Server-assigned node identifier, stable across reconnects. */
export type NodeKey = number;

/** Shared NodeRecord type for NodeStore implementations and the nodes API. */
export interface NodeRecord {
  id: NodeKey;
  /** Client-generated external identifier (opaque). */
  uuid: string;
  createdAt: Date;
  updatedAt: Date;
}
