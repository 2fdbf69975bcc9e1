import type { NodeKey } from '../../infra/contracts/node-record.dto';

/** Base class for failures surfaced by the node RPC layer. */
export class NodeRpcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NodeRpcError';
    Object.setPrototypeOf(this, NodeRpcError.prototype);
  }
}

/** No live connection is bound to the node key. */
export class NodeNotConnectedError extends NodeRpcError {
  constructor(readonly nodeKey: NodeKey) {
    super(`Node ${nodeKey} not connected`);
    this.name = 'NodeNotConnectedError';
    Object.setPrototypeOf(this, NodeNotConnectedError.prototype);
  }
}

/** The node did not reply before the call's deadline. */
export class RpcTimeoutError extends NodeRpcError {
  constructor(
    readonly nodeKey: NodeKey,
    readonly callId: number,
    readonly timeoutMs: number,
  ) {
    super(`Node ${nodeKey} did not reply to call ${callId} within ${timeoutMs}ms`);
    this.name = 'RpcTimeoutError';
    Object.setPrototypeOf(this, RpcTimeoutError.prototype);
  }
}

/** The remote side answered with a JSON-RPC error object. */
export class RemoteRpcError extends NodeRpcError {
  constructor(
    readonly code: number,
    readonly remoteMessage: string,
    readonly data?: unknown,
  ) {
    super(`RPC Error ${code}: ${remoteMessage}`);
    this.name = 'RemoteRpcError';
    Object.setPrototypeOf(this, RemoteRpcError.prototype);
  }
}

/** A frame or envelope could not be interpreted. */
export class ProtocolError extends NodeRpcError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

/** Sending on the connection failed. */
export class TransportError extends NodeRpcError {
  constructor(
    message: string,
    readonly origin?: unknown,
  ) {
    super(message);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/** The node's connection went away while the call was pending. */
export class NodeDisconnectedError extends NodeRpcError {
  constructor(
    readonly nodeKey: NodeKey,
    readonly reason = 'connection closed',
  ) {
    super(`Node ${nodeKey} disconnected: ${reason}`);
    this.name = 'NodeDisconnectedError';
    Object.setPrototypeOf(this, NodeDisconnectedError.prototype);
  }
}

/** A required inbound parameter is absent or empty. */
export class MissingParameterError extends NodeRpcError {
  constructor(readonly parameter: string) {
    super(`Missing ${parameter} parameter`);
    this.name = 'MissingParameterError';
    Object.setPrototypeOf(this, MissingParameterError.prototype);
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
