import { Inject, Injectable, Logger } from '@nestjs/common';
import { NODE_RPC_CONFIG, type NodeRpcConfig } from '../../infra/config/env.config';
import type { NodeKey } from '../../infra/contracts/node-record.dto';
import { buildNotification, buildRequest, encodeFrame, type JsonRpcParams } from './json-rpc';
import { NodeRpcHub } from './node-rpc-hub.service';
import { NodeNotConnectedError, ProtocolError, TransportError, errorMessage } from './rpc-errors';

/**
 * Outbound call gateway: the only way code outside the RPC module talks to nodes.
 */
@Injectable()
export class NodeRpcService {
  private readonly logger = new Logger(NodeRpcService.name);

  constructor(
    private readonly hub: NodeRpcHub,
    @Inject(NODE_RPC_CONFIG) private readonly config: NodeRpcConfig,
  ) {}

  isConnected(nodeKey: NodeKey): boolean {
    return this.hub.registry.isConnected(nodeKey);
  }

  connectedNodeKeys(): NodeKey[] {
    return this.hub.registry.keys().sort((a, b) => a - b);
  }

  /** Calls still awaiting a reply from the node. */
  pendingCalls(nodeKey: NodeKey): number {
    return this.hub.correlator.pendingCount(nodeKey);
  }

  /**
   * Send a request to the node and wait for its correlated reply.
   * Fails with NodeNotConnectedError before anything is allocated or sent when the
   * node has no live connection. Params that cannot be serialized fail with
   * ProtocolError and leave no pending record.
   * @returns The reply's result payload
   * @throws NodeNotConnectedError, RpcTimeoutError, RemoteRpcError, NodeDisconnectedError, TransportError
   * @throws RangeError when timeoutMs is NaN or not positive
   */
  async call(
    nodeKey: NodeKey,
    method: string,
    params: JsonRpcParams = {},
    timeoutMs: number = this.config.callTimeoutMs,
  ): Promise<unknown> {
    const link = this.hub.registry.get(nodeKey);
    if (!link) {
      throw new NodeNotConnectedError(nodeKey);
    }
    if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`Invalid timeout ${timeoutMs}ms`);
    }
    const { correlator } = this.hub;
    const { callId } = correlator.beginCall(nodeKey);
    let frame: string;
    try {
      frame = encodeFrame(buildRequest(method, params, callId));
    } catch (err) {
      correlator.discard(nodeKey, callId);
      throw new ProtocolError(`Cannot encode ${method} params: ${errorMessage(err)}`);
    }
    const reply = correlator.awaitCall(nodeKey, callId, timeoutMs);
    link.send(frame).catch((err: unknown) => {
      const error = err instanceof TransportError ? err : new TransportError(errorMessage(err), err);
      correlator.fail(nodeKey, callId, error);
    });
    return reply;
  }

  /**
   * Fire-and-forget notification. Only a missing connection is reported;
   * send failures are logged and swallowed.
   * @throws NodeNotConnectedError
   */
  async notify(nodeKey: NodeKey, method: string, params: JsonRpcParams = {}): Promise<void> {
    const link = this.hub.registry.get(nodeKey);
    if (!link) {
      throw new NodeNotConnectedError(nodeKey);
    }
    try {
      await link.send(encodeFrame(buildNotification(method, params)));
    } catch (err) {
      this.logger.warn(`Notification ${method} to node ${nodeKey} failed: ${errorMessage(err)}`);
    }
  }
}
