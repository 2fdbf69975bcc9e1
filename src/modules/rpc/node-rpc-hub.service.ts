import { Inject, Injectable, Logger } from '@nestjs/common';
import { NODE_RPC_CONFIG, type NodeRpcConfig } from '../../infra/config/env.config';
import type { NodeKey } from '../../infra/contracts/node-record.dto';
import { ConnectionRegistry } from './connection-registry';
import type { NodeLink } from './node-link';
import { RequestCorrelator } from './request-correlator';
import { NodeDisconnectedError } from './rpc-errors';

export const SUPERSEDED_CLOSE_CODE = 4000;
const SUPERSEDED_REASON = 'Superseded by a newer connection';

/**
 * Owns the connection registry and the request correlator for the whole process.
 * Sessions bind/release through here so that the disconnect policy lives in one place.
 */
@Injectable()
export class NodeRpcHub {
  private readonly logger = new Logger(NodeRpcHub.name);
  readonly registry = new ConnectionRegistry<NodeLink>();
  readonly correlator = new RequestCorrelator();

  constructor(@Inject(NODE_RPC_CONFIG) private readonly config: NodeRpcConfig) {}

  /**
   * Make link the active connection for nodeKey. A different link already on record
   * is closed, and its pending calls failed when failPendingOnDisconnect is set.
   */
  bind(nodeKey: NodeKey, link: NodeLink): void {
    const superseded = this.registry.register(nodeKey, link);
    if (!superseded) return;
    this.logger.warn(`Node ${nodeKey} reconnected; closing superseded connection`);
    this.failPending(nodeKey, SUPERSEDED_REASON.toLowerCase());
    superseded.close(SUPERSEDED_CLOSE_CODE, SUPERSEDED_REASON);
  }

  /**
   * Drop nodeKey's entry if link is still the one on record.
   * @returns true when this link was the active connection
   */
  release(nodeKey: NodeKey, link: NodeLink): boolean {
    if (!this.registry.unregister(nodeKey, link)) return false;
    this.failPending(nodeKey, 'connection closed');
    return true;
  }

  private failPending(nodeKey: NodeKey, reason: string): void {
    if (!this.config.failPendingOnDisconnect) return;
    const failed = this.correlator.cancelAll(nodeKey, new NodeDisconnectedError(nodeKey, reason));
    if (failed > 0) {
      this.logger.warn(`Failed ${failed} pending call(s) for node ${nodeKey}: ${reason}`);
    }
  }
}
