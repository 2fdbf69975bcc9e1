import { BadGatewayException, BadRequestException, Injectable, Logger } from '@nestjs/common';
import type { NodeKey } from '../../infra/contracts/node-record.dto';
import { isRecord } from '../../infra/contracts/json';
import type { JsonRpcParams } from '../rpc/json-rpc';
import { NodeRpcService } from '../rpc/node-rpc.service';
import { NodeNotConnectedError } from '../rpc/rpc-errors';
import { toHttpException } from './rpc-http-errors';

/** Methods the control plane invokes on nodes. */
export const NodeMethods = {
  GET_RPC_METHODS: 'node.get_rpc_methods',
  GET_DEVICE_TYPES: 'node.get_device_types',
  GET_TELEOP_GROUP_TYPES: 'node.get_teleop_group_types',
  TEST_DEVICE: 'node.test_device',
  START_TELEOP_GROUP: 'node.start_teleop_group',
  STOP_TELEOP_GROUP: 'node.stop_teleop_group',
  UPDATE_CONFIG: 'node.update_config',
} as const;

export interface DeviceTestRequest {
  category: string;
  type: string;
  config: Record<string, unknown>;
}

/**
 * Node commands used by the HTTP API. Wraps NodeRpcService and turns RPC failures
 * into HTTP exceptions.
 */
@Injectable()
export class NodeCommandsService {
  private readonly logger = new Logger(NodeCommandsService.name);

  constructor(private readonly nodeRpc: NodeRpcService) {}

  /** Forward an arbitrary call. */
  async call(nodeKey: NodeKey, method: string, params: JsonRpcParams = {}, timeoutMs?: number): Promise<unknown> {
    try {
      return await this.nodeRpc.call(nodeKey, method, params, timeoutMs);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  async notify(nodeKey: NodeKey, method: string, params: JsonRpcParams = {}): Promise<void> {
    try {
      await this.nodeRpc.notify(nodeKey, method, params);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  /** RPC methods the node exposes, with their parameter descriptions. */
  async getRpcMethods(nodeKey: NodeKey): Promise<{ methods: unknown }> {
    const result = await this.call(nodeKey, NodeMethods.GET_RPC_METHODS);
    if (!isRecord(result) || !('methods' in result)) {
      throw new BadGatewayException('Invalid method list from node');
    }
    return { methods: result.methods };
  }

  async getDeviceTypes(nodeKey: NodeKey): Promise<Record<string, unknown>> {
    const result = await this.call(nodeKey, NodeMethods.GET_DEVICE_TYPES);
    if (!isRecord(result)) {
      throw new BadGatewayException('Invalid device type list from node');
    }
    return result;
  }

  /** Device categories are the top-level keys of the node's device type table. */
  async getDeviceCategories(nodeKey: NodeKey): Promise<string[]> {
    return Object.keys(await this.getDeviceTypes(nodeKey));
  }

  async getTeleopGroupTypes(nodeKey: NodeKey): Promise<unknown> {
    return this.call(nodeKey, NodeMethods.GET_TELEOP_GROUP_TYPES);
  }

  async testDevice(nodeKey: NodeKey, request: DeviceTestRequest): Promise<Record<string, unknown>> {
    const result = await this.call(nodeKey, NodeMethods.TEST_DEVICE, {
      category: request.category,
      type: request.type,
      config: request.config,
    });
    return requireSuccess(result, 'Device test failed');
  }

  async startTeleopGroup(nodeKey: NodeKey, groupId: number): Promise<Record<string, unknown>> {
    const result = await this.call(nodeKey, NodeMethods.START_TELEOP_GROUP, { id: groupId });
    return requireSuccess(result, 'Failed to start teleop group');
  }

  async stopTeleopGroup(nodeKey: NodeKey, groupId: number): Promise<Record<string, unknown>> {
    const result = await this.call(nodeKey, NodeMethods.STOP_TELEOP_GROUP, { id: groupId });
    return requireSuccess(result, 'Failed to stop teleop group');
  }

  /**
   * Ask the node to reload its configuration. Offline nodes pick it up on their next
   * registration, so a missing connection is not an error here.
   * @returns Whether the notification was handed to a live connection
   */
  async refreshConfig(nodeKey: NodeKey): Promise<boolean> {
    try {
      await this.nodeRpc.notify(nodeKey, NodeMethods.UPDATE_CONFIG);
      return true;
    } catch (err) {
      if (err instanceof NodeNotConnectedError) {
        this.logger.log(`Node ${nodeKey} offline; config refresh skipped`);
        return false;
      }
      throw toHttpException(err);
    }
  }
}

/** Command results must be objects with success === true. */
function requireSuccess(result: unknown, failureMessage: string): Record<string, unknown> {
  if (!isRecord(result) || result.success !== true) {
    throw new BadRequestException(failureMessage);
  }
  return result;
}
