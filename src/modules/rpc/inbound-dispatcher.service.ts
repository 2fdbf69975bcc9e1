import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { isRecord } from '../../infra/contracts/json';
import { NODE_STORE, type NodeStore } from '../../infra/storage/node-store.interface';
import { RegisterNodeParamsDto, type RegisterNodeResult } from './dto/register-node-params.dto';
import {
  JsonRpcErrorCodes,
  buildError,
  buildResult,
  type InboundRequest,
  type JsonRpcResponse,
} from './json-rpc';
import type { InboundRequestHandler, RegistrationContext } from './node-session';
import { MissingParameterError, errorMessage } from './rpc-errors';

/** Method a node calls to obtain its node key. */
export const REGISTER_METHOD = 'backend.register' as const;

type MethodHandler = (params: unknown, context: RegistrationContext) => Promise<unknown>;

/**
 * Handles node-initiated calls. Only `backend.register` is exposed; anything else
 * gets METHOD_NOT_FOUND, and a throwing handler gets INTERNAL_ERROR with its message.
 */
@Injectable()
export class InboundRequestDispatcher implements InboundRequestHandler {
  private readonly logger = new Logger(InboundRequestDispatcher.name);
  private readonly handlers = new Map<string, MethodHandler>([
    [REGISTER_METHOD, (params, context) => this.register(params, context)],
  ]);

  constructor(@Inject(NODE_STORE) private readonly nodeStore: NodeStore) {}

  async dispatch(request: InboundRequest, context: RegistrationContext): Promise<JsonRpcResponse | null> {
    const id = request.id ?? null;
    const handler = this.handlers.get(request.method);
    if (!handler) {
      this.logger.warn(`Unknown method ${request.method}`);
      return request.id === undefined
        ? null
        : buildError(id, JsonRpcErrorCodes.METHOD_NOT_FOUND, 'Method not found');
    }
    try {
      const result = await handler(request.params, context);
      return request.id === undefined ? null : buildResult(id, result);
    } catch (err) {
      this.logger.warn(`${request.method} failed: ${errorMessage(err)}`);
      return request.id === undefined
        ? null
        : buildError(id, JsonRpcErrorCodes.INTERNAL_ERROR, errorMessage(err));
    }
  }

  /**
   * Resolve the node's uuid to its key and bind the calling connection under it.
   * @throws MissingParameterError when uuid is absent or empty
   */
  async register(params: unknown, context: RegistrationContext): Promise<RegisterNodeResult> {
    const dto = plainToInstance(RegisterNodeParamsDto, isRecord(params) ? params : {});
    const errors = await validate(dto);
    if (errors.length > 0) {
      throw new MissingParameterError('uuid');
    }
    const node = await this.nodeStore.findOrCreate(dto.uuid);
    context.bind(node.id);
    this.logger.log(`Node ${node.id} registered (uuid=${dto.uuid})`);
    return { id: node.id };
  }
}
