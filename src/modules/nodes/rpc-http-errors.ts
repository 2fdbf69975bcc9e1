import {
  BadGatewayException,
  GatewayTimeoutException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import {
  NodeDisconnectedError,
  NodeNotConnectedError,
  RemoteRpcError,
  RpcTimeoutError,
  TransportError,
  errorMessage,
} from '../rpc/rpc-errors';

/**
 * Translate a node RPC failure into the HTTP error returned to API clients.
 * - not connected: 404
 * - timeout: 504
 * - remote error / transport / disconnect: 502
 */
export function toHttpException(err: unknown): HttpException {
  if (err instanceof HttpException) return err;
  if (err instanceof NodeNotConnectedError) return new NotFoundException('Node not connected');
  if (err instanceof RpcTimeoutError) return new GatewayTimeoutException(err.message);
  if (
    err instanceof RemoteRpcError ||
    err instanceof TransportError ||
    err instanceof NodeDisconnectedError
  ) {
    return new BadGatewayException(err.message);
  }
  return new InternalServerErrorException(errorMessage(err));
}
