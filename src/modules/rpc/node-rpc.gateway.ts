import { Logger } from '@nestjs/common';
import {
  WebSocketGateway,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { WebSocket as WsWebSocket, type RawData } from 'ws';
import { IncomingMessage } from 'http';
import { InboundRequestDispatcher } from './inbound-dispatcher.service';
import { WsNodeLink, rawDataToString } from './node-link';
import { NodeRpcHub } from './node-rpc-hub.service';
import { NodeSession } from './node-session';
import { errorMessage } from './rpc-errors';

/**
 * NodeRpcGateway: WebSocket entry for device-controller nodes.
 * - One NodeSession per connection; frames are JSON-RPC 2.0 envelopes, one per text frame.
 * - Nodes register with `backend.register`, then answer calls issued through NodeRpcService.
 */
@WebSocketGateway({ path: '/ws/rpc' })
export class NodeRpcGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(NodeRpcGateway.name);
  private readonly sessions = new WeakMap<WsWebSocket, NodeSession>();

  constructor(
    private readonly hub: NodeRpcHub,
    private readonly dispatcher: InboundRequestDispatcher,
  ) {}

  handleConnection(client: WsWebSocket, request: IncomingMessage) {
    const link = new WsNodeLink(client, request.socket.remoteAddress);
    const session = new NodeSession(link, this.hub, this.dispatcher, this.logger);
    this.sessions.set(client, session);

    client.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        session.rejectBinaryFrame();
        return;
      }
      session.handleFrame(rawDataToString(data)).catch((e: unknown) => {
        this.logger.error(`Frame handling failed: ${errorMessage(e)}`);
      });
    });
    client.on('error', (e) => {
      this.logger.warn(`Connection error: ${e.message}`);
    });
  }

  handleDisconnect(client: WsWebSocket) {
    this.sessions.get(client)?.close();
    this.sessions.delete(client);
  }
}
