import type { LoggerService } from '@nestjs/common';
import type { NodeKey } from '../../infra/contracts/node-record.dto';
import { encodeFrame, parseFrame, type InboundRequest, type JsonRpcResponse } from './json-rpc';
import type { NodeLink } from './node-link';
import type { NodeRpcHub } from './node-rpc-hub.service';
import { TransportError, errorMessage } from './rpc-errors';

/** accepted → active (after registration) → closed. No transitions out of closed. */
export type NodeSessionState = 'accepted' | 'active' | 'closed';

/** What an inbound handler may do to the connection that invoked it. */
export interface RegistrationContext {
  readonly nodeKey: NodeKey | null;
  bind(nodeKey: NodeKey): void;
}

/** Handles node-initiated requests. Returns null when no reply is due. */
export interface InboundRequestHandler {
  dispatch(request: InboundRequest, context: RegistrationContext): Promise<JsonRpcResponse | null>;
}

export type SessionLogger = Pick<LoggerService, 'log' | 'warn' | 'error'>;

/**
 * One physical node connection: classifies inbound frames, routes requests to the
 * dispatcher and replies to the correlator, and releases the registry entry on close.
 * A bad frame or a failed dispatch never ends the session.
 */
export class NodeSession implements RegistrationContext {
  private state: NodeSessionState = 'accepted';
  private boundKey: NodeKey | null = null;

  constructor(
    readonly link: NodeLink,
    private readonly hub: NodeRpcHub,
    private readonly dispatcher: InboundRequestHandler,
    private readonly logger: SessionLogger,
  ) {}

  get nodeKey(): NodeKey | null {
    return this.boundKey;
  }

  get currentState(): NodeSessionState {
    return this.state;
  }

  async handleFrame(raw: string): Promise<void> {
    if (this.state === 'closed') return;
    const frame = parseFrame(raw);
    switch (frame.kind) {
      case 'request':
        await this.handleRequest(frame.request);
        return;
      case 'response':
        this.handleResponse(frame.response);
        return;
      case 'invalid':
        this.logger.warn(`Invalid request from ${this.describe()}: ${frame.reason}`);
        await this.sendReply(encodeFrame(frame.reply), 'invalid request');
        return;
      case 'malformed':
        this.logger.warn(`Dropping malformed frame from ${this.describe()}: ${frame.reason}`);
        return;
    }
  }

  /** Frames that are not text never carry envelopes. */
  rejectBinaryFrame(): void {
    this.logger.warn(`Dropping binary frame from ${this.describe()}`);
  }

  /**
   * Bind this connection under nodeKey and become active.
   * Re-registering under another key releases the previous one first.
   * @throws TransportError when the connection already closed (e.g. mid-registration)
   */
  bind(nodeKey: NodeKey): void {
    if (this.state === 'closed') {
      throw new TransportError('Connection closed before registration completed');
    }
    if (this.boundKey !== null && this.boundKey !== nodeKey) {
      this.hub.release(this.boundKey, this.link);
    }
    this.hub.bind(nodeKey, this.link);
    this.boundKey = nodeKey;
    this.state = 'active';
  }

  /** Enter the closed state and release the registry entry if this link still owns it. */
  close(): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    if (this.boundKey !== null && this.hub.release(this.boundKey, this.link)) {
      this.logger.log(`Node ${this.boundKey} disconnected`);
    }
  }

  private async handleRequest(request: InboundRequest): Promise<void> {
    const reply = await this.dispatcher.dispatch(request, this);
    if (!reply) return;
    await this.sendReply(encodeFrame(reply), request.method);
  }

  private async sendReply(frame: string, label: string): Promise<void> {
    try {
      await this.link.send(frame);
    } catch (err) {
      this.logger.warn(`Reply to ${label} for ${this.describe()} not sent: ${errorMessage(err)}`);
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    if (this.boundKey === null) {
      this.logger.warn(`Dropping response id=${String(response.id)} from unregistered connection`);
      return;
    }
    this.hub.correlator.resolve(this.boundKey, response.id, response);
  }

  private describe(): string {
    if (this.boundKey !== null) return `node ${this.boundKey}`;
    return this.link.remoteAddress ? `unregistered connection ${this.link.remoteAddress}` : 'unregistered connection';
  }
}
