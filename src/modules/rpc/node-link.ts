import { WebSocket, type RawData } from 'ws';
import { TransportError } from './rpc-errors';

/** One physical connection to a node, as seen by the registry and sessions. */
export interface NodeLink {
  readonly remoteAddress?: string;
  /** Resolves once the frame is handed to the socket; rejects with TransportError. */
  send(frame: string): Promise<void>;
  close(code: number, reason: string): void;
}

/** NodeLink over a `ws` WebSocket. */
export class WsNodeLink implements NodeLink {
  constructor(
    private readonly socket: WebSocket,
    readonly remoteAddress?: string,
  ) {}

  send(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new TransportError('Connection is not open'));
        return;
      }
      this.socket.send(frame, (err) => {
        if (err) reject(new TransportError(`Send failed: ${err.message}`, err));
        else resolve();
      });
    });
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }
}

/** Decode a ws message payload (possibly fragmented) as UTF-8 text. */
export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}
