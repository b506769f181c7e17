import WebSocket, { type RawData } from 'ws';
import type {
  TransportFactory,
  TransportFrame,
  TransportOpenOptions,
  TransportSession,
} from '../../core/ports/ITransport.js';
import { FrameQueue } from '../../core/FrameQueue.js';
import { ConnectError, ProtocolError, SendError } from '../../core/errors.js';

export interface WsTransportOptions {
  /** Opening handshake timeout in ms (default: 10000) */
  handshakeTimeoutMs?: number;
  /** Extra HTTP headers for the upgrade request */
  headers?: Record<string, string>;
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Session over an open `ws` socket
 */
class WsSession implements TransportSession {
  private readonly queue = new FrameQueue();
  private closeRequested = false;
  private receiving = false;
  private lastError: Error | null = null;

  constructor(private readonly ws: WebSocket) {
    ws.on('message', (data: RawData) => {
      this.queue.push({ kind: 'message', data: rawDataToString(data) });
    });

    ws.on('error', (err: Error) => {
      // 'close' always follows; report the error there
      this.lastError = err;
    });

    ws.on('close', (code: number, reason: Buffer) => {
      const frame: TransportFrame = this.lastError && !this.closeRequested
        ? { kind: 'error', error: this.lastError }
        : { kind: 'closed', code, reason: reason.toString('utf8') };
      this.queue.push(frame);
    });
  }

  get isOpen(): boolean {
    return !this.closeRequested && this.ws.readyState === WebSocket.OPEN;
  }

  send(data: string): void {
    if (!this.isOpen) {
      throw new SendError('WebSocket is not open');
    }
    this.ws.send(data);
  }

  receive(): AsyncIterable<TransportFrame> {
    if (this.receiving) {
      throw new ProtocolError('receive() can only be called once per session');
    }
    this.receiving = true;
    return this.queue.drain();
  }

  close(code = 1000, reason = ''): void {
    if (this.closeRequested) return;
    this.closeRequested = true;
    if (this.ws.readyState === WebSocket.CLOSED || this.ws.readyState === WebSocket.CLOSING) {
      return;
    }
    this.ws.close(code, reason);
  }
}

/**
 * Transport factory backed by the `ws` package
 */
export class WsTransport implements TransportFactory {
  private readonly handshakeTimeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: WsTransportOptions = {}) {
    this.handshakeTimeoutMs = options.handshakeTimeoutMs || 10000;
    this.headers = options.headers || {};
  }

  open(address: string, options: TransportOpenOptions = {}): Promise<TransportSession> {
    return new Promise((resolve, reject) => {
      let settled = false;
      let ws: WebSocket;

      try {
        ws = new WebSocket(address, options.protocols ?? [], {
          handshakeTimeout: this.handshakeTimeoutMs,
          headers: this.headers,
        });
      } catch (err) {
        reject(new ConnectError(`Invalid address ${address}`, { cause: err }));
        return;
      }

      ws.on('error', (err: Error) => {
        if (settled) return;
        settled = true;
        reject(new ConnectError(`Failed to connect to ${address}: ${err.message}`, { cause: err }));
      });

      ws.once('open', () => {
        if (settled) return;
        settled = true;
        resolve(new WsSession(ws));
      });
    });
  }
}
