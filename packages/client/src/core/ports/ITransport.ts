/**
 * Transport Port
 * One duplex connection delivering text frames in server order.
 */

export type TransportFrame =
  | { kind: 'message'; data: string }
  | { kind: 'closed'; code: number; reason: string }
  | { kind: 'error'; error: Error };

export interface FrameSink {
  /** Throws `SendError` once the session is closed */
  send(data: string): void;
}

export interface TransportSession extends FrameSink {
  readonly isOpen: boolean;
  /**
   * Frames in arrival order. The sequence ends after exactly one
   * `closed` or `error` frame and cannot be restarted.
   */
  receive(): AsyncIterable<TransportFrame>;
  /** Idempotent */
  close(code?: number, reason?: string): void;
}

export interface TransportOpenOptions {
  protocols?: string[];
}

export interface TransportFactory {
  /** Rejects with `ConnectError` */
  open(address: string, options?: TransportOpenOptions): Promise<TransportSession>;
}
