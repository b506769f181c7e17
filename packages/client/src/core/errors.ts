/**
 * Client error taxonomy
 *
 * Every error carries a stable `code` so callers can branch without
 * instanceof checks across bundles.
 */

export type PushlineErrorCode =
  | 'CONNECT_ERROR'
  | 'SEND_ERROR'
  | 'AUTH_ERROR'
  | 'TIMEOUT'
  | 'CONNECTION_LOST'
  | 'MALFORMED_FRAME'
  | 'ALREADY_SUBSCRIBED'
  | 'NOT_SUBSCRIBED'
  | 'CANCELLED'
  | 'REPLY_ERROR'
  | 'UNAUTHORIZED'
  | 'PROTOCOL_ERROR'
  | 'INVALID_TRANSITION'
  | 'BAD_CONFIGURATION';

export class PushlineError extends Error {
  public readonly code: PushlineErrorCode;

  constructor(code: PushlineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PushlineError';
    this.code = code;
  }
}

/** Socket could not be established */
export class ConnectError extends PushlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECT_ERROR', message, options);
    this.name = 'ConnectError';
  }
}

/** Write attempted on a closed socket */
export class SendError extends PushlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SEND_ERROR', message, options);
    this.name = 'SendError';
  }
}

/** Handshake rejected or unanswered; terminal for the current session */
export class AuthError extends PushlineError {
  public readonly serverCode?: number;

  constructor(message: string, serverCode?: number, options?: { cause?: unknown }) {
    super('AUTH_ERROR', message, options);
    this.name = 'AuthError';
    this.serverCode = serverCode;
  }
}

export class TimeoutError extends PushlineError {
  constructor(message: string) {
    super('TIMEOUT', message);
    this.name = 'TimeoutError';
  }
}

/** Transport went away while the request was in flight */
export class ConnectionLostError extends PushlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_LOST', message, options);
    this.name = 'ConnectionLostError';
  }
}

export class MalformedFrameError extends PushlineError {
  constructor(message: string) {
    super('MALFORMED_FRAME', message);
    this.name = 'MalformedFrameError';
  }
}

export class AlreadySubscribedError extends PushlineError {
  constructor(public readonly channel: string) {
    super('ALREADY_SUBSCRIBED', `Subscription to channel "${channel}" is already registered`);
    this.name = 'AlreadySubscribedError';
  }
}

export class NotSubscribedError extends PushlineError {
  constructor(public readonly channel: string) {
    super('NOT_SUBSCRIBED', `No subscription to channel "${channel}"`);
    this.name = 'NotSubscribedError';
  }
}

/** Operation aborted by an explicit close() */
export class CancelledError extends PushlineError {
  constructor(message = 'Operation cancelled by client close') {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

/** Error object returned by the server in a reply */
export class ReplyError extends PushlineError {
  constructor(
    public readonly serverCode: number,
    message: string,
    public readonly temporary: boolean = false
  ) {
    super('REPLY_ERROR', message);
    this.name = 'ReplyError';
  }
}

/** Thrown by token providers to stop further attempts */
export class UnauthorizedError extends PushlineError {
  constructor(message = 'Unauthorized') {
    super('UNAUTHORIZED', message);
    this.name = 'UnauthorizedError';
  }
}

export class ProtocolError extends PushlineError {
  constructor(message: string) {
    super('PROTOCOL_ERROR', message);
    this.name = 'ProtocolError';
  }
}

export class InvalidTransitionError extends PushlineError {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super('INVALID_TRANSITION', `Invalid connection state transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigurationError extends PushlineError {
  constructor(message: string) {
    super('BAD_CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
