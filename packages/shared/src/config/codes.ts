/**
 * Protocol code tables
 *
 * Server codes arrive in error replies, disconnect/unsubscribe pushes and
 * WebSocket close frames. Client codes are emitted locally with the
 * matching events.
 */

export const SERVER_ERROR_CODES = {
  INTERNAL: 100,
  UNAUTHORIZED: 101,
  UNKNOWN_CHANNEL: 102,
  PERMISSION_DENIED: 103,
  METHOD_NOT_FOUND: 104,
  ALREADY_SUBSCRIBED: 105,
  LIMIT_EXCEEDED: 106,
  BAD_REQUEST: 107,
  NOT_AVAILABLE: 108,
  TOKEN_EXPIRED: 109,
  EXPIRED: 110,
  TOO_MANY_REQUESTS: 111,
  UNRECOVERABLE_POSITION: 112,
} as const;

export const DISCONNECTED_CODES = {
  DISCONNECT_CALLED: 0,
  UNAUTHORIZED: 1,
  BAD_PROTOCOL: 2,
  MESSAGE_SIZE_LIMIT: 3,
} as const;

export const CONNECTING_CODES = {
  CONNECT_CALLED: 0,
  TRANSPORT_CLOSED: 1,
  NO_PING: 2,
  SUBSCRIBE_TIMEOUT: 3,
  UNSUBSCRIBE_ERROR: 4,
  TOKEN_REFRESH_FAILED: 5,
  TOO_MANY_MALFORMED_FRAMES: 6,
} as const;

export const SUBSCRIBING_CODES = {
  SUBSCRIBE_CALLED: 0,
  TRANSPORT_CLOSED: 1,
} as const;

export const UNSUBSCRIBED_CODES = {
  UNSUBSCRIBE_CALLED: 0,
  UNAUTHORIZED: 1,
  CLIENT_CLOSED: 2,
} as const;

export const ERROR_CODES = {
  TIMEOUT: 1,
  TRANSPORT_CLOSED: 2,
  CLIENT_DISCONNECTED: 3,
  CLIENT_CLOSED: 4,
  CLIENT_CONNECT_TOKEN: 5,
  CLIENT_REFRESH_TOKEN: 6,
  SUBSCRIPTION_UNSUBSCRIBED: 7,
  SUBSCRIPTION_SUBSCRIBE_TOKEN: 8,
  SUBSCRIPTION_REFRESH_TOKEN: 9,
  TRANSPORT_WRITE_ERROR: 10,
  CONNECTION_CLOSED: 11,
  BAD_CONFIGURATION: 12,
  CONNECT_REPLY_ERROR: 13,
  SUBSCRIBE_REPLY_ERROR: 14,
  MALFORMED_FRAME: 15,
} as const;

const CODE_MESSAGES: Record<string, string> = {
  'disconnected:0': 'disconnect called',
  'disconnected:1': 'unauthorized',
  'disconnected:2': 'bad protocol',
  'disconnected:3': 'message size limit exceeded',
  'connecting:0': 'connect called',
  'connecting:1': 'transport closed',
  'connecting:2': 'no ping',
  'connecting:3': 'subscribe timeout',
  'connecting:4': 'unsubscribe error',
  'connecting:5': 'token refresh failed',
  'connecting:6': 'too many malformed frames',
  'subscribing:0': 'subscribe called',
  'subscribing:1': 'transport closed',
  'unsubscribed:0': 'unsubscribe called',
  'unsubscribed:1': 'unauthorized',
  'unsubscribed:2': 'client closed',
};

export type CodeGroup = 'disconnected' | 'connecting' | 'subscribing' | 'unsubscribed';

/**
 * Human readable reason for a client-side code
 */
export function codeMessage(group: CodeGroup, code: number): string {
  return CODE_MESSAGES[`${group}:${code}`] ?? `code ${code}`;
}

/**
 * Server disconnect codes in 3500-3999 and 4500-4999 forbid reconnecting
 */
export function isTerminalDisconnectCode(code: number): boolean {
  return (code >= 3500 && code < 4000) || (code >= 4500 && code < 5000);
}

/**
 * Server unsubscribe codes below 2500 are final; the rest ask for resubscribe
 */
export function isTerminalUnsubscribeCode(code: number): boolean {
  return code < 2500;
}

export function isTokenExpired(code: number): boolean {
  return code === SERVER_ERROR_CODES.TOKEN_EXPIRED;
}

/**
 * Standard WebSocket close code for a frame above the peer's size limit
 */
export const WS_MESSAGE_TOO_BIG = 1009;
