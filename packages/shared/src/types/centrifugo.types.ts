/**
 * Centrifugo Client Protocol Types
 * Based on the bidirectional client protocol (JSON encoding)
 */

/**
 * JSON-serializable payload. Binary payloads belong to the protobuf
 * encoding, which this client does not speak.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface StreamPositionShape {
  offset: number;
  epoch: string;
}

// Command params, keyed by the method name used on the wire
export interface ConnectParams {
  token?: string;
  data?: JsonValue;
  name?: string;
  version?: string;
}

export interface SubscribeParams {
  channel: string;
  token?: string;
  recover?: boolean;
  offset?: number;
  epoch?: string;
  data?: JsonValue;
}

export interface UnsubscribeParams {
  channel: string;
}

export interface PublishParams {
  channel: string;
  data: JsonValue;
}

export interface PresenceParams {
  channel: string;
}

export interface PresenceStatsParams {
  channel: string;
}

export interface HistoryParams {
  channel: string;
  limit?: number;
  since?: StreamPositionShape;
  reverse?: boolean;
}

export interface RpcParams {
  method: string;
  data: JsonValue;
}

export interface RefreshParams {
  token: string;
}

export interface SubRefreshParams {
  channel: string;
  token: string;
}

export interface ParamsMap {
  connect: ConnectParams;
  subscribe: SubscribeParams;
  unsubscribe: UnsubscribeParams;
  publish: PublishParams;
  presence: PresenceParams;
  presence_stats: PresenceStatsParams;
  history: HistoryParams;
  rpc: RpcParams;
  refresh: RefreshParams;
  sub_refresh: SubRefreshParams;
}

export type Method = keyof ParamsMap;

export const METHODS = [
  'connect',
  'subscribe',
  'unsubscribe',
  'publish',
  'presence',
  'presence_stats',
  'history',
  'rpc',
  'refresh',
  'sub_refresh',
] as const satisfies readonly Method[];

/**
 * Outgoing request. Serialized as `{ "id": id, "<method>": params }`.
 */
export interface Command<M extends Method = Method> {
  id: number;
  method: M;
  params: ParamsMap[M];
}

// Common error type
export interface CentrifugoError {
  code: number;
  message: string;
  temporary?: boolean;
}

/**
 * Reply to a command. `result` is the object under the method key,
 * still unvalidated at this point.
 */
export interface Reply {
  id: number;
  error?: CentrifugoError;
  method?: string;
  result?: unknown;
}
