import type { JsonValue, StreamPosition, StreamPositionShape } from '@pushline/shared';

export interface ClientInfo {
  client: string;
  user: string;
  connInfo?: unknown;
  chanInfo?: unknown;
}

export interface Publication {
  channel: string;
  data: unknown;
  /** 0 when the channel keeps no history */
  offset: number;
  info?: ClientInfo;
  tags?: Record<string, string>;
  /**
   * Set on the first publication delivered after a resubscribe that
   * tried to recover; `false` means messages may have been missed.
   */
  recovered?: boolean;
}

export interface SubscribedContext {
  channel: string;
  recoverable: boolean;
  positioned: boolean;
  position: StreamPosition | null;
  wasRecovering: boolean;
  recovered: boolean;
  data?: unknown;
}

export interface GapContext {
  channel: string;
  /** Last position seen before the connection dropped */
  lastPosition: StreamPosition;
  /** Where the server stream stands now */
  currentPosition: StreamPosition | null;
}

export interface SubscribingContext {
  channel: string;
  code: number;
  reason: string;
}

export interface UnsubscribedContext {
  channel: string;
  code: number;
  reason: string;
}

export interface SubscriptionErrorContext {
  channel: string;
  code: number;
  error: Error;
}

export interface PresenceEventContext {
  channel: string;
  info: ClientInfo;
}

export type PublicationHandler = (publication: Publication) => void;

export interface SubscriptionHandlers {
  onPublication?: PublicationHandler;
  onSubscribed?: (ctx: SubscribedContext) => void;
  onSubscribing?: (ctx: SubscribingContext) => void;
  onGap?: (ctx: GapContext) => void;
  onJoin?: (ctx: PresenceEventContext) => void;
  onLeave?: (ctx: PresenceEventContext) => void;
  onUnsubscribed?: (ctx: UnsubscribedContext) => void;
  onError?: (ctx: SubscriptionErrorContext) => void;
}

export interface SubscribeOptions {
  /** Keep the subscription across reconnects and close() (default: true) */
  resubscribe?: boolean;
  /** Static subscription token for protected channels */
  token?: string;
  /** Fetches a subscription token; called again when it expires */
  getToken?: (channel: string) => Promise<string>;
  /** Recover from this position on the first subscribe */
  since?: StreamPositionShape;
  /** Custom subscribe data passed to the server */
  data?: JsonValue;
}

export interface HistoryOptions {
  limit?: number;
  since?: StreamPositionShape;
  reverse?: boolean;
}

/** The server acknowledges a publish with an empty result */
export type PublishResult = Record<string, never>;

export interface HistoryResult {
  publications: Publication[];
  offset: number;
  epoch: string;
}

export interface PresenceResult {
  clients: Record<string, ClientInfo>;
}

export interface PresenceStatsResult {
  numClients: number;
  numUsers: number;
}

export interface RpcResult {
  data: unknown;
}

/**
 * Channel commands a `Subscription` issues on behalf of its channel
 */
export interface ChannelCommands {
  publish(channel: string, data: JsonValue): Promise<PublishResult>;
  history(channel: string, options?: HistoryOptions): Promise<HistoryResult>;
  presence(channel: string): Promise<PresenceResult>;
  presenceStats(channel: string): Promise<PresenceStatsResult>;
}
