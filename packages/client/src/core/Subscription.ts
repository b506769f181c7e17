import type { JsonValue, StreamPosition } from '@pushline/shared';
import type {
  ChannelCommands,
  HistoryOptions,
  HistoryResult,
  PresenceResult,
  PresenceStatsResult,
  PublishResult,
  SubscriptionHandlers,
} from './types.js';

export type SubscriptionState = 'suspended' | 'subscribing' | 'subscribed' | 'unsubscribed';

export interface ReadyWaiter {
  resolve(): void;
  reject(error: Error): void;
}

/**
 * Mutable per-channel state owned by the SubscriptionManager
 */
export interface SubscriptionRecord {
  readonly channel: string;
  readonly handlers: SubscriptionHandlers;
  readonly resubscribe: boolean;
  readonly getToken?: (channel: string) => Promise<string>;
  readonly data?: JsonValue;
  state: SubscriptionState;
  position: StreamPosition | null;
  recoverable: boolean;
  token: string;
  /** Bumped on every subscribe attempt and suspension; stale replies compare against it */
  attempt: number;
  resubscribeAttempts: number;
  resubscribeTimer: NodeJS.Timeout | null;
  refreshTimer: NodeJS.Timeout | null;
  /** `recovered` flag owed to the next delivered publication */
  pendingRecovered: boolean | null;
  readonly readyWaiters: Set<ReadyWaiter>;
}

/**
 * Caller-facing view of one channel subscription
 */
export class Subscription {
  constructor(
    private readonly record: SubscriptionRecord,
    private readonly waitReady: (record: SubscriptionRecord, timeoutMs?: number) => Promise<void>,
    private readonly commands: ChannelCommands
  ) {}

  get channel(): string {
    return this.record.channel;
  }

  get state(): SubscriptionState {
    return this.record.state;
  }

  /** Recovery position; null until the server reports a recoverable stream */
  get position(): StreamPosition | null {
    return this.record.position;
  }

  get resubscribe(): boolean {
    return this.record.resubscribe;
  }

  isActive(): boolean {
    return this.record.state === 'subscribed';
  }

  /**
   * Resolves once subscribed; rejects with `TimeoutError` or when the
   * subscription is removed first.
   */
  ready(timeoutMs?: number): Promise<void> {
    return this.waitReady(this.record, timeoutMs);
  }

  // Channel commands wait for the subscription first

  async publish(data: JsonValue, timeoutMs?: number): Promise<PublishResult> {
    await this.ready(timeoutMs);
    return this.commands.publish(this.channel, data);
  }

  async history(options?: HistoryOptions, timeoutMs?: number): Promise<HistoryResult> {
    await this.ready(timeoutMs);
    return this.commands.history(this.channel, options);
  }

  async presence(timeoutMs?: number): Promise<PresenceResult> {
    await this.ready(timeoutMs);
    return this.commands.presence(this.channel);
  }

  async presenceStats(timeoutMs?: number): Promise<PresenceStatsResult> {
    await this.ready(timeoutMs);
    return this.commands.presenceStats(this.channel);
  }
}
