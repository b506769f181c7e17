import {
  ERROR_CODES,
  StreamPosition,
  UNSUBSCRIBED_CODES,
  codeMessage,
  isTerminalUnsubscribeCode,
  isTokenExpired,
  type ClientInfoWire,
  type PublicationWire,
  type Push,
  type SubscribeParams,
  type SubscribeResult,
} from '@pushline/shared';
import type { ILogger } from './ports/ILogger.js';
import type { CommandDispatcher } from './CommandDispatcher.js';
import { backoffDelay, type BackoffRange, type RandomSource } from './backoff.js';
import { Subscription, type SubscriptionRecord } from './Subscription.js';
import type {
  ChannelCommands,
  ClientInfo,
  Publication,
  PublicationHandler,
  SubscribeOptions,
  SubscriptionHandlers,
} from './types.js';
import {
  AlreadySubscribedError,
  CancelledError,
  ConnectionLostError,
  NotSubscribedError,
  ProtocolError,
  ReplyError,
  TimeoutError,
  UnauthorizedError,
  toError,
} from './errors.js';

export interface SubscriptionManagerOptions {
  dispatcher: CommandDispatcher;
  /** Backs the channel-scoped commands on `Subscription` */
  commands: ChannelCommands;
  /** True only while the connection is in the `connected` state */
  isConnected: () => boolean;
  logger: ILogger;
  resubscribeBackoff: BackoffRange;
  /** Default wait for `Subscription.ready()` */
  timeoutMs: number;
  random?: RandomSource;
}

type ManagedRecord = SubscriptionRecord & { readonly subscription: Subscription };

export function toClientInfo(info: ClientInfoWire): ClientInfo {
  return {
    client: info.client,
    user: info.user,
    ...(info.conn_info !== undefined && { connInfo: info.conn_info }),
    ...(info.chan_info !== undefined && { chanInfo: info.chan_info }),
  };
}

export function toPublication(channel: string, pub: PublicationWire): Publication {
  return {
    channel,
    data: pub.data,
    offset: pub.offset,
    ...(pub.info && { info: toClientInfo(pub.info) }),
    ...(pub.tags && { tags: pub.tags }),
  };
}

/**
 * Subscription Manager
 *
 * Owns the channel -> subscription registry. Delivers pushes to handlers in
 * arrival order, tracks recovery positions and re-issues subscribe commands
 * (with recovery) whenever the connection comes back.
 */
export class SubscriptionManager {
  private readonly records = new Map<string, ManagedRecord>();
  private readonly dispatcher: CommandDispatcher;
  private readonly commands: ChannelCommands;
  private readonly isConnected: () => boolean;
  private readonly logger: ILogger;
  private readonly resubscribeBackoff: BackoffRange;
  private readonly timeoutMs: number;
  private readonly random: RandomSource;

  constructor(options: SubscriptionManagerOptions) {
    this.dispatcher = options.dispatcher;
    this.commands = options.commands;
    this.isConnected = options.isConnected;
    this.logger = options.logger;
    this.resubscribeBackoff = options.resubscribeBackoff;
    this.timeoutMs = options.timeoutMs;
    this.random = options.random ?? Math.random;
  }

  get size(): number {
    return this.records.size;
  }

  get(channel: string): Subscription | null {
    return this.records.get(channel)?.subscription ?? null;
  }

  list(): Subscription[] {
    return [...this.records.values()].map((record) => record.subscription);
  }

  /**
   * Registers interest in `channel`. Sends the subscribe command right away
   * when connected, otherwise on the next successful connect.
   */
  subscribe(
    channel: string,
    handler: PublicationHandler | SubscriptionHandlers,
    options: SubscribeOptions = {}
  ): Subscription {
    if (channel.length === 0) {
      throw new ProtocolError('Channel name is required');
    }
    if (this.records.has(channel)) {
      throw new AlreadySubscribedError(channel);
    }

    const handlers: SubscriptionHandlers =
      typeof handler === 'function' ? { onPublication: handler } : handler;

    const record = this.createRecord(channel, handlers, options);
    this.records.set(channel, record);
    this.logger.debug('Subscription registered', { channel, resubscribe: record.resubscribe });

    if (this.isConnected()) {
      this.startSubscribe(record);
    }

    return record.subscription;
  }

  /**
   * Removes the subscription locally, then tells the server best-effort.
   * Throws `NotSubscribedError` synchronously.
   */
  unsubscribe(channel: string): Promise<void> {
    const record = this.records.get(channel);
    if (!record) {
      throw new NotSubscribedError(channel);
    }

    const wasSuspended = record.state === 'suspended';
    this.moveUnsubscribed(
      record,
      UNSUBSCRIBED_CODES.UNSUBSCRIBE_CALLED,
      codeMessage('unsubscribed', UNSUBSCRIBED_CODES.UNSUBSCRIBE_CALLED)
    );

    if (wasSuspended) {
      return Promise.resolve();
    }
    return this.sendUnsubscribe(channel);
  }

  /**
   * Routes a channel push (publication, join, leave, server unsubscribe).
   */
  handlePush(push: Push): void {
    const record = this.records.get(push.channel);

    if (push.pub) {
      if (!record || record.state !== 'subscribed') {
        this.logger.warn('Dropping publication for inactive channel', {
          channel: push.channel,
          offset: push.pub.offset,
        });
        return;
      }
      this.deliver(record, push.pub);
      return;
    }

    if (push.join || push.leave) {
      if (!record || record.state !== 'subscribed') {
        this.logger.debug('Dropping presence event for inactive channel', { channel: push.channel });
        return;
      }
      if (push.join) {
        const ctx = { channel: record.channel, info: toClientInfo(push.join.info) };
        this.safely(record, 'onJoin', () => record.handlers.onJoin?.(ctx));
      }
      if (push.leave) {
        const ctx = { channel: record.channel, info: toClientInfo(push.leave.info) };
        this.safely(record, 'onLeave', () => record.handlers.onLeave?.(ctx));
      }
      return;
    }

    if (push.unsubscribe) {
      if (!record) return;
      const { code, reason } = push.unsubscribe;
      if (isTerminalUnsubscribeCode(code)) {
        this.moveUnsubscribed(record, code, reason);
      } else {
        this.moveSubscribing(record, code, reason);
        this.startSubscribe(record);
      }
    }
  }

  /**
   * Re-issues subscribe for everything waiting on a connection. Commands
   * that need no token fetch go out together in one frame.
   */
  resubscribeAll(): void {
    this.dispatcher.startBatching();
    try {
      for (const record of [...this.records.values()]) {
        if (record.state === 'suspended' || record.state === 'subscribing') {
          this.startSubscribe(record);
        }
      }
    } finally {
      this.dispatcher.flushBatch();
    }
  }

  /**
   * Connection lost or closed: keep resubscribe-eligible subscriptions in
   * `suspended`, drop the rest.
   */
  suspendAll(code: number, reason: string): void {
    for (const record of [...this.records.values()]) {
      this.clearTimers(record);
      record.attempt++;
      record.pendingRecovered = null;

      if (!record.resubscribe) {
        this.moveUnsubscribed(record, code, reason);
        continue;
      }

      const wasSubscribed = record.state === 'subscribed';
      record.state = 'suspended';
      if (wasSubscribed) {
        const ctx = { channel: record.channel, code, reason };
        this.safely(record, 'onSubscribing', () => record.handlers.onSubscribing?.(ctx));
      }
    }
  }

  private sendUnsubscribe(channel: string): Promise<void> {
    if (!this.isConnected()) {
      return Promise.resolve();
    }
    return this.dispatcher.request('unsubscribe', { channel }).then(
      () => undefined,
      (err: unknown) => {
        this.logger.warn('Unsubscribe command failed', { channel, error: toError(err) });
      }
    );
  }

  private createRecord(
    channel: string,
    handlers: SubscriptionHandlers,
    options: SubscribeOptions
  ): ManagedRecord {
    const record: SubscriptionRecord = {
      channel,
      handlers,
      resubscribe: options.resubscribe ?? true,
      getToken: options.getToken,
      data: options.data,
      state: 'suspended',
      position: options.since ? StreamPosition.from(options.since) : null,
      recoverable: options.since !== undefined,
      token: options.token ?? '',
      attempt: 0,
      resubscribeAttempts: 0,
      resubscribeTimer: null,
      refreshTimer: null,
      pendingRecovered: null,
      readyWaiters: new Set(),
    };
    const subscription = new Subscription(
      record,
      (target, timeoutMs) => this.waitReady(target, timeoutMs),
      this.commands
    );
    return Object.assign(record, { subscription });
  }

  private startSubscribe(record: SubscriptionRecord): void {
    if (record.resubscribeTimer) {
      clearTimeout(record.resubscribeTimer);
      record.resubscribeTimer = null;
    }
    record.state = 'subscribing';
    const attempt = ++record.attempt;

    if (record.token || !record.getToken) {
      this.sendSubscribe(record, attempt, record.token);
      return;
    }

    this.resolveToken(record, attempt)
      .then((token) => {
        if (token === null || !this.isCurrent(record, attempt)) return;
        this.sendSubscribe(record, attempt, token);
      })
      .catch((err: unknown) => {
        this.logger.error('Subscribe flow failed', { channel: record.channel, error: toError(err) });
      });
  }

  private isCurrent(record: SubscriptionRecord, attempt: number): boolean {
    return (
      this.records.get(record.channel) === record &&
      record.attempt === attempt &&
      record.state === 'subscribing'
    );
  }

  // Handlers may unsubscribe or close from inside a callback
  private isActive(record: SubscriptionRecord, attempt: number): boolean {
    return (
      this.records.get(record.channel) === record &&
      record.attempt === attempt &&
      record.state === 'subscribed'
    );
  }

  private sendSubscribe(record: SubscriptionRecord, attempt: number, token: string): void {
    const params: SubscribeParams = { channel: record.channel };
    if (token) {
      params.token = token;
    }
    if (record.data !== undefined) {
      params.data = record.data;
    }

    const previous = record.recoverable ? record.position : null;
    if (previous) {
      params.recover = true;
      params.offset = previous.offset;
      params.epoch = previous.epoch;
    }

    this.logger.debug('Subscribing', { channel: record.channel, recover: previous !== null });

    this.dispatcher
      .requestAndProcess('subscribe', params, (result) => this.applySubscribed(record, attempt, result, previous))
      .catch((err: unknown) => this.handleSubscribeFailure(record, attempt, toError(err)))
      .catch((err: unknown) => {
        this.logger.error('Subscribe flow failed', { channel: record.channel, error: toError(err) });
      });
  }

  /**
   * Fetched subscription token, null when the attempt was abandoned.
   */
  private async resolveToken(record: SubscriptionRecord, attempt: number): Promise<string | null> {
    if (!record.getToken) {
      return record.token;
    }

    try {
      const token = await record.getToken(record.channel);
      if (!this.isCurrent(record, attempt)) return null;
      record.token = token;
      return token;
    } catch (err) {
      if (!this.isCurrent(record, attempt)) return null;
      if (err instanceof UnauthorizedError) {
        this.moveUnsubscribed(
          record,
          UNSUBSCRIBED_CODES.UNAUTHORIZED,
          codeMessage('unsubscribed', UNSUBSCRIBED_CODES.UNAUTHORIZED)
        );
        return null;
      }
      this.emitError(record, ERROR_CODES.SUBSCRIPTION_SUBSCRIBE_TOKEN, toError(err));
      this.scheduleResubscribe(record);
      return null;
    }
  }

  private applySubscribed(
    record: SubscriptionRecord,
    attempt: number,
    result: SubscribeResult,
    previous: StreamPosition | null
  ): void {
    if (!this.isCurrent(record, attempt)) return;

    record.state = 'subscribed';
    record.resubscribeAttempts = 0;
    record.recoverable = result.recoverable;

    const tracked = result.recoverable || result.positioned;
    const wasRecovering = previous !== null;
    const top = tracked ? new StreamPosition(result.offset, result.epoch) : null;

    if (tracked) {
      record.position =
        previous && previous.sameEpoch(result.epoch) ? previous : StreamPosition.initial(result.epoch);
    } else {
      record.position = null;
    }
    record.pendingRecovered = wasRecovering ? result.recovered : null;

    const subscribedCtx = {
      channel: record.channel,
      recoverable: result.recoverable,
      positioned: result.positioned,
      position: top,
      wasRecovering,
      recovered: result.recovered,
      ...(result.data !== undefined && { data: result.data }),
    };
    this.safely(record, 'onSubscribed', () => record.handlers.onSubscribed?.(subscribedCtx));
    if (!this.isActive(record, attempt)) return;

    if (previous && !result.recovered) {
      this.logger.warn('Subscription resumed without recovery', {
        channel: record.channel,
        lastOffset: previous.offset,
        currentOffset: result.offset,
      });
      const gapCtx = { channel: record.channel, lastPosition: previous, currentPosition: top };
      this.safely(record, 'onGap', () => record.handlers.onGap?.(gapCtx));
      if (!this.isActive(record, attempt)) return;
    }

    for (const pub of result.publications) {
      this.deliver(record, pub);
      if (!this.isActive(record, attempt)) return;
    }

    if (record.position) {
      record.position = record.position.advance(result.offset);
    }

    for (const waiter of record.readyWaiters) {
      waiter.resolve();
    }
    record.readyWaiters.clear();

    if (result.expires && result.ttl > 0) {
      this.scheduleRefresh(record, result.ttl);
    }
  }

  private deliver(record: SubscriptionRecord, pub: PublicationWire): void {
    if (this.records.get(record.channel) !== record || record.state !== 'subscribed') return;
    if (record.position?.covers(pub.offset)) {
      this.logger.debug('Dropping duplicate publication', { channel: record.channel, offset: pub.offset });
      return;
    }

    const publication = toPublication(record.channel, pub);
    if (record.pendingRecovered !== null) {
      publication.recovered = record.pendingRecovered;
      record.pendingRecovered = null;
    }

    this.safely(record, 'onPublication', () => record.handlers.onPublication?.(publication));

    if (record.position && pub.offset > 0) {
      record.position = record.position.advance(pub.offset);
    }
  }

  private handleSubscribeFailure(record: SubscriptionRecord, attempt: number, error: Error): void {
    if (!this.isCurrent(record, attempt)) return;
    // suspendAll/close take care of these
    if (error instanceof ConnectionLostError || error instanceof CancelledError) return;

    if (error instanceof ReplyError) {
      const expired = isTokenExpired(error.serverCode) && record.getToken !== undefined;
      if (expired) {
        record.token = '';
      }
      this.emitError(record, ERROR_CODES.SUBSCRIBE_REPLY_ERROR, error);
      if (error.temporary || expired) {
        this.scheduleResubscribe(record);
      } else {
        this.moveUnsubscribed(record, error.serverCode, error.message);
      }
      return;
    }

    this.emitError(record, error instanceof TimeoutError ? ERROR_CODES.TIMEOUT : ERROR_CODES.SUBSCRIBE_REPLY_ERROR, error);
    this.scheduleResubscribe(record);
  }

  private scheduleResubscribe(record: SubscriptionRecord): void {
    if (record.state !== 'subscribing') return;

    const delay = backoffDelay(record.resubscribeAttempts, this.resubscribeBackoff, this.random);
    record.resubscribeAttempts++;
    this.logger.debug('Scheduling resubscribe', { channel: record.channel, delay });

    record.resubscribeTimer = setTimeout(() => {
      record.resubscribeTimer = null;
      if (this.records.get(record.channel) !== record || record.state !== 'subscribing') return;
      if (!this.isConnected()) {
        record.state = 'suspended';
        return;
      }
      this.startSubscribe(record);
    }, delay);
  }

  private scheduleRefresh(record: SubscriptionRecord, ttlSeconds: number): void {
    if (record.refreshTimer) {
      clearTimeout(record.refreshTimer);
    }
    record.refreshTimer = setTimeout(() => {
      record.refreshTimer = null;
      this.refreshToken(record).catch((err: unknown) => {
        this.logger.error('Subscription token refresh failed', { channel: record.channel, error: toError(err) });
      });
    }, ttlSeconds * 1000);
  }

  private async refreshToken(record: SubscriptionRecord): Promise<void> {
    if (record.state !== 'subscribed' || !record.getToken) return;
    const attempt = record.attempt;
    const stillSubscribed = () =>
      this.records.get(record.channel) === record && record.attempt === attempt && record.state === 'subscribed';

    let token: string;
    try {
      token = await record.getToken(record.channel);
    } catch (err) {
      if (!stillSubscribed()) return;
      if (err instanceof UnauthorizedError) {
        this.moveUnsubscribed(
          record,
          UNSUBSCRIBED_CODES.UNAUTHORIZED,
          codeMessage('unsubscribed', UNSUBSCRIBED_CODES.UNAUTHORIZED)
        );
        await this.sendUnsubscribe(record.channel);
        return;
      }
      this.emitError(record, ERROR_CODES.SUBSCRIPTION_REFRESH_TOKEN, toError(err));
      return;
    }

    if (!stillSubscribed()) return;
    record.token = token;

    try {
      const result = await this.dispatcher.request('sub_refresh', { channel: record.channel, token });
      if (stillSubscribed() && result.expires && result.ttl > 0) {
        this.scheduleRefresh(record, result.ttl);
      }
    } catch (err) {
      if (!stillSubscribed()) return;
      this.emitError(record, ERROR_CODES.SUBSCRIPTION_REFRESH_TOKEN, toError(err));
    }
  }

  private moveSubscribing(record: SubscriptionRecord, code: number, reason: string): void {
    this.clearTimers(record);
    record.state = 'subscribing';
    const ctx = { channel: record.channel, code, reason };
    this.safely(record, 'onSubscribing', () => record.handlers.onSubscribing?.(ctx));
  }

  private moveUnsubscribed(record: SubscriptionRecord, code: number, reason: string): void {
    if (record.state === 'unsubscribed') return;

    this.clearTimers(record);
    record.state = 'unsubscribed';
    record.attempt++;
    if (this.records.get(record.channel) === record) {
      this.records.delete(record.channel);
    }

    for (const waiter of record.readyWaiters) {
      waiter.reject(new NotSubscribedError(record.channel));
    }
    record.readyWaiters.clear();

    this.logger.debug('Subscription removed', { channel: record.channel, code, reason });
    const ctx = { channel: record.channel, code, reason };
    this.safely(record, 'onUnsubscribed', () => record.handlers.onUnsubscribed?.(ctx));
  }

  private waitReady(record: SubscriptionRecord, timeoutMs: number = this.timeoutMs): Promise<void> {
    if (record.state === 'subscribed') {
      return Promise.resolve();
    }
    if (record.state === 'unsubscribed') {
      return Promise.reject(new NotSubscribedError(record.channel));
    }

    return new Promise<void>((resolve, reject) => {
      const waiter = {
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (error: Error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      const timer = setTimeout(() => {
        record.readyWaiters.delete(waiter);
        reject(new TimeoutError(`Timed out waiting for subscription to ${record.channel}`));
      }, timeoutMs);
      record.readyWaiters.add(waiter);
    });
  }

  private clearTimers(record: SubscriptionRecord): void {
    if (record.resubscribeTimer) {
      clearTimeout(record.resubscribeTimer);
      record.resubscribeTimer = null;
    }
    if (record.refreshTimer) {
      clearTimeout(record.refreshTimer);
      record.refreshTimer = null;
    }
  }

  private emitError(record: SubscriptionRecord, code: number, error: Error): void {
    this.logger.warn('Subscription error', { channel: record.channel, code, error });
    const ctx = { channel: record.channel, code, error };
    this.safely(record, 'onError', () => record.handlers.onError?.(ctx));
  }

  /**
   * Runs a user handler; exceptions are logged and never reach the read loop.
   */
  private safely(record: SubscriptionRecord, name: keyof SubscriptionHandlers, invoke: () => void): void {
    try {
      invoke();
    } catch (err) {
      this.logger.error('Subscription handler threw', {
        channel: record.channel,
        handler: name,
        error: toError(err),
      });
    }
  }
}
