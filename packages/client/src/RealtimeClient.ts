/**
 * Realtime Client
 *
 * Keeps one logical connection to a Centrifugo-compatible server across
 * transport failures. Drives the connection state machine, runs the read
 * loop, and exposes subscriptions and request/reply commands to callers.
 */

import {
  CONNECTING_CODES,
  DISCONNECTED_CODES,
  ERROR_CODES,
  SUBSCRIBING_CODES,
  UNSUBSCRIBED_CODES,
  WS_MESSAGE_TOO_BIG,
  codeMessage,
  isTerminalDisconnectCode,
  isTokenExpired,
  type ConnectParams,
  type ConnectResult,
  type JsonValue,
  type Method,
  type ParamsMap,
  type Push,
  type ResultMap,
} from '@pushline/shared';
import type { ICodec, DecodedFrame } from './core/ports/ICodec.js';
import type { ILogger } from './core/ports/ILogger.js';
import type { ITokenProvider } from './core/ports/ITokenProvider.js';
import type { TransportFactory, TransportFrame, TransportSession } from './core/ports/ITransport.js';
import type { RandomSource } from './core/backoff.js';
import { CommandDispatcher } from './core/CommandDispatcher.js';
import { ConnectionStateMachine, type ConnectionState } from './core/ConnectionStateMachine.js';
import { SubscriptionManager, toClientInfo, toPublication } from './core/SubscriptionManager.js';
import type { ReadyWaiter, Subscription } from './core/Subscription.js';
import type {
  ClientInfo,
  HistoryOptions,
  HistoryResult,
  PresenceResult,
  PresenceStatsResult,
  PublishResult,
  PublicationHandler,
  RpcResult,
  SubscribeOptions,
  SubscriptionHandlers,
} from './core/types.js';
import {
  AuthError,
  CancelledError,
  ConnectionLostError,
  MalformedFrameError,
  ReplyError,
  TimeoutError,
  UnauthorizedError,
  toError,
} from './core/errors.js';
import { JsonCodec } from './adapters/codecs/JsonCodec.js';
import { WsTransport } from './adapters/transports/WsTransport.js';
import { ConsoleLogger } from './adapters/services/ConsoleLogger.js';
import {
  resolveClientOptions,
  type ClientOptions,
  type ClientSettings,
} from './infrastructure/config.js';

/**
 * Connection statistics
 */
export interface ConnectionStats {
  /** Total number of connection attempts */
  connectAttempts: number;
  /** Number of successful handshakes */
  connectSuccess: number;
  /** Number of failed attempts */
  connectFailed: number;
  /** Number of handshakes after the first one */
  reconnectCount: number;
  state: ConnectionState;
  lastDisconnectReason?: string;
  lastDisconnectCode?: number;
  lastConnectedAt?: Date;
  lastDisconnectedAt?: Date;
  /** Seconds spent connected, including the current session */
  uptimeSeconds: number;
}

/**
 * Event payloads keyed by event name
 */
export interface RealtimeClientEventMap {
  connecting: { code: number; reason: string };
  connected: { clientId: string; version: string; data?: unknown };
  reconnected: { clientId: string; attempt: number };
  reconnecting: { attempt: number; delay: number; code: number; reason: string };
  disconnected: { code: number; reason: string; reconnect: boolean };
  error: { code: number; error: Error };
  stateChange: { oldState: ConnectionState; newState: ConnectionState };
  /** Asynchronous server message outside any channel */
  message: { data: unknown };
}

export type RealtimeClientEvent = keyof RealtimeClientEventMap;

type Listener<T> = (ctx: T) => void;

export class RealtimeClient {
  private readonly settings: ClientSettings;
  private readonly data?: JsonValue;
  private readonly logger: ILogger;
  private readonly codec: ICodec;
  private readonly transport: TransportFactory;
  private readonly tokenProvider?: ITokenProvider;
  private readonly fsm: ConnectionStateMachine;
  private readonly dispatcher: CommandDispatcher;
  private readonly subs: SubscriptionManager;
  private readonly listeners: { [K in RealtimeClientEvent]?: Set<Listener<RealtimeClientEventMap[K]>> } =
    {};
  private readonly readyWaiters = new Set<ReadyWaiter>();
  private readonly stats: ConnectionStats;

  private session: TransportSession | null = null;
  /** Bumped whenever a session is discarded; stale continuations compare against it */
  private generation = 0;
  private token: string;
  private clientId: string | null = null;
  private hasConnectedBefore = false;
  private malformedStreak = 0;
  private pingIntervalMs = 0;
  private sendPong = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private connectionStartTime?: Date;
  private accumulatedUptimeMs = 0;

  constructor(options: ClientOptions) {
    const resolved = resolveClientOptions(options);
    const { data, tokenProvider, transport, codec, logger, random, ...settings } = resolved;

    this.settings = settings;
    this.data = data;
    this.token = settings.token;
    this.tokenProvider = tokenProvider;
    this.logger = logger ?? new ConsoleLogger(settings.logLevel);
    this.codec = codec ?? new JsonCodec();
    this.transport = transport ?? new WsTransport();

    const randomSource: RandomSource = random ?? Math.random;

    this.stats = {
      connectAttempts: 0,
      connectSuccess: 0,
      connectFailed: 0,
      reconnectCount: 0,
      state: 'disconnected',
      uptimeSeconds: 0,
    };

    this.fsm = new ConnectionStateMachine(
      { minDelayMs: settings.minReconnectDelayMs, maxDelayMs: settings.maxReconnectDelayMs },
      randomSource,
      (change) => {
        this.stats.state = change.newState;
        this.logger.debug('State changed', { ...change });
        this.emit('stateChange', change);
      }
    );

    this.dispatcher = new CommandDispatcher(this.codec, this.logger, settings.timeoutMs);

    this.subs = new SubscriptionManager({
      dispatcher: this.dispatcher,
      commands: {
        publish: (channel, payload) => this.publish(channel, payload),
        history: (channel, historyOptions) => this.history(channel, historyOptions),
        presence: (channel) => this.presence(channel),
        presenceStats: (channel) => this.presenceStats(channel),
      },
      isConnected: () => this.fsm.state === 'connected',
      logger: this.logger,
      resubscribeBackoff: {
        minDelayMs: settings.minResubscribeDelayMs,
        maxDelayMs: settings.maxResubscribeDelayMs,
      },
      timeoutMs: settings.timeoutMs,
      random: randomSource,
    });
  }

  // ==================== Lifecycle ====================

  /**
   * Starts connecting if disconnected. Resolves on the first successful
   * handshake; rejects with `AuthError` or `CancelledError`.
   */
  connect(): Promise<void> {
    if (this.fsm.state === 'connected') {
      return Promise.resolve();
    }

    const ready = this.waitConnected();

    if (this.fsm.state === 'disconnected') {
      this.fsm.transition('connecting');
      this.emit('connecting', {
        code: CONNECTING_CODES.CONNECT_CALLED,
        reason: codeMessage('connecting', CONNECTING_CODES.CONNECT_CALLED),
      });
      this.startAttempt();
    }

    return ready;
  }

  /**
   * Tears everything down. Safe to call any number of times.
   */
  close(): void {
    if (this.fsm.state === 'disconnected') {
      return;
    }

    this.logger.info('Closing client', { state: this.fsm.state });
    this.clearReconnectTimer();
    this.discardSession(new CancelledError());
    this.subs.suspendAll(
      UNSUBSCRIBED_CODES.CLIENT_CLOSED,
      codeMessage('unsubscribed', UNSUBSCRIBED_CODES.CLIENT_CLOSED)
    );
    this.fsm.transition('disconnected');
    this.hasConnectedBefore = false;
    this.rejectReadyWaiters(new CancelledError());
    this.recordDisconnect(
      DISCONNECTED_CODES.DISCONNECT_CALLED,
      codeMessage('disconnected', DISCONNECTED_CODES.DISCONNECT_CALLED)
    );
    this.emit('disconnected', {
      code: DISCONNECTED_CODES.DISCONNECT_CALLED,
      reason: codeMessage('disconnected', DISCONNECTED_CODES.DISCONNECT_CALLED),
      reconnect: false,
    });
  }

  /**
   * Resolves once connected; rejects with `TimeoutError` after `timeoutMs`.
   */
  ready(timeoutMs: number = this.settings.timeoutMs): Promise<void> {
    if (this.fsm.state === 'connected') {
      return Promise.resolve();
    }
    return this.waitConnected(timeoutMs);
  }

  // ==================== Subscriptions ====================

  subscribe(
    channel: string,
    handler: PublicationHandler | SubscriptionHandlers,
    options?: SubscribeOptions
  ): Subscription {
    const subscribeOptions: SubscribeOptions = { ...options };
    const provider = this.tokenProvider;
    if (!subscribeOptions.token && !subscribeOptions.getToken && provider?.getSubscriptionToken) {
      subscribeOptions.getToken = (ch) => provider.getSubscriptionToken?.(ch) ?? Promise.resolve('');
    }
    return this.subs.subscribe(channel, handler, subscribeOptions);
  }

  unsubscribe(channel: string): Promise<void> {
    return this.subs.unsubscribe(channel);
  }

  getSubscription(channel: string): Subscription | null {
    return this.subs.get(channel);
  }

  subscriptions(): Subscription[] {
    return this.subs.list();
  }

  // ==================== Commands ====================

  async publish(channel: string, data: JsonValue): Promise<PublishResult> {
    await this.command('publish', { channel, data });
    return {};
  }

  async history(channel: string, options: HistoryOptions = {}): Promise<HistoryResult> {
    const result = await this.command('history', {
      channel,
      ...(options.limit !== undefined && { limit: options.limit }),
      ...(options.since && { since: { offset: options.since.offset, epoch: options.since.epoch } }),
      ...(options.reverse !== undefined && { reverse: options.reverse }),
    });
    return {
      publications: result.publications.map((pub) => toPublication(channel, pub)),
      offset: result.offset,
      epoch: result.epoch,
    };
  }

  async presence(channel: string): Promise<PresenceResult> {
    const result = await this.command('presence', { channel });
    const clients: Record<string, ClientInfo> = {};
    for (const [clientId, info] of Object.entries(result.presence)) {
      clients[clientId] = toClientInfo(info);
    }
    return { clients };
  }

  async presenceStats(channel: string): Promise<PresenceStatsResult> {
    const result = await this.command('presence_stats', { channel });
    return { numClients: result.num_clients, numUsers: result.num_users };
  }

  async rpc(method: string, data: JsonValue): Promise<RpcResult> {
    const result = await this.command('rpc', { method, data });
    return { data: result.data ?? null };
  }

  /**
   * Fire-and-forget message to the server; there is no reply to wait for.
   */
  async send(data: JsonValue): Promise<void> {
    const session = this.session;
    if (!this.fsm.is('connected') || !session) {
      throw new ConnectionLostError(`Cannot send message: client is ${this.fsm.state}`);
    }
    session.send(this.codec.encodeSend(data));
  }

  // ==================== Introspection ====================

  getState(): ConnectionState {
    return this.fsm.state;
  }

  getClientId(): string | null {
    return this.clientId;
  }

  isConnected(): boolean {
    return this.fsm.state === 'connected';
  }

  getStats(): ConnectionStats {
    const currentMs = this.connectionStartTime ? Date.now() - this.connectionStartTime.getTime() : 0;
    return {
      ...this.stats,
      uptimeSeconds: Math.floor((this.accumulatedUptimeMs + currentMs) / 1000),
    };
  }

  // ==================== Events ====================

  on<K extends RealtimeClientEvent>(event: K, handler: Listener<RealtimeClientEventMap[K]>): this {
    const listeners: { [P in K]?: Set<Listener<RealtimeClientEventMap[P]>> } = this.listeners;
    let handlers = listeners[event];
    if (!handlers) {
      handlers = new Set<Listener<RealtimeClientEventMap[K]>>();
      listeners[event] = handlers;
    }
    handlers.add(handler);
    return this;
  }

  off<K extends RealtimeClientEvent>(event: K, handler: Listener<RealtimeClientEventMap[K]>): this {
    this.listeners[event]?.delete(handler);
    return this;
  }

  private emit<K extends RealtimeClientEvent>(event: K, ctx: RealtimeClientEventMap[K]): void {
    const handlers = this.listeners[event];
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        handler(ctx);
      } catch (err) {
        this.logger.error('Event handler threw', { event, error: toError(err) });
      }
    }
  }

  private emitError(code: number, error: Error): void {
    this.logger.warn('Client error', { code, error });
    this.emit('error', { code, error });
  }

  // ==================== Connection attempts ====================

  private command<M extends Method>(method: M, params: ParamsMap[M]): Promise<ResultMap[M]> {
    if (!this.fsm.is('connected')) {
      return Promise.reject(
        new ConnectionLostError(`Cannot send ${method}: client is ${this.fsm.state}`)
      );
    }
    return this.dispatcher.request(method, params);
  }

  private startAttempt(): void {
    const generation = this.generation;
    this.stats.connectAttempts++;
    this.openSession(generation).catch((err: unknown) => {
      this.logger.error('Connection attempt failed unexpectedly', { error: toError(err) });
    });
  }

  private async openSession(generation: number): Promise<void> {
    let token: string;
    try {
      token = await this.resolveConnectionToken();
    } catch (err) {
      if (this.generation !== generation) return;
      this.stats.connectFailed++;
      if (err instanceof UnauthorizedError) {
        this.terminate(
          DISCONNECTED_CODES.UNAUTHORIZED,
          codeMessage('disconnected', DISCONNECTED_CODES.UNAUTHORIZED),
          new AuthError('Token provider refused a connection token', undefined, { cause: err })
        );
        return;
      }
      this.emitError(ERROR_CODES.CLIENT_CONNECT_TOKEN, toError(err));
      this.enterReconnecting(
        CONNECTING_CODES.TRANSPORT_CLOSED,
        codeMessage('connecting', CONNECTING_CODES.TRANSPORT_CLOSED)
      );
      return;
    }
    if (this.generation !== generation) return;

    let session: TransportSession;
    try {
      session = await this.transport.open(this.settings.url, { protocols: this.codec.protocols });
    } catch (err) {
      if (this.generation !== generation) return;
      this.stats.connectFailed++;
      this.emitError(ERROR_CODES.TRANSPORT_CLOSED, toError(err));
      this.enterReconnecting(
        CONNECTING_CODES.TRANSPORT_CLOSED,
        codeMessage('connecting', CONNECTING_CODES.TRANSPORT_CLOSED)
      );
      return;
    }
    if (this.generation !== generation) {
      session.close();
      return;
    }

    this.session = session;
    this.malformedStreak = 0;
    this.dispatcher.attach(session);
    this.fsm.transition('authenticating');
    this.logger.debug('Transport open, sending handshake', { url: this.settings.url });

    this.runReadLoop(session, generation).catch((err: unknown) => {
      this.logger.error('Read loop failed', { error: toError(err) });
      if (this.generation !== generation) return;
      this.emitError(ERROR_CODES.TRANSPORT_CLOSED, toError(err));
      this.enterReconnecting(
        CONNECTING_CODES.TRANSPORT_CLOSED,
        codeMessage('connecting', CONNECTING_CODES.TRANSPORT_CLOSED)
      );
    });

    const params: ConnectParams = {
      name: this.settings.name,
      ...(token ? { token } : {}),
      ...(this.settings.version ? { version: this.settings.version } : {}),
      ...(this.data !== undefined && { data: this.data }),
    };

    try {
      await this.dispatcher.requestAndProcess('connect', params, (result) =>
        this.handleConnected(result, generation)
      );
    } catch (err) {
      if (this.generation !== generation) return;
      this.handleHandshakeFailure(toError(err));
    }
  }

  private async resolveConnectionToken(): Promise<string> {
    if (this.token || !this.tokenProvider) {
      return this.token;
    }
    this.token = await this.tokenProvider.getConnectionToken();
    return this.token;
  }

  private handleConnected(result: ConnectResult, generation: number): void {
    if (this.generation !== generation) return;

    const wasReconnect = this.hasConnectedBefore;
    const attempt = this.fsm.reconnectAttempts;

    this.clientId = result.client;
    this.fsm.transition('connected');
    this.hasConnectedBefore = true;

    this.stats.connectSuccess++;
    if (wasReconnect) this.stats.reconnectCount++;
    this.connectionStartTime = new Date();
    this.stats.lastConnectedAt = this.connectionStartTime;

    this.sendPong = result.pong;
    this.pingIntervalMs = result.ping * 1000;
    this.restartPingWatchdog();

    if (result.expires && result.ttl > 0) {
      this.scheduleRefresh(result.ttl);
    }

    this.logger.info('Connected', { clientId: result.client, reconnect: wasReconnect });

    for (const waiter of [...this.readyWaiters]) {
      waiter.resolve();
    }

    this.emit('connected', {
      clientId: result.client,
      version: result.version,
      ...(result.data !== undefined && { data: result.data }),
    });
    if (wasReconnect) {
      this.emit('reconnected', { clientId: result.client, attempt });
    }

    this.subs.resubscribeAll();
  }

  private handleHandshakeFailure(error: Error): void {
    // Connection loss and close() are handled where they happen
    if (error instanceof ConnectionLostError || error instanceof CancelledError) {
      return;
    }

    this.stats.connectFailed++;

    if (error instanceof ReplyError) {
      const expired = isTokenExpired(error.serverCode) && this.tokenProvider !== undefined;
      if (expired) {
        this.token = '';
      }
      if (error.temporary || expired) {
        this.emitError(ERROR_CODES.CONNECT_REPLY_ERROR, error);
        this.enterReconnecting(error.serverCode, error.message);
        return;
      }
      this.terminate(
        error.serverCode,
        error.message,
        new AuthError(`Handshake rejected: ${error.message}`, error.serverCode, { cause: error })
      );
      return;
    }

    if (error instanceof TimeoutError) {
      this.terminate(
        DISCONNECTED_CODES.UNAUTHORIZED,
        'handshake timeout',
        new AuthError('Handshake timed out', undefined, { cause: error })
      );
      return;
    }

    this.emitError(ERROR_CODES.CONNECT_REPLY_ERROR, error);
    this.enterReconnecting(
      CONNECTING_CODES.TRANSPORT_CLOSED,
      codeMessage('connecting', CONNECTING_CODES.TRANSPORT_CLOSED)
    );
  }

  // ==================== Read loop ====================

  private async runReadLoop(session: TransportSession, generation: number): Promise<void> {
    for await (const frame of session.receive()) {
      if (this.generation !== generation) break;
      if (frame.kind === 'message') {
        await this.processData(frame.data, session, generation);
      } else {
        this.handleTransportEnd(frame, generation);
      }
    }
  }

  private async processData(data: string, session: TransportSession, generation: number): Promise<void> {
    for (const decoded of this.codec.decode(data)) {
      if (this.generation !== generation) return;
      await this.processFrame(decoded, session);
    }
  }

  private async processFrame(decoded: DecodedFrame, session: TransportSession): Promise<void> {
    switch (decoded.kind) {
      case 'reply':
        this.malformedStreak = 0;
        await this.dispatcher.handleReply(decoded.reply);
        return;
      case 'push':
        this.malformedStreak = 0;
        this.handlePush(decoded.push);
        return;
      case 'ping':
        this.malformedStreak = 0;
        this.handlePing(session);
        return;
      case 'malformed':
        this.handleMalformed(decoded.raw, decoded.reason);
        return;
    }
  }

  private handlePush(push: Push): void {
    if (push.disconnect) {
      const { code, reason } = push.disconnect;
      this.logger.info('Server disconnect', { code, reason });
      if (isTerminalDisconnectCode(code)) {
        this.terminate(code, reason, null);
      } else {
        this.enterReconnecting(code, reason);
      }
      return;
    }

    if (push.message) {
      this.emit('message', { data: push.message.data });
      return;
    }

    this.subs.handlePush(push);
  }

  private handlePing(session: TransportSession): void {
    if (this.sendPong) {
      try {
        session.send(this.codec.encodePong());
      } catch (err) {
        this.logger.warn('Failed to send pong', { error: toError(err) });
      }
    }
    this.restartPingWatchdog();
  }

  private handleMalformed(raw: string, reason: string): void {
    this.malformedStreak++;
    this.logger.warn('Malformed frame', { reason, raw: raw.slice(0, 200), streak: this.malformedStreak });
    this.emitError(ERROR_CODES.MALFORMED_FRAME, new MalformedFrameError(`Malformed frame: ${reason}`));

    if (this.malformedStreak > this.settings.maxMalformedFrames) {
      this.enterReconnecting(
        CONNECTING_CODES.TOO_MANY_MALFORMED_FRAMES,
        codeMessage('connecting', CONNECTING_CODES.TOO_MANY_MALFORMED_FRAMES)
      );
    }
  }

  private handleTransportEnd(frame: Exclude<TransportFrame, { kind: 'message' }>, generation: number): void {
    if (this.generation !== generation) return;

    if (frame.kind === 'error') {
      this.emitError(ERROR_CODES.TRANSPORT_CLOSED, frame.error);
      this.enterReconnecting(
        CONNECTING_CODES.TRANSPORT_CLOSED,
        codeMessage('connecting', CONNECTING_CODES.TRANSPORT_CLOSED)
      );
      return;
    }

    const { code, reason } = frame;
    this.logger.info('Transport closed', { code, reason });

    if (code === WS_MESSAGE_TOO_BIG) {
      this.enterReconnecting(
        DISCONNECTED_CODES.MESSAGE_SIZE_LIMIT,
        codeMessage('disconnected', DISCONNECTED_CODES.MESSAGE_SIZE_LIMIT)
      );
    } else if (code < 3000) {
      this.enterReconnecting(
        CONNECTING_CODES.TRANSPORT_CLOSED,
        codeMessage('connecting', CONNECTING_CODES.TRANSPORT_CLOSED)
      );
    } else if (isTerminalDisconnectCode(code)) {
      this.terminate(code, reason, null);
    } else {
      this.enterReconnecting(code, reason);
    }
  }

  // ==================== Transitions ====================

  /**
   * Drops the current session and schedules the next attempt with backoff.
   */
  private enterReconnecting(code: number, reason: string): void {
    const wasConnected = this.fsm.state === 'connected';

    this.discardSession(new ConnectionLostError(`Connection lost: ${reason}`));
    this.subs.suspendAll(SUBSCRIBING_CODES.TRANSPORT_CLOSED, reason);
    this.fsm.transition('reconnecting');

    if (wasConnected) {
      this.recordDisconnect(code, reason);
      this.logger.warn('Disconnected, will reconnect', { code, reason });
      this.emit('disconnected', { code, reason, reconnect: true });
    }

    this.scheduleReconnect(code, reason);
  }

  /**
   * Terminal disconnect: no automatic reconnect until `connect()` is called again.
   */
  private terminate(code: number, reason: string, error: Error | null): void {
    if (this.fsm.state === 'disconnected') return;

    this.clearReconnectTimer();
    this.discardSession(error ?? new ConnectionLostError(`Disconnected: ${reason}`));
    this.subs.suspendAll(code, reason);
    this.fsm.transition('disconnected');
    this.hasConnectedBefore = false;
    this.rejectReadyWaiters(error ?? new ConnectionLostError(`Disconnected: ${reason}`));
    this.recordDisconnect(code, reason);

    if (error) {
      this.emitError(ERROR_CODES.CLIENT_DISCONNECTED, error);
    }
    this.logger.warn('Disconnected', { code, reason });
    this.emit('disconnected', { code, reason, reconnect: false });
  }

  private scheduleReconnect(code: number, reason: string): void {
    this.clearReconnectTimer();
    const delay = this.fsm.nextReconnectDelay();
    const attempt = this.fsm.reconnectAttempts;

    this.logger.info('Scheduling reconnect', { attempt, delay });
    this.emit('reconnecting', { attempt, delay, code, reason });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.fsm.is('reconnecting')) return;
      this.fsm.transition('connecting');
      this.emit('connecting', { code, reason });
      this.startAttempt();
    }, delay);
  }

  /**
   * Invalidates the current generation, closes the session and fails pending commands.
   */
  private discardSession(error: Error): void {
    this.generation++;
    this.clearSessionTimers();
    this.clientId = null;

    if (this.connectionStartTime) {
      this.accumulatedUptimeMs += Date.now() - this.connectionStartTime.getTime();
      this.connectionStartTime = undefined;
    }

    const session = this.session;
    this.session = null;
    session?.close();
    this.dispatcher.detach(error);
  }

  private recordDisconnect(code: number, reason: string): void {
    this.stats.lastDisconnectCode = code;
    this.stats.lastDisconnectReason = reason;
    this.stats.lastDisconnectedAt = new Date();
  }

  // ==================== Timers ====================

  private restartPingWatchdog(): void {
    if (this.pingTimer) {
      clearTimeout(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.pingIntervalMs <= 0) return;

    this.pingTimer = setTimeout(() => {
      this.pingTimer = null;
      if (!this.fsm.is('connected')) return;
      this.logger.warn('No ping from server', { intervalMs: this.pingIntervalMs });
      this.enterReconnecting(CONNECTING_CODES.NO_PING, codeMessage('connecting', CONNECTING_CODES.NO_PING));
    }, this.pingIntervalMs + this.settings.maxServerPingDelayMs);
  }

  private scheduleRefresh(ttlSeconds: number): void {
    if (this.refreshTimer) clearTimeout(this.refreshTimer);
    const generation = this.generation;
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = null;
      this.refreshConnectionToken(generation).catch((err: unknown) => {
        this.logger.error('Token refresh failed unexpectedly', { error: toError(err) });
      });
    }, ttlSeconds * 1000);
  }

  private async refreshConnectionToken(generation: number): Promise<void> {
    if (this.generation !== generation || !this.fsm.is('connected')) return;

    const refreshFailed = (error: Error): void => {
      // The token is about to expire; fetch a new one for the next handshake
      if (this.tokenProvider) this.token = '';
      this.emitError(ERROR_CODES.CLIENT_REFRESH_TOKEN, error);
      this.enterReconnecting(
        CONNECTING_CODES.TOKEN_REFRESH_FAILED,
        codeMessage('connecting', CONNECTING_CODES.TOKEN_REFRESH_FAILED)
      );
    };

    if (!this.tokenProvider) {
      this.token = '';
      refreshFailed(new AuthError('Connection token expired and no token provider is configured'));
      return;
    }

    let token: string;
    try {
      token = await this.tokenProvider.getConnectionToken();
    } catch (err) {
      if (this.generation !== generation) return;
      if (err instanceof UnauthorizedError) {
        this.terminate(
          DISCONNECTED_CODES.UNAUTHORIZED,
          codeMessage('disconnected', DISCONNECTED_CODES.UNAUTHORIZED),
          new AuthError('Token provider refused a connection token', undefined, { cause: err })
        );
        return;
      }
      refreshFailed(toError(err));
      return;
    }
    if (this.generation !== generation) return;

    this.token = token;
    try {
      const result = await this.dispatcher.request('refresh', { token });
      if (this.generation !== generation) return;
      this.logger.debug('Connection token refreshed', { ttl: result.ttl });
      if (result.expires && result.ttl > 0) {
        this.scheduleRefresh(result.ttl);
      }
    } catch (err) {
      if (this.generation !== generation) return;
      refreshFailed(toError(err));
    }
  }

  private clearSessionTimers(): void {
    if (this.pingTimer) {
      clearTimeout(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
    this.pingIntervalMs = 0;
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // ==================== Waiters ====================

  private waitConnected(timeoutMs?: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      const waiter: ReadyWaiter = {
        resolve: () => {
          if (timer) clearTimeout(timer);
          this.readyWaiters.delete(waiter);
          resolve();
        },
        reject: (error) => {
          if (timer) clearTimeout(timer);
          this.readyWaiters.delete(waiter);
          reject(error);
        },
      };
      this.readyWaiters.add(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          waiter.reject(new TimeoutError(`Timed out waiting for connection after ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });
  }

  private rejectReadyWaiters(error: Error): void {
    for (const waiter of [...this.readyWaiters]) {
      waiter.reject(error);
    }
  }
}
