import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { StreamPosition } from '@pushline/shared';
import {
  RealtimeClient,
  type RealtimeClientEvent,
  type RealtimeClientEventMap,
} from '../../RealtimeClient.js';
import type { ClientOptions } from '../../infrastructure/config.js';
import type { ILogger } from '../../core/ports/ILogger.js';
import type { Publication } from '../../core/types.js';
import {
  AuthError,
  CancelledError,
  ConnectionLostError,
  TimeoutError,
  UnauthorizedError,
} from '../../core/errors.js';
import { FakeTransport, createMockLogger, flush } from '../helpers/fakes.js';

const SERVER_URL = 'ws://realtime.test/connection/websocket';

function record<K extends RealtimeClientEvent>(client: RealtimeClient, event: K): RealtimeClientEventMap[K][] {
  const seen: RealtimeClientEventMap[K][] = [];
  client.on(event, (ctx) => {
    seen.push(ctx);
  });
  return seen;
}

describe('RealtimeClient', () => {
  let transport: FakeTransport;
  let logger: ILogger;
  let client: RealtimeClient;

  function createClient(options: Partial<ClientOptions> = {}): RealtimeClient {
    client = new RealtimeClient({
      url: SERVER_URL,
      transport,
      logger,
      random: () => 0,
      timeoutMs: 1000,
      ...options,
    });
    return client;
  }

  async function connect(target: RealtimeClient = client): Promise<void> {
    const connected = target.connect();
    await flush();
    await connected;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    transport = new FakeTransport();
    logger = createMockLogger();
    createClient();
  });

  afterEach(() => {
    client.close();
    vi.useRealTimers();
  });

  describe('connecting', () => {
    it('should walk through the handshake states', async () => {
      const states = record(client, 'stateChange');
      const connected = record(client, 'connected');

      await connect();

      expect(states.map((s) => s.newState)).toEqual(['connecting', 'authenticating', 'connected']);
      expect(connected).toEqual([{ clientId: 'client-1', version: 'test' }]);
      expect(client.getClientId()).toBe('client-1');
      expect(transport.opened).toEqual([{ address: SERVER_URL, options: { protocols: [] } }]);
      expect(transport.last.commands()).toEqual([{ id: 1, connect: { name: 'js' } }]);
    });

    it('should send token, version and connect data', async () => {
      createClient({ token: 'test-token', version: '1.2.3', data: { room: 'lobby' } });

      await connect();

      expect(transport.last.commandsFor('connect')).toEqual([
        { id: 1, connect: { name: 'js', token: 'test-token', version: '1.2.3', data: { room: 'lobby' } } },
      ]);
    });

    it('should retry when the transport cannot open', async () => {
      transport.failOpens = 1;
      const reconnecting = record(client, 'reconnecting');
      const errors = record(client, 'error');
      const connected = client.connect();
      await flush();

      expect(client.getState()).toBe('reconnecting');
      expect(reconnecting).toEqual([{ attempt: 1, delay: 200, code: 1, reason: 'transport closed' }]);
      expect(errors.map((e) => e.code)).toEqual([2]);

      await vi.advanceTimersByTimeAsync(200);
      await connected;

      expect(client.getState()).toBe('connected');
      expect(client.getStats()).toMatchObject({ connectAttempts: 2, connectSuccess: 1, connectFailed: 1 });
    });

    it('should reject connect() with AuthError when the handshake is refused', async () => {
      transport.responders.set('connect', () => null);
      const disconnected = record(client, 'disconnected');
      const connecting = client.connect();
      const assertion = expect(connecting).rejects.toBeInstanceOf(AuthError);
      await flush();

      transport.last.replyError(1, 101, 'unauthorized');
      await flush();
      await assertion;

      expect(client.getState()).toBe('disconnected');
      expect(disconnected).toEqual([{ code: 101, reason: 'unauthorized', reconnect: false }]);

      await vi.advanceTimersByTimeAsync(30000);
      expect(transport.sessions).toHaveLength(1);
    });

    it('should give up when the handshake times out', async () => {
      transport.responders.set('connect', () => null);
      const connecting = client.connect();
      const assertion = expect(connecting).rejects.toThrow('Handshake timed out');
      await flush();

      await vi.advanceTimersByTimeAsync(1000);
      await assertion;

      expect(client.getState()).toBe('disconnected');
    });

    it('should reconnect after a temporary handshake error', async () => {
      transport.responders.set('connect', (_command, session) =>
        session.index === 1 ? null : { client: `client-${session.index}` }
      );
      const connecting = client.connect();
      await flush();

      transport.last.replyError(1, 111, 'too many requests', true);
      await flush();
      expect(client.getState()).toBe('reconnecting');

      await vi.advanceTimersByTimeAsync(200);
      await connecting;

      expect(client.getClientId()).toBe('client-2');
    });

    it('should fetch a fresh token after token expiry', async () => {
      const getConnectionToken = vi
        .fn<() => Promise<string>>()
        .mockResolvedValueOnce('test-token-1')
        .mockResolvedValueOnce('test-token-2');
      createClient({ tokenProvider: { getConnectionToken } });
      transport.responders.set('connect', (_command, session) =>
        session.index === 1 ? null : { client: `client-${session.index}` }
      );
      const connecting = client.connect();
      await flush();

      transport.last.replyError(1, 109, 'token expired');
      await flush();
      await vi.advanceTimersByTimeAsync(200);
      await connecting;

      expect(transport.sessions[0]?.commandsFor('connect')).toEqual([
        { id: 1, connect: { name: 'js', token: 'test-token-1' } },
      ]);
      expect(transport.last.commandsFor('connect')).toEqual([
        { id: 1, connect: { name: 'js', token: 'test-token-2' } },
      ]);
    });

    it('should resolve ready() once connected and time out otherwise', async () => {
      const ready = client.ready(500);
      const timeout = expect(ready).rejects.toBeInstanceOf(TimeoutError);
      await vi.advanceTimersByTimeAsync(500);
      await timeout;

      await connect();
      await expect(client.ready()).resolves.toBeUndefined();
    });
  });

  describe('reconnecting', () => {
    it('should reconnect and resubscribe after the transport drops', async () => {
      const states = record(client, 'stateChange');
      const disconnected = record(client, 'disconnected');
      const reconnecting = record(client, 'reconnecting');
      const reconnected = record(client, 'reconnected');
      await connect();
      const subscription = client.subscribe('news', () => undefined);
      await flush();
      expect(subscription.state).toBe('subscribed');

      transport.last.drop();
      await flush();

      expect(client.getState()).toBe('reconnecting');
      expect(subscription.state).toBe('suspended');
      expect(disconnected).toEqual([{ code: 1, reason: 'transport closed', reconnect: true }]);
      expect(reconnecting).toEqual([{ attempt: 1, delay: 200, code: 1, reason: 'transport closed' }]);

      await vi.advanceTimersByTimeAsync(200);

      expect(states.map((s) => s.newState)).toEqual([
        'connecting',
        'authenticating',
        'connected',
        'reconnecting',
        'connecting',
        'authenticating',
        'connected',
      ]);
      expect(reconnected).toEqual([{ clientId: 'client-2', attempt: 1 }]);
      expect(transport.last.commands()).toEqual([
        { id: 1, connect: { name: 'js' } },
        { id: 2, subscribe: { channel: 'news' } },
      ]);
      expect(subscription.state).toBe('subscribed');
      expect(client.getStats()).toMatchObject({ connectAttempts: 2, connectSuccess: 2, reconnectCount: 1 });
    });

    it('should back off between failed attempts', async () => {
      const reconnecting = record(client, 'reconnecting');
      await connect();
      transport.failOpens = 2;

      transport.last.drop();
      await flush();
      await vi.advanceTimersByTimeAsync(200);
      await vi.advanceTimersByTimeAsync(400);
      await vi.advanceTimersByTimeAsync(800);

      expect(reconnecting.map((r) => r.delay)).toEqual([200, 400, 800]);
      expect(client.getState()).toBe('connected');
    });

    it('should fail in-flight commands when the connection drops', async () => {
      transport.responders.set('publish', () => null);
      await connect();
      const pending = client.publish('news', { text: 'hi' });

      transport.last.drop();
      await flush();

      await expect(pending).rejects.toBeInstanceOf(ConnectionLostError);
    });

    it('should resume "news" from offset 5 and report the gap', async () => {
      transport.responders.set('subscribe', (_command, session) =>
        session.index === 1
          ? { recoverable: true, epoch: 'e1', offset: 3 }
          : { recoverable: true, epoch: 'e1', offset: 7, recovered: false }
      );
      const onGap = vi.fn();
      const received: Publication[] = [];
      await connect();
      const subscription = client.subscribe('news', { onGap, onPublication: (p) => received.push(p) });
      await flush();

      transport.last.publish('news', 'four', 4);
      transport.last.publish('news', 'five', 5);
      await flush();
      expect(subscription.position).toEqual(new StreamPosition(5, 'e1'));

      transport.last.drop();
      await flush();
      await vi.advanceTimersByTimeAsync(200);

      expect(transport.last.commandsFor('subscribe')).toEqual([
        { id: 2, subscribe: { channel: 'news', recover: true, offset: 5, epoch: 'e1' } },
      ]);
      expect(onGap).toHaveBeenCalledWith({
        channel: 'news',
        lastPosition: new StreamPosition(5, 'e1'),
        currentPosition: new StreamPosition(7, 'e1'),
      });

      transport.last.publish('news', 'eight', 8);
      await flush();

      expect(received.map((p) => [p.data, p.recovered])).toEqual([
        ['four', undefined],
        ['five', undefined],
        ['eight', false],
      ]);
    });

    it('should apply pushes after the subscribe reply in the same frame', async () => {
      transport.responders.set('subscribe', () => null);
      const received: number[] = [];
      await connect();
      client.subscribe('news', (p) => received.push(p.offset));
      await flush();

      transport.last.deliverJson(
        { id: 2, subscribe: { recoverable: true, epoch: 'e1', offset: 0 } },
        { push: { channel: 'news', pub: { data: 'first', offset: 1 } } }
      );
      await flush();

      expect(received).toEqual([1]);
    });

    it('should treat terminal close codes as final', async () => {
      const disconnected = record(client, 'disconnected');
      await connect();

      transport.last.drop(3501, 'invalid token');
      await flush();
      await vi.advanceTimersByTimeAsync(30000);

      expect(client.getState()).toBe('disconnected');
      expect(disconnected).toEqual([{ code: 3501, reason: 'invalid token', reconnect: false }]);
      expect(transport.sessions).toHaveLength(1);
    });

    it('should map close code 1009 to the message size limit', async () => {
      const disconnected = record(client, 'disconnected');
      await connect();

      transport.last.drop(1009, '');
      await flush();

      expect(disconnected).toEqual([{ code: 3, reason: 'message size limit exceeded', reconnect: true }]);
      expect(client.getState()).toBe('reconnecting');
    });

    it('should follow server disconnect pushes', async () => {
      const disconnected = record(client, 'disconnected');
      await connect();

      transport.last.deliverJson({ push: { disconnect: { code: 3001, reason: 'shutdown' } } });
      await flush();
      expect(client.getState()).toBe('reconnecting');

      await vi.advanceTimersByTimeAsync(200);
      transport.last.deliverJson({ push: { disconnect: { code: 3500, reason: 'invalid token' } } });
      await flush();

      expect(client.getState()).toBe('disconnected');
      expect(disconnected).toEqual([
        { code: 3001, reason: 'shutdown', reconnect: true },
        { code: 3500, reason: 'invalid token', reconnect: false },
      ]);
    });

    it('should reconnect after a transport error', async () => {
      const errors = record(client, 'error');
      await connect();

      transport.last.fail(new Error('socket hang up'));
      await flush();

      expect(client.getState()).toBe('reconnecting');
      expect(errors).toEqual([{ code: 2, error: new Error('socket hang up') }]);
    });

    it('should reconnect when reading from the transport fails', async () => {
      const disconnected = record(client, 'disconnected');
      const errors = record(client, 'error');
      const received: number[] = [];
      await connect();
      client.subscribe('news', (p) => received.push(p.offset));
      await flush();

      transport.last.breakReader(new Error('reader broke'));
      await flush();

      expect(logger.error).toHaveBeenCalledWith('Read loop failed', { error: new Error('reader broke') });
      expect(errors).toEqual([{ code: 2, error: new Error('reader broke') }]);
      expect(disconnected).toEqual([{ code: 1, reason: 'transport closed', reconnect: true }]);

      await vi.advanceTimersByTimeAsync(200);
      expect(client.getState()).toBe('connected');

      transport.last.publish('news', 'two', 2);
      await flush();
      expect(received).toEqual([2]);
    });

    it('should treat offsets beyond the safe integer range as malformed', async () => {
      const errors = record(client, 'error');
      const received: number[] = [];
      await connect();
      client.subscribe('news', (p) => received.push(p.offset));
      await flush();

      transport.last.deliver('{"push":{"channel":"news","pub":{"data":"big","offset":9007199254740993}}}');
      transport.last.publish('news', 'two', 2);
      await flush();

      expect(errors.map((e) => e.code)).toEqual([15]);
      expect(received).toEqual([2]);
      expect(client.getState()).toBe('connected');
    });

    it('should not replay publications to a subscription removed in onSubscribed', async () => {
      transport.responders.set('subscribe', () => ({
        recoverable: true,
        epoch: 'e1',
        offset: 2,
        recovered: true,
        publications: [
          { data: 'a', offset: 1 },
          { data: 'b', offset: 2 },
        ],
      }));
      const received: unknown[] = [];
      await connect();

      client.subscribe(
        'news',
        {
          onSubscribed: () => {
            void client.unsubscribe('news');
          },
          onPublication: (p) => received.push(p.data),
        },
        { since: { offset: 0, epoch: 'e1' } }
      );
      await flush();

      expect(received).toEqual([]);
      expect(client.getSubscription('news')).toBeNull();
      expect(transport.last.commandsFor('unsubscribe')).toEqual([{ id: 3, unsubscribe: { channel: 'news' } }]);
    });
  });

  describe('closing', () => {
    it('should be idempotent and cancel pending work', async () => {
      transport.responders.set('publish', () => null);
      const disconnected = record(client, 'disconnected');
      await connect();
      const onSubscribing = vi.fn();
      const subscription = client.subscribe('news', { onSubscribing });
      await flush();
      const session = transport.last;
      const pending = client.publish('news', 1);

      client.close();
      client.close();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(client.getState()).toBe('disconnected');
      expect(disconnected).toEqual([{ code: 0, reason: 'disconnect called', reconnect: false }]);
      expect(session.closedWith).toEqual({ code: 1000, reason: '' });
      expect(subscription.state).toBe('suspended');
      expect(onSubscribing).toHaveBeenCalledWith({ channel: 'news', code: 2, reason: 'client closed' });

      await vi.advanceTimersByTimeAsync(60000);
      expect(transport.sessions).toHaveLength(1);
    });

    it('should cancel a connect() in progress', async () => {
      const connecting = client.connect();

      client.close();

      await expect(connecting).rejects.toBeInstanceOf(CancelledError);
      await flush();
      expect(transport.sessions).toHaveLength(0);
    });

    it('should cancel a scheduled reconnect', async () => {
      await connect();
      transport.last.drop();
      await flush();

      client.close();
      await vi.advanceTimersByTimeAsync(1000);

      expect(transport.sessions).toHaveLength(1);
    });

    it('should resubscribe kept subscriptions on the next connect', async () => {
      await connect();
      const subscription = client.subscribe('news', () => undefined);
      await flush();
      client.close();

      await connect();
      await flush();

      expect(subscription.state).toBe('subscribed');
      expect(transport.last.commandsFor('subscribe')).toEqual([{ id: 2, subscribe: { channel: 'news' } }]);
    });
  });

  describe('commands', () => {
    it('should reject commands while disconnected', async () => {
      await expect(client.publish('news', 1)).rejects.toThrow('Cannot send publish: client is disconnected');
      await expect(client.send({ a: 1 })).rejects.toBeInstanceOf(ConnectionLostError);
    });

    it('should time out a command and drop its late reply', async () => {
      transport.responders.set('publish', () => null);
      await connect();
      const pending = client.publish('news', { text: 'hi' });
      const assertion = expect(pending).rejects.toThrow('publish command 2 timed out after 1000ms');

      await vi.advanceTimersByTimeAsync(1000);
      await assertion;

      transport.last.reply(2, 'publish', {});
      await flush();

      expect(logger.warn).toHaveBeenCalledWith('Dropping reply without pending command', { id: 2 });
      expect(client.getState()).toBe('connected');
    });

    it('should read history', async () => {
      transport.responders.set('history', () => ({
        publications: [{ data: 'x', offset: 3, info: { client: 'c1', user: 'u1' } }],
        epoch: 'e1',
        offset: 3,
      }));
      await connect();

      const history = await client.history('news', { limit: 10, since: { offset: 1, epoch: 'e1' }, reverse: true });

      expect(history).toEqual({
        publications: [{ channel: 'news', data: 'x', offset: 3, info: { client: 'c1', user: 'u1' } }],
        offset: 3,
        epoch: 'e1',
      });
      expect(transport.last.commandsFor('history')).toEqual([
        { id: 2, history: { channel: 'news', limit: 10, since: { offset: 1, epoch: 'e1' }, reverse: true } },
      ]);
    });

    it('should read presence and presence stats', async () => {
      transport.responders.set('presence', () => ({
        presence: { c1: { client: 'c1', user: 'u1', conn_info: { name: 'Ann' } } },
      }));
      transport.responders.set('presence_stats', () => ({ num_clients: 3, num_users: 2 }));
      await connect();

      await expect(client.presence('room')).resolves.toEqual({
        clients: { c1: { client: 'c1', user: 'u1', connInfo: { name: 'Ann' } } },
      });
      await expect(client.presenceStats('room')).resolves.toEqual({ numClients: 3, numUsers: 2 });
    });

    it('should call server RPC methods', async () => {
      transport.responders.set('rpc', () => ({ data: { sum: 3 } }));
      await connect();

      await expect(client.rpc('sum', [1, 2])).resolves.toEqual({ data: { sum: 3 } });
      expect(transport.last.commandsFor('rpc')).toEqual([{ id: 2, rpc: { method: 'sum', data: [1, 2] } }]);
    });

    it('should send asynchronous messages without an id', async () => {
      await connect();

      await client.send({ a: 1 });

      expect(transport.last.sent[transport.last.sent.length - 1]).toBe('{"send":{"data":{"a":1}}}');
    });

    it('should surface server messages', async () => {
      const messages = record(client, 'message');
      await connect();

      transport.last.deliverJson({ push: { message: { data: { hello: 'world' } } } });
      await flush();

      expect(messages).toEqual([{ data: { hello: 'world' } }]);
    });

    it('should publish through a subscription once it is ready', async () => {
      await connect();
      const subscription = client.subscribe('news', () => undefined);
      const published = subscription.publish({ text: 'hi' });
      await flush();

      await expect(published).resolves.toEqual({});
      expect(transport.last.commandsFor('publish')).toEqual([
        { id: 3, publish: { channel: 'news', data: { text: 'hi' } } },
      ]);
    });
  });

  describe('keepalive and tokens', () => {
    it('should answer pings and reconnect when they stop', async () => {
      transport.responders.set('connect', () => ({ client: 'client-1', ping: 25, pong: true }));
      const disconnected = record(client, 'disconnected');
      await connect();
      const session = transport.last;

      await vi.advanceTimersByTimeAsync(30000);
      session.deliver('{}');
      await flush();
      expect(session.sent[session.sent.length - 1]).toBe('{}');

      await vi.advanceTimersByTimeAsync(34999);
      expect(client.getState()).toBe('connected');

      await vi.advanceTimersByTimeAsync(1);
      expect(client.getState()).toBe('reconnecting');
      expect(disconnected).toEqual([{ code: 2, reason: 'no ping', reconnect: true }]);
    });

    it('should refresh the connection token before it expires', async () => {
      const getConnectionToken = vi
        .fn<() => Promise<string>>()
        .mockResolvedValueOnce('test-token-a')
        .mockResolvedValueOnce('test-token-b');
      createClient({ tokenProvider: { getConnectionToken } });
      transport.responders.set('connect', () => ({ client: 'client-1', expires: true, ttl: 10 }));
      transport.responders.set('refresh', () => ({ expires: true, ttl: 10 }));
      await connect();

      await vi.advanceTimersByTimeAsync(10000);

      expect(transport.last.commandsFor('refresh')).toEqual([{ id: 2, refresh: { token: 'test-token-b' } }]);
      expect(client.getState()).toBe('connected');
    });

    it('should stop when the token provider refuses a refresh', async () => {
      const getConnectionToken = vi
        .fn<() => Promise<string>>()
        .mockResolvedValueOnce('test-token-a')
        .mockRejectedValueOnce(new UnauthorizedError());
      createClient({ tokenProvider: { getConnectionToken } });
      transport.responders.set('connect', () => ({ client: 'client-1', expires: true, ttl: 10 }));
      const errors = record(client, 'error');
      await connect();

      await vi.advanceTimersByTimeAsync(10000);

      expect(client.getState()).toBe('disconnected');
      expect(errors.map((e) => e.error)).toEqual([expect.any(AuthError)]);
    });

    it('should reconnect when the server rejects a token refresh', async () => {
      const getConnectionToken = vi.fn<() => Promise<string>>().mockResolvedValue('test-token');
      createClient({ tokenProvider: { getConnectionToken } });
      transport.responders.set('connect', () => ({ client: 'client-1', expires: true, ttl: 10 }));
      transport.responders.set('refresh', () => null);
      const errors = record(client, 'error');
      const disconnected = record(client, 'disconnected');
      await connect();

      await vi.advanceTimersByTimeAsync(10000);
      transport.last.replyError(2, 109, 'token expired');
      await flush();

      expect(errors.map((e) => e.code)).toEqual([6]);
      expect(disconnected).toEqual([{ code: 5, reason: 'token refresh failed', reconnect: true }]);
      expect(client.getState()).toBe('reconnecting');
    });

    it('should reconnect with a fresh token when fetching a refresh token fails', async () => {
      const getConnectionToken = vi
        .fn<() => Promise<string>>()
        .mockResolvedValueOnce('test-token-a')
        .mockRejectedValueOnce(new Error('token service down'))
        .mockResolvedValueOnce('test-token-c');
      createClient({ tokenProvider: { getConnectionToken } });
      transport.responders.set('connect', () => ({ client: 'client-1', expires: true, ttl: 10 }));
      const errors = record(client, 'error');
      await connect();

      await vi.advanceTimersByTimeAsync(10000);

      expect(errors).toEqual([{ code: 6, error: new Error('token service down') }]);
      expect(client.getState()).toBe('reconnecting');

      await vi.advanceTimersByTimeAsync(200);

      expect(client.getState()).toBe('connected');
      expect(transport.last.commandsFor('connect')).toEqual([
        { id: 1, connect: { name: 'js', token: 'test-token-c' } },
      ]);
    });

    it('should reconnect after repeated malformed frames', async () => {
      createClient({ maxMalformedFrames: 2 });
      const disconnected = record(client, 'disconnected');
      await connect();

      transport.last.deliver('junk\njunk');
      transport.last.deliver('{}');
      transport.last.deliver('junk\njunk');
      await flush();
      expect(client.getState()).toBe('connected');

      transport.last.deliver('junk');
      await flush();

      expect(client.getState()).toBe('reconnecting');
      expect(disconnected).toEqual([{ code: 6, reason: 'too many malformed frames', reconnect: true }]);
    });
  });

  describe('events', () => {
    it('should stop notifying removed listeners', async () => {
      const listener = vi.fn();
      client.on('connected', listener);
      client.off('connected', listener);

      await connect();

      expect(listener).not.toHaveBeenCalled();
    });

    it('should log listeners that throw and carry on', async () => {
      client.on('connected', () => {
        throw new Error('listener bug');
      });

      await connect();

      expect(client.getState()).toBe('connected');
      expect(logger.error).toHaveBeenCalledWith(
        'Event handler threw',
        expect.objectContaining({ event: 'connected' })
      );
    });
  });
});
