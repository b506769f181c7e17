import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CommandDispatcher } from '../../core/CommandDispatcher.js';
import { JsonCodec } from '../../adapters/codecs/JsonCodec.js';
import type { ILogger } from '../../core/ports/ILogger.js';
import {
  ConnectionLostError,
  MalformedFrameError,
  ReplyError,
  TimeoutError,
} from '../../core/errors.js';
import { RecordingSink, createMockLogger } from '../helpers/fakes.js';

describe('CommandDispatcher', () => {
  let logger: ILogger;
  let sink: RecordingSink;
  let dispatcher: CommandDispatcher;

  beforeEach(() => {
    vi.useFakeTimers();
    logger = createMockLogger();
    sink = new RecordingSink();
    dispatcher = new CommandDispatcher(new JsonCodec(), logger, 1000);
    dispatcher.attach(sink);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should assign increasing ids starting at 1', () => {
    void dispatcher.request('publish', { channel: 'a', data: 1 }).catch(() => undefined);
    void dispatcher.request('publish', { channel: 'b', data: 2 }).catch(() => undefined);

    expect(sink.frames).toEqual([
      '{"id":1,"publish":{"channel":"a","data":1}}',
      '{"id":2,"publish":{"channel":"b","data":2}}',
    ]);
    expect(dispatcher.pendingCount).toBe(2);
  });

  it('should resolve with the validated result', async () => {
    const pending = dispatcher.request('presence_stats', { channel: 'news' });

    await dispatcher.handleReply({ id: 1, method: 'presence_stats', result: { num_clients: 2, num_users: 1 } });

    await expect(pending).resolves.toEqual({ num_clients: 2, num_users: 1 });
    expect(dispatcher.pendingCount).toBe(0);
  });

  it('should correlate replies that arrive out of order', async () => {
    const rpc = dispatcher.request('rpc', { method: 'sum', data: [1, 2] });
    const history = dispatcher.request('history', { channel: 'news' });

    await dispatcher.handleReply({ id: 2, method: 'history', result: { epoch: 'e1', offset: 9 } });
    await dispatcher.handleReply({ id: 1, method: 'rpc', result: { data: 3 } });

    await expect(rpc).resolves.toEqual({ data: 3 });
    await expect(history).resolves.toEqual({ publications: [], epoch: 'e1', offset: 9 });
  });

  it('should reject with the server error', async () => {
    const pending = dispatcher.request('publish', { channel: 'news', data: {} });

    await dispatcher.handleReply({ id: 1, error: { code: 103, message: 'permission denied', temporary: false } });

    await expect(pending).rejects.toBeInstanceOf(ReplyError);
    await expect(pending).rejects.toMatchObject({ serverCode: 103, temporary: false, message: 'permission denied' });
  });

  it('should reject results that fail validation', async () => {
    const pending = dispatcher.request('connect', {});

    await dispatcher.handleReply({ id: 1, method: 'connect', result: { version: '5' } });

    await expect(pending).rejects.toBeInstanceOf(MalformedFrameError);
  });

  it('should time out, forget the command and drop the late reply', async () => {
    const pending = dispatcher.request('publish', { channel: 'news', data: 1 });
    const assertion = expect(pending).rejects.toThrow('publish command 1 timed out after 1000ms');

    vi.advanceTimersByTime(1000);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    expect(dispatcher.hasPending(1)).toBe(false);

    await dispatcher.handleReply({ id: 1, method: 'publish', result: {} });
    expect(logger.warn).toHaveBeenCalledWith('Dropping reply without pending command', { id: 1 });
  });

  it('should honour a per-request timeout', async () => {
    const pending = dispatcher.requestAndProcess('publish', { channel: 'a', data: 1 }, () => 'done', 50);
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    vi.advanceTimersByTime(50);
    await assertion;
  });

  it('should reject immediately when no session is attached', async () => {
    const detached = new CommandDispatcher(new JsonCodec(), logger);

    await expect(detached.request('publish', { channel: 'a', data: 1 })).rejects.toThrow(
      new ConnectionLostError('Cannot send publish: not connected')
    );
  });

  it('should fail pending commands on detach', async () => {
    const pending = dispatcher.request('presence', { channel: 'news' });

    dispatcher.detach(new ConnectionLostError('Connection lost: transport closed'));

    await expect(pending).rejects.toThrow('Connection lost: transport closed');
    expect(dispatcher.isAttached).toBe(false);
    expect(dispatcher.pendingCount).toBe(0);
  });

  it('should restart ids and fail leftovers when a new session attaches', async () => {
    const pending = dispatcher.request('presence', { channel: 'news' });
    const next = new RecordingSink();

    dispatcher.attach(next);
    void dispatcher.request('presence', { channel: 'news' }).catch(() => undefined);

    await expect(pending).rejects.toThrow('Session replaced');
    expect(next.lastCommand()).toEqual({ id: 1, presence: { channel: 'news' } });
  });

  it('should reject and forget a command the sink refuses', async () => {
    sink.failing = true;

    await expect(dispatcher.request('publish', { channel: 'a', data: 1 })).rejects.toThrow(
      'Failed to send publish'
    );
    expect(dispatcher.pendingCount).toBe(0);
  });

  it('should run the processing step before handleReply returns', async () => {
    const order: string[] = [];
    const pending = dispatcher.requestAndProcess('subscribe', { channel: 'news' }, (result) => {
      order.push(`processed ${result.epoch}`);
      return result.offset;
    });

    await dispatcher.handleReply({ id: 1, method: 'subscribe', result: { epoch: 'e1', offset: 4 } });
    order.push('reply handled');

    expect(order).toEqual(['processed e1', 'reply handled']);
    await expect(pending).resolves.toBe(4);
  });

  it('should write batched commands as one frame', async () => {
    dispatcher.startBatching();
    const first = dispatcher.request('subscribe', { channel: 'a' });
    const second = dispatcher.request('subscribe', { channel: 'b' });
    expect(sink.frames).toEqual([]);

    dispatcher.flushBatch();

    expect(sink.frames).toEqual(['{"id":1,"subscribe":{"channel":"a"}}\n{"id":2,"subscribe":{"channel":"b"}}']);

    await dispatcher.handleReply({ id: 2, method: 'subscribe', result: {} });
    await dispatcher.handleReply({ id: 1, method: 'subscribe', result: {} });
    await expect(first).resolves.toMatchObject({ recoverable: false });
    await expect(second).resolves.toMatchObject({ recoverable: false });
  });

  it('should send nothing for an empty batch', () => {
    dispatcher.startBatching();
    dispatcher.flushBatch();

    expect(sink.frames).toEqual([]);
  });

  it('should fail every batched command when the sink refuses the frame', async () => {
    dispatcher.startBatching();
    const first = dispatcher.request('subscribe', { channel: 'a' });
    const second = dispatcher.request('subscribe', { channel: 'b' });
    sink.failing = true;

    dispatcher.flushBatch();

    await expect(first).rejects.toBeInstanceOf(ConnectionLostError);
    await expect(second).rejects.toBeInstanceOf(ConnectionLostError);
    expect(dispatcher.pendingCount).toBe(0);
  });

  it('should drop a pending batch on detach', async () => {
    dispatcher.startBatching();
    const pending = dispatcher.request('subscribe', { channel: 'a' });

    dispatcher.detach(new ConnectionLostError('gone'));
    dispatcher.flushBatch();

    await expect(pending).rejects.toBeInstanceOf(ConnectionLostError);
    expect(sink.frames).toEqual([]);
  });
});
