import {
  resultSchemas,
  validateFrame,
  type Command,
  type Method,
  type ParamsMap,
  type Reply,
  type ResultMap,
} from '@pushline/shared';
import type { ICodec } from './ports/ICodec.js';
import type { ILogger } from './ports/ILogger.js';
import type { FrameSink } from './ports/ITransport.js';
import {
  ConnectionLostError,
  MalformedFrameError,
  ReplyError,
  TimeoutError,
  toError,
} from './errors.js';

interface PendingReply {
  id: number;
  method: Method;
  timer: NodeJS.Timeout;
  settle(reply: Reply): Promise<void>;
  fail(error: Error): void;
}

/**
 * Command Dispatcher
 *
 * Assigns correlation ids, keeps one pending entry per id and resolves it
 * with the validated result when the matching reply arrives. Never retries.
 */
export class CommandDispatcher {
  private sink: FrameSink | null = null;
  private lastId = 0;
  private readonly pending = new Map<number, PendingReply>();
  private queued: Command[] | null = null;

  constructor(
    private readonly codec: ICodec,
    private readonly logger: ILogger,
    private readonly defaultTimeoutMs: number = 5000
  ) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  get isAttached(): boolean {
    return this.sink !== null;
  }

  hasPending(id: number): boolean {
    return this.pending.has(id);
  }

  /**
   * Bind a fresh session. Ids restart at 1.
   */
  attach(sink: FrameSink): void {
    if (this.pending.size > 0) {
      this.failAll(new ConnectionLostError('Session replaced'));
    }
    this.sink = sink;
    this.queued = null;
    this.lastId = 0;
  }

  /**
   * Unbind the session and fail everything still waiting.
   */
  detach(error: Error): void {
    this.sink = null;
    this.queued = null;
    this.failAll(error);
  }

  /**
   * Holds new commands back until `flushBatch`, which writes them as one frame.
   */
  startBatching(): void {
    if (!this.queued) {
      this.queued = [];
    }
  }

  flushBatch(): void {
    const queued = this.queued;
    this.queued = null;
    if (!queued) return;

    const commands = queued.filter((command) => this.pending.has(command.id));
    if (commands.length === 0) return;

    const sink = this.sink;
    if (!sink) {
      this.failQueued(commands, new ConnectionLostError('Cannot send batch: not connected'));
      return;
    }

    let frame: string;
    try {
      frame = this.codec.encodeBatch(commands);
    } catch (err) {
      this.failQueued(commands, toError(err));
      return;
    }

    try {
      sink.send(frame);
    } catch (err) {
      this.failQueued(commands, new ConnectionLostError('Failed to send batch', { cause: err }));
      return;
    }

    this.logger.debug('Command batch sent', { ids: commands.map((command) => command.id) });
  }

  request<M extends Method>(
    method: M,
    params: ParamsMap[M],
    timeoutMs?: number
  ): Promise<ResultMap[M]> {
    return this.requestAndProcess(method, params, (result) => result, timeoutMs);
  }

  /**
   * Like `request`, but `process` runs inside the read loop before the
   * next reply or push is handled.
   */
  requestAndProcess<M extends Method, T>(
    method: M,
    params: ParamsMap[M],
    process: (result: ResultMap[M]) => T | Promise<T>,
    timeoutMs: number = this.defaultTimeoutMs
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const sink = this.sink;
      if (!sink) {
        reject(new ConnectionLostError(`Cannot send ${method}: not connected`));
        return;
      }

      const id = ++this.lastId;
      const command: Command<M> = { id, method, params };

      let frame = '';
      if (!this.queued) {
        try {
          frame = this.codec.encode(command);
        } catch (err) {
          reject(toError(err));
          return;
        }
      }

      this.pending.set(id, {
        id,
        method,
        timer: setTimeout(() => this.expire(id, timeoutMs), timeoutMs),
        settle: async (reply) => {
          if (reply.error) {
            reject(new ReplyError(reply.error.code, reply.error.message, reply.error.temporary ?? false));
            return;
          }
          const validation = validateFrame(resultSchemas[method], reply.result ?? {});
          if (!validation.success) {
            reject(new MalformedFrameError(`Invalid ${method} result: ${validation.error}`));
            return;
          }
          try {
            resolve(await process(validation.data));
          } catch (err) {
            reject(toError(err));
          }
        },
        fail: reject,
      });

      if (this.queued) {
        this.queued.push(command);
        return;
      }

      try {
        sink.send(frame);
      } catch (err) {
        this.remove(id);
        reject(new ConnectionLostError(`Failed to send ${method}`, { cause: err }));
        return;
      }

      this.logger.debug('Command sent', { id, method });
    });
  }

  /**
   * Called by the read loop for every decoded reply.
   */
  async handleReply(reply: Reply): Promise<void> {
    const entry = this.remove(reply.id);
    if (!entry) {
      this.logger.warn('Dropping reply without pending command', { id: reply.id });
      return;
    }
    await entry.settle(reply);
  }

  private expire(id: number, timeoutMs: number): void {
    const entry = this.remove(id);
    if (!entry) return;
    this.logger.warn('Command timed out', { id, method: entry.method, timeoutMs });
    entry.fail(new TimeoutError(`${entry.method} command ${id} timed out after ${timeoutMs}ms`));
  }

  private remove(id: number): PendingReply | undefined {
    const entry = this.pending.get(id);
    if (entry) {
      clearTimeout(entry.timer);
      this.pending.delete(id);
    }
    return entry;
  }

  private failQueued(commands: Command[], error: Error): void {
    for (const command of commands) {
      this.remove(command.id)?.fail(error);
    }
  }

  private failAll(error: Error): void {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      clearTimeout(entry.timer);
      entry.fail(error);
    }
  }
}
