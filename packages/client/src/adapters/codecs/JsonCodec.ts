import {
  pushSchema,
  replyEnvelopeSchema,
  validateFrame,
  type Command,
  type JsonValue,
  type Reply,
} from '@pushline/shared';
import type { DecodedFrame, ICodec } from '../../core/ports/ICodec.js';
import { ProtocolError } from '../../core/errors.js';

const REPLY_RESERVED_KEYS = new Set(['id', 'error']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rejectBinary(_key: string, value: unknown): unknown {
  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    throw new ProtocolError('Binary payloads are not supported by the JSON protocol');
  }
  return value;
}

/**
 * JSON codec for the Centrifugo client protocol.
 * Several commands or replies may share one frame, separated by newlines.
 */
export class JsonCodec implements ICodec {
  readonly name = 'json';
  readonly protocols: string[] = [];

  encode(command: Command): string {
    const wire: Record<string, unknown> = {
      id: command.id,
      [command.method]: command.params,
    };
    return JSON.stringify(wire, rejectBinary);
  }

  encodeBatch(commands: Command[]): string {
    return commands.map((command) => this.encode(command)).join('\n');
  }

  encodePong(): string {
    return '{}';
  }

  encodeSend(data: JsonValue): string {
    return JSON.stringify({ send: { data } }, rejectBinary);
  }

  decode(data: string): DecodedFrame[] {
    const frames: DecodedFrame[] = [];
    for (const line of data.split('\n')) {
      const trimmed = line.trim();
      if (trimmed.length === 0) continue;
      frames.push(this.decodeLine(trimmed));
    }
    return frames;
  }

  private decodeLine(line: string): DecodedFrame {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { kind: 'malformed', raw: line, reason: `invalid JSON: ${message}` };
    }

    if (!isRecord(parsed)) {
      return { kind: 'malformed', raw: line, reason: 'frame is not an object' };
    }

    if (parsed.id !== undefined && parsed.id !== 0) {
      return this.decodeReply(line, parsed);
    }

    if (parsed.push !== undefined) {
      const validation = validateFrame(pushSchema, parsed.push);
      if (!validation.success) {
        return { kind: 'malformed', raw: line, reason: `invalid push: ${validation.error}` };
      }
      return { kind: 'push', push: validation.data };
    }

    if (Object.keys(parsed).length === 0) {
      return { kind: 'ping' };
    }

    return { kind: 'malformed', raw: line, reason: 'unrecognized frame' };
  }

  private decodeReply(line: string, parsed: Record<string, unknown>): DecodedFrame {
    const validation = validateFrame(replyEnvelopeSchema, parsed);
    if (!validation.success) {
      return { kind: 'malformed', raw: line, reason: `invalid reply: ${validation.error}` };
    }

    const envelope = validation.data;
    const reply: Reply = { id: envelope.id };
    if (envelope.error) {
      reply.error = envelope.error;
    }

    const method = Object.keys(envelope).find((key) => !REPLY_RESERVED_KEYS.has(key));
    if (method !== undefined) {
      reply.method = method;
      reply.result = envelope[method];
    }

    return { kind: 'reply', reply };
  }
}
