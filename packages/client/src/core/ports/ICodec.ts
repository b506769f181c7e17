import type { Command, JsonValue, Push, Reply } from '@pushline/shared';

/**
 * Codec Port
 * Pure translation between commands/replies and wire frames.
 */
export type DecodedFrame =
  | { kind: 'reply'; reply: Reply }
  | { kind: 'push'; push: Push }
  | { kind: 'ping' }
  | { kind: 'malformed'; raw: string; reason: string };

export interface ICodec {
  readonly name: string;
  /** WebSocket subprotocols to request for this encoding */
  readonly protocols: string[];
  encode(command: Command): string;
  encodeBatch(commands: Command[]): string;
  encodePong(): string;
  /** Asynchronous message; carries no id and gets no reply */
  encodeSend(data: JsonValue): string;
  decode(data: string): DecodedFrame[];
}
