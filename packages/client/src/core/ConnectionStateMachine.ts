import { backoffDelay, type BackoffRange, type RandomSource } from './backoff.js';
import { InvalidTransitionError } from './errors.js';

/**
 * Connection state
 */
export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'authenticating'
  | 'connected'
  | 'reconnecting';

export const TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  disconnected: ['connecting'],
  connecting: ['authenticating', 'reconnecting', 'disconnected'],
  authenticating: ['connected', 'reconnecting', 'disconnected'],
  connected: ['reconnecting', 'disconnected'],
  reconnecting: ['connecting', 'disconnected'],
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export type StateListener = (change: { oldState: ConnectionState; newState: ConnectionState }) => void;

/**
 * Explicit connection lifecycle.
 *
 * Holds the current state and the reconnect attempt counter; the client
 * drives it and performs the side effects of each transition.
 */
export class ConnectionStateMachine {
  private current: ConnectionState = 'disconnected';
  private attempts = 0;

  constructor(
    private readonly backoff: BackoffRange,
    private readonly random: RandomSource = Math.random,
    private readonly onChange?: StateListener
  ) {}

  get state(): ConnectionState {
    return this.current;
  }

  get reconnectAttempts(): number {
    return this.attempts;
  }

  is(...states: ConnectionState[]): boolean {
    return states.includes(this.current);
  }

  /**
   * Moves to `next`. Throws `InvalidTransitionError` for anything outside
   * the table; a transition to the current state is a no-op.
   */
  transition(next: ConnectionState): void {
    if (next === this.current) return;
    if (!canTransition(this.current, next)) {
      throw new InvalidTransitionError(this.current, next);
    }

    const oldState = this.current;
    this.current = next;

    if (next === 'connected' || next === 'disconnected') {
      this.attempts = 0;
    }

    this.onChange?.({ oldState, newState: next });
  }

  /**
   * Delay for the next reconnect attempt; bumps the attempt counter.
   */
  nextReconnectDelay(): number {
    const delay = backoffDelay(this.attempts, this.backoff, this.random);
    this.attempts++;
    return delay;
  }
}
