import type { TransportFrame } from './ports/ITransport.js';

/**
 * Single-consumer queue bridging event-style socket callbacks to the
 * pull-style `receive()` sequence. Accepts nothing after the first
 * `closed`/`error` frame.
 */
export class FrameQueue {
  private readonly items: TransportFrame[] = [];
  private waiter: ((frame: TransportFrame) => void) | null = null;
  private terminated = false;

  get isTerminated(): boolean {
    return this.terminated;
  }

  push(frame: TransportFrame): void {
    if (this.terminated) return;
    if (frame.kind !== 'message') {
      this.terminated = true;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(frame);
    } else {
      this.items.push(frame);
    }
  }

  shift(): Promise<TransportFrame> {
    const next = this.items.shift();
    if (next) {
      return Promise.resolve(next);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Drains the queue until the terminal frame, which is yielded last.
   */
  async *drain(): AsyncGenerator<TransportFrame, void, undefined> {
    while (true) {
      const frame = await this.shift();
      yield frame;
      if (frame.kind !== 'message') return;
    }
  }
}
