import type { StreamPositionShape } from '../types/centrifugo.types.js';

/**
 * StreamPosition value object
 * Offset inside a channel history stream, scoped by the stream epoch.
 * Positions only move forward within one epoch.
 */
export class StreamPosition {
  constructor(
    public readonly offset: number,
    public readonly epoch: string
  ) {
    this.validate();
  }

  private validate(): void {
    if (!Number.isSafeInteger(this.offset) || this.offset < 0) {
      throw new Error(`Stream offset must be a non-negative integer, got ${this.offset}`);
    }
  }

  static initial(epoch: string): StreamPosition {
    return new StreamPosition(0, epoch);
  }

  static from(shape: StreamPositionShape): StreamPosition {
    return new StreamPosition(shape.offset, shape.epoch);
  }

  /**
   * Position after seeing `offset`. Never moves backwards.
   */
  advance(offset: number): StreamPosition {
    if (offset <= this.offset) {
      return this;
    }
    return new StreamPosition(offset, this.epoch);
  }

  /**
   * True when a publication at `offset` was already seen in this epoch.
   */
  covers(offset: number): boolean {
    return offset > 0 && offset <= this.offset;
  }

  sameEpoch(epoch: string): boolean {
    return this.epoch === epoch;
  }

  equals(other: StreamPosition): boolean {
    return this.offset === other.offset && this.epoch === other.epoch;
  }

  toJSON(): StreamPositionShape {
    return {
      offset: this.offset,
      epoch: this.epoch,
    };
  }
}
