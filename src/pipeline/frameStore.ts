import type { DisplayFrame } from '../types.js';

type StoredFrame = {
  frame: DisplayFrame;
  publishedAt: number;
};

/**
 * Holds the most recent display frame. A publish swaps one reference, so a
 * reader sees either the previous entry or the new one, never a mix.
 */
export class LatestFrameStore {
  private entry: StoredFrame | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  publish(frame: DisplayFrame, publishedAt = this.now()) {
    this.entry = { frame, publishedAt };
  }

  get(): DisplayFrame | null {
    return this.entry?.frame ?? null;
  }

  lastFrameAt(): number | null {
    return this.entry?.publishedAt ?? null;
  }
}
