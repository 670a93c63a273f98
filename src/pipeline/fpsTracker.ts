import type { FpsStats } from '../types.js';

const DEFAULT_WINDOW = 10;

const ZERO_STATS: FpsStats = { current: 0, min: 0, max: 0, avg: 0 };

/**
 * Sliding window over the last capture timestamps.
 *
 * `current` is the windowed rate (intervals / elapsed), `avg` the mean of the
 * per-interval rates, `min` / `max` their extremes. Because the windowed rate
 * is the harmonic mean of the per-interval rates it always lies within
 * `[min, max]`. All values are zero until two timestamps exist.
 */
export class FpsTracker {
  private readonly timestamps: number[] = [];
  private cached: FpsStats = ZERO_STATS;

  constructor(private readonly windowSize = DEFAULT_WINDOW) {}

  get sampleCount(): number {
    return this.timestamps.length;
  }

  record(at: number) {
    this.timestamps.push(at);
    if (this.timestamps.length > this.windowSize) {
      this.timestamps.shift();
    }
    this.cached = this.compute();
  }

  stats(): FpsStats {
    return { ...this.cached };
  }

  reset() {
    this.timestamps.length = 0;
    this.cached = ZERO_STATS;
  }

  private compute(): FpsStats {
    let elapsed = 0;
    let intervals = 0;
    let sumRates = 0;
    let min = Number.POSITIVE_INFINITY;
    let max = 0;

    for (let i = 1; i < this.timestamps.length; i += 1) {
      const delta = this.timestamps[i] - this.timestamps[i - 1];
      if (delta <= 0) {
        continue;
      }
      const rate = 1000 / delta;
      elapsed += delta;
      intervals += 1;
      sumRates += rate;
      min = Math.min(min, rate);
      max = Math.max(max, rate);
    }

    if (intervals === 0) {
      return ZERO_STATS;
    }

    return {
      current: (intervals * 1000) / elapsed,
      min,
      max,
      avg: sumRates / intervals
    };
  }
}
