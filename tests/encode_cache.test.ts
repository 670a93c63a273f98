import { describe, expect, it, vi } from 'vitest';
import { EncodeCache, sharpJpegEncoder } from '../src/pipeline/encodeCache.js';
import { LatestFrameStore } from '../src/pipeline/frameStore.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { DisplayFrame } from '../src/types.js';
import { gradientFrame } from './helpers/fakeCamera.js';

function displayFrame(): DisplayFrame {
  return { ...gradientFrame(), overlay: [], night: false };
}

describe('EncodeCache', () => {
  it('serves an empty buffer before the first encode', () => {
    const cache = new EncodeCache({ encoder: async () => Buffer.from('jpeg'), metrics: new MetricsRegistry() });

    expect(cache.getCached().length).toBe(0);
    expect(cache.getLatest()).toBeNull();
    expect(cache.recent()).toEqual([]);
  });

  it('numbers encoded frames and keeps a short ring of recent ones', async () => {
    let counter = 0;
    const encoder = vi.fn(async () => Buffer.from(`jpeg-${(counter += 1)}`));
    const metrics = new MetricsRegistry();
    const cache = new EncodeCache({ encoder, quality: 85, ringSize: 2, now: () => 42, metrics });

    for (let i = 0; i < 3; i += 1) {
      await cache.encodeAndCache(displayFrame());
    }

    expect(encoder).toHaveBeenLastCalledWith(expect.objectContaining({ width: 64, height: 48 }), 85);
    expect(cache.getCached().toString()).toBe('jpeg-3');
    expect(cache.getLatest()).toEqual({ data: Buffer.from('jpeg-3'), publishedAt: 42, sequence: 3 });
    expect(cache.recent().map(entry => entry.sequence)).toEqual([2, 3]);
    expect(metrics.snapshot().frames.encoded).toBe(3);
    expect(metrics.snapshot().latencies.encode.count).toBe(3);
  });

  it('keeps the previous bytes when encoding fails', async () => {
    const encoder = vi
      .fn(async () => Buffer.from('good'))
      .mockResolvedValueOnce(Buffer.from('good'))
      .mockRejectedValueOnce(new Error('out of memory'));
    const metrics = new MetricsRegistry();
    const cache = new EncodeCache({ encoder, metrics });

    await cache.encodeAndCache(displayFrame());
    await expect(cache.encodeAndCache(displayFrame())).resolves.toBeNull();

    expect(cache.getCached().toString()).toBe('good');
    expect(cache.getLatest()?.sequence).toBe(1);
    expect(metrics.snapshot().frames.encodeFailures).toBe(1);
  });

  it('produces a JPEG with sharp', async () => {
    const jpeg = await sharpJpegEncoder(displayFrame(), 80);

    expect(jpeg[0]).toBe(0xff);
    expect(jpeg[1]).toBe(0xd8);
    expect(jpeg[jpeg.length - 2]).toBe(0xff);
    expect(jpeg[jpeg.length - 1]).toBe(0xd9);
  });
});

describe('LatestFrameStore', () => {
  it('swaps in the newest frame and its publish time', () => {
    const store = new LatestFrameStore(() => 100);
    expect(store.get()).toBeNull();
    expect(store.lastFrameAt()).toBeNull();

    const first = displayFrame();
    const second = displayFrame();
    store.publish(first);
    store.publish(second, 250);

    expect(store.get()).toBe(second);
    expect(store.lastFrameAt()).toBe(250);
  });
});
