import { describe, expect, it, vi } from 'vitest';
import { FrameSource } from '../src/camera/frameSource.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { CaptureLoop } from '../src/pipeline/captureLoop.js';
import { EncodeCache } from '../src/pipeline/encodeCache.js';
import { FpsTracker } from '../src/pipeline/fpsTracker.js';
import { LatestFrameStore } from '../src/pipeline/frameStore.js';
import type { RawFrame } from '../src/types.js';
import { Enhancer } from '../src/video/enhancer.js';
import { NightVisionController } from '../src/video/nightVision.js';
import { DRIVER_CONFIG, FakeDriver, makeFrame } from './helpers/fakeCamera.js';

type PipelineOptions = {
  produce?: () => RawFrame;
  now?: () => number;
  targetFps?: number;
  cameraSleep?: (ms: number) => Promise<void>;
};

function createPipeline(options: PipelineOptions = {}) {
  const metrics = new MetricsRegistry();
  const now = options.now ?? (() => 10_000);
  const driver = new FakeDriver(options.produce);
  const source = new FrameSource({
    driver,
    driverConfig: DRIVER_CONFIG,
    sleep: options.cameraSleep ?? (async () => {}),
    now,
    metrics
  });
  const store = new LatestFrameStore(now);
  const fps = new FpsTracker();
  const encoder = vi.fn(async () => Buffer.from([0xff, 0xd8, 0xff, 0xd9]));
  const cache = new EncodeCache({ encoder, now, metrics });
  const nightVision = new NightVisionController({
    enabled: true,
    autoMode: true,
    strength: 0.6,
    lightThreshold: 40,
    greenMode: false,
    debounceMs: 3000,
    now,
    metrics
  });
  const loop = new CaptureLoop({
    source,
    enhancer: new Enhancer({ metrics }),
    store,
    cache,
    fps,
    nightVision,
    processing: () => ({ processingLevel: 1, reduceProcessing: false }),
    targetFps: options.targetFps ?? 30,
    now,
    metrics
  });
  return { loop, driver, source, store, fps, cache, encoder, nightVision, metrics };
}

describe('CaptureLoop', () => {
  it('publishes, records and encodes a captured frame', async () => {
    const { loop, store, fps, cache, encoder } = createPipeline();

    await expect(loop.runOnce()).resolves.toBe('captured');

    expect(store.get()?.overlay[1]).toBe('FPS: 0.0');
    expect(store.lastFrameAt()).toBe(10_000);
    expect(fps.sampleCount).toBe(1);
    expect(encoder).toHaveBeenCalledTimes(1);
    expect(cache.getLatest()?.sequence).toBe(1);
    expect(loop.state()).toBe('capturing');
  });

  it('opens the camera on demand and reports when it is unavailable', async () => {
    const { loop, driver, store } = createPipeline();
    driver.alwaysFail = true;

    await expect(loop.runOnce()).resolves.toBe('no-camera');
    expect(loop.state()).toBe('awaiting-camera');
    expect(store.get()).toBeNull();

    driver.alwaysFail = false;
    await expect(loop.runOnce()).resolves.toBe('captured');
  });

  it('drops invalid frames without publishing them', async () => {
    const { loop, store, fps, encoder, metrics } = createPipeline({
      produce: () => makeFrame(64, 48, () => [0, 0, 0])
    });

    await expect(loop.runOnce()).resolves.toBe('rejected');

    expect(store.get()).toBeNull();
    expect(fps.sampleCount).toBe(0);
    expect(encoder).not.toHaveBeenCalled();
    expect(metrics.snapshot().frames.rejected).toBe(1);
  });

  it('releases the camera after three consecutive capture failures', async () => {
    const { loop, driver, source } = createPipeline();
    await source.initialize();
    const first = driver.latest();
    if (!first) {
      throw new Error('expected an open handle');
    }
    first.failWith = new Error('usb disconnected');

    await expect(loop.runOnce()).resolves.toBe('failed');
    await expect(loop.runOnce()).resolves.toBe('failed');
    expect(source.isOpen()).toBe(true);

    await expect(loop.runOnce()).resolves.toBe('failed');
    expect(source.isOpen()).toBe(false);
    expect(first.stopped).toBe(true);
    expect(loop.state()).toBe('awaiting-camera');

    await expect(loop.runOnce()).resolves.toBe('captured');
    expect(driver.handles).toHaveLength(2);
    expect(driver.liveHandles()).toHaveLength(1);
  });

  it('waits for the camera cooldown before reopening a released camera', async () => {
    const waits: Array<{ ms: number; handlesOpened: number }> = [];
    let driverRef: FakeDriver | null = null;
    const { loop, driver, source } = createPipeline({
      cameraSleep: async ms => {
        waits.push({ ms, handlesOpened: driverRef?.handles.length ?? 0 });
      }
    });
    driverRef = driver;
    await source.initialize();
    const first = driver.latest();
    if (!first) {
      throw new Error('expected an open handle');
    }
    first.failWith = new Error('usb disconnected');

    for (let i = 0; i < 3; i += 1) {
      await loop.runOnce();
    }
    expect(first.stopped).toBe(true);
    expect(waits).toEqual([]);

    await expect(loop.runOnce()).resolves.toBe('captured');
    expect(waits).toEqual([{ ms: 2000, handlesOpened: 1 }]);
    expect(driver.handles).toHaveLength(2);
  });

  it('resets the failure count after a successful capture', async () => {
    const { loop, driver, source } = createPipeline();
    await source.initialize();
    const handle = driver.latest();
    if (!handle) {
      throw new Error('expected an open handle');
    }

    handle.failWith = new Error('glitch');
    await loop.runOnce();
    await loop.runOnce();
    handle.failWith = null;
    await loop.runOnce();
    handle.failWith = new Error('glitch');
    await loop.runOnce();
    await loop.runOnce();

    expect(source.isOpen()).toBe(true);
  });

  it('feeds the low-light signal to night vision', async () => {
    const { loop, nightVision } = createPipeline({
      produce: () =>
        makeFrame(64, 48, x => {
          const value = 10 + (x % 16);
          return [value, value, value];
        })
    });

    await loop.runOnce();

    expect(nightVision.active).toBe(true);
    expect(nightVision.mode()).toBe('auto-night');
  });

  it('runs until stopped', async () => {
    let clock = 0;
    const { loop, cache } = createPipeline({ now: () => (clock += 5), targetFps: 200 });

    loop.start();
    expect(loop.isRunning).toBe(true);

    await vi.waitFor(() => {
      expect(cache.getLatest()?.sequence ?? 0).toBeGreaterThanOrEqual(3);
    });

    await loop.stop();
    expect(loop.isRunning).toBe(false);
    expect(loop.state()).toBe('idle');

    const sequence = cache.getLatest()?.sequence;
    await new Promise(resolve => setTimeout(resolve, 20));
    expect(cache.getLatest()?.sequence).toBe(sequence);
  });
});
