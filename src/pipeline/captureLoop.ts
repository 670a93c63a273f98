import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { toError } from '../errors.js';
import type { CaptureState, DisplayFrame, FpsStats, ProcessingConfig, RawFrame } from '../types.js';
import type { EnhanceResult, NightVisionView } from '../video/enhancer.js';
import { isAbortError, sleep as defaultSleep, type Sleep } from '../utils/time.js';

const DEFAULT_AWAIT_CAMERA_DELAY_MS = 1000;
const DEFAULT_FAILURE_DELAY_MS = 100;
const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;

export type CaptureOutcome = 'no-camera' | 'captured' | 'rejected' | 'failed';

export interface CaptureSource {
  isOpen(): boolean;
  initialize(): Promise<void>;
  captureRaw(): Promise<RawFrame>;
  release(): Promise<void>;
}

export interface FrameEnhancer {
  enhance(
    raw: RawFrame,
    processing: ProcessingConfig,
    night: NightVisionView,
    fps: number,
    now?: number
  ): EnhanceResult;
}

export interface NightVisionInput {
  snapshot(): NightVisionView;
  observe(lowLight: boolean, now?: number): boolean;
}

export interface CaptureLoopOptions {
  source: CaptureSource;
  enhancer: FrameEnhancer;
  store: { publish(frame: DisplayFrame, publishedAt?: number): void };
  cache: { encodeAndCache(frame: DisplayFrame): Promise<unknown> };
  fps: { record(at: number): void; stats(): FpsStats };
  nightVision: NightVisionInput;
  processing: () => ProcessingConfig;
  targetFps: number;
  awaitCameraDelayMs?: number;
  failureDelayMs?: number;
  maxConsecutiveFailures?: number;
  sleep?: Sleep;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

/**
 * Single producer: capture, enhance, publish, encode, pace. Camera access is
 * limited to `captureRaw`; enhancement and encoding run after the camera lock
 * is released.
 */
export class CaptureLoop {
  private currentState: CaptureState = 'idle';
  private running: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private consecutiveFailures = 0;
  private readonly frameIntervalMs: number;
  private readonly awaitCameraDelayMs: number;
  private readonly failureDelayMs: number;
  private readonly maxConsecutiveFailures: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: CaptureLoopOptions) {
    this.frameIntervalMs = 1000 / Math.max(1, options.targetFps);
    this.awaitCameraDelayMs = options.awaitCameraDelayMs ?? DEFAULT_AWAIT_CAMERA_DELAY_MS;
    this.failureDelayMs = options.failureDelayMs ?? DEFAULT_FAILURE_DELAY_MS;
    this.maxConsecutiveFailures = Math.max(1, options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.log = (options.log ?? logger).child({ component: 'capture' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  state(): CaptureState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  start() {
    if (this.running) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal);
    this.log.info({ targetFps: this.options.targetFps }, 'Capture loop started');
  }

  async stop(): Promise<void> {
    const running = this.running;
    if (!running) {
      return;
    }
    this.currentState = 'stopping';
    this.controller?.abort();
    await running;
    this.running = null;
    this.controller = null;
    this.currentState = 'idle';
    this.log.info('Capture loop stopped');
  }

  /** One capture cycle without pacing. */
  async runOnce(): Promise<CaptureOutcome> {
    const { source } = this.options;

    if (!source.isOpen()) {
      this.currentState = 'awaiting-camera';
      try {
        await source.initialize();
      } catch (error) {
        this.log.warn({ err: toError(error) }, 'Camera unavailable, retrying');
        return 'no-camera';
      }
      this.consecutiveFailures = 0;
    }

    this.currentState = 'capturing';
    let raw: RawFrame;
    try {
      raw = await source.captureRaw();
      this.consecutiveFailures = 0;
    } catch (error) {
      await this.handleCaptureFailure(toError(error));
      return 'failed';
    }

    const now = this.now();
    const night = this.options.nightVision.snapshot();
    const result = this.options.enhancer.enhance(
      raw,
      this.options.processing(),
      night,
      this.options.fps.stats().current,
      now
    );

    if (!result.frame) {
      this.metrics.recordFrameRejected();
      this.log.debug({ luminance: result.luminance }, 'Discarded invalid frame');
      return 'rejected';
    }

    this.options.store.publish(result.frame, now);
    this.options.fps.record(now);
    this.options.nightVision.observe(result.lowLight, now);
    await this.options.cache.encodeAndCache(result.frame);
    return 'captured';
  }

  private async run(signal: AbortSignal) {
    while (!signal.aborted) {
      const startedAt = this.now();
      let delay: number;

      try {
        const outcome = await this.runOnce();
        delay = this.delayFor(outcome, this.now() - startedAt);
      } catch (error) {
        this.log.error({ err: toError(error) }, 'Capture cycle failed unexpectedly');
        delay = this.failureDelayMs;
      }

      if (signal.aborted) {
        break;
      }

      try {
        await this.sleep(delay, signal);
      } catch (error) {
        if (!isAbortError(error)) {
          this.log.error({ err: toError(error) }, 'Capture loop pacing failed');
        }
        break;
      }
    }
  }

  private delayFor(outcome: CaptureOutcome, elapsedMs: number): number {
    switch (outcome) {
      case 'no-camera':
        return this.awaitCameraDelayMs;
      case 'failed':
        return this.failureDelayMs;
      default:
        return Math.max(0, this.frameIntervalMs - elapsedMs);
    }
  }

  private async handleCaptureFailure(error: Error) {
    this.consecutiveFailures += 1;
    this.log.warn(
      { err: error, consecutiveFailures: this.consecutiveFailures },
      'Frame capture failed'
    );

    if (this.consecutiveFailures < this.maxConsecutiveFailures) {
      return;
    }

    this.log.error(
      { consecutiveFailures: this.consecutiveFailures },
      'Releasing camera after repeated capture failures'
    );
    this.consecutiveFailures = 0;
    await this.options.source.release();
    this.currentState = 'awaiting-camera';
  }
}
