import { EventEmitter } from 'node:events';
import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { CameraError, toError } from '../errors.js';
import type { CameraStatus, RawFrame } from '../types.js';
import { AsyncLock } from '../utils/lock.js';
import { sleep as defaultSleep, type Sleep } from '../utils/time.js';
import type { CameraDriver, CameraDriverConfig, CameraHandle } from './driver.js';

const DEFAULT_INIT_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 2000;
const DEFAULT_WARMUP_FRAMES = 5;
const DEFAULT_RESET_COOLDOWN_MS = 2000;
const DEFAULT_CAPTURE_TIMEOUT_MS = 1000;

export interface FrameSourceOptions {
  driver: CameraDriver;
  driverConfig: CameraDriverConfig;
  initAttempts?: number;
  retryDelayMs?: number;
  warmupFrames?: number;
  resetCooldownMs?: number;
  captureTimeoutMs?: number;
  sleep?: Sleep;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

/**
 * Owns the single camera handle. Every operation that touches the handle
 * (open, capture, reset, release, stop) runs under one async lock, so a reset
 * can never interleave with a capture and at most one handle is ever live.
 * A released handle is never followed by a new open before `resetCooldownMs`
 * has passed, whichever path asks for the reopen.
 *
 * Events: `open` after a handle is ready, `reset` (reason) when a reset
 * begins, `error` (CameraError) when initialization gives up.
 */
export class FrameSource extends EventEmitter {
  private readonly lock = new AsyncLock();
  private readonly driver: CameraDriver;
  private readonly driverConfig: CameraDriverConfig;
  private readonly initAttempts: number;
  private readonly retryDelayMs: number;
  private readonly warmupFrames: number;
  private readonly resetCooldownMs: number;
  private readonly captureTimeoutMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;
  private handle: CameraHandle | null = null;
  private currentStatus: CameraStatus = 'stopped';
  private pendingReset: Promise<void> | null = null;
  private stopped = false;
  private openedCount = 0;
  private releasedAt: number | null = null;

  constructor(options: FrameSourceOptions) {
    super();
    this.driver = options.driver;
    this.driverConfig = options.driverConfig;
    this.initAttempts = Math.max(1, options.initAttempts ?? DEFAULT_INIT_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.warmupFrames = Math.max(0, options.warmupFrames ?? DEFAULT_WARMUP_FRAMES);
    this.resetCooldownMs = options.resetCooldownMs ?? DEFAULT_RESET_COOLDOWN_MS;
    this.captureTimeoutMs = options.captureTimeoutMs ?? DEFAULT_CAPTURE_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.log = (options.log ?? logger).child({ component: 'camera' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  status(): CameraStatus {
    return this.currentStatus;
  }

  isOpen(): boolean {
    return this.handle !== null;
  }

  get isResetting(): boolean {
    return this.pendingReset !== null;
  }

  /** Number of handles opened over the lifetime of this source. */
  get opened(): number {
    return this.openedCount;
  }

  async initialize(): Promise<void> {
    await this.lock.run(() => this.openLocked());
  }

  async captureRaw(): Promise<RawFrame> {
    return this.lock.run(async () => {
      const handle = this.handle;
      if (!handle) {
        this.metrics.recordCaptureFailure('capture');
        throw new CameraError('capture', 'Camera is not open');
      }

      try {
        const frame = await handle.capture(this.captureTimeoutMs);
        this.metrics.recordFrameCaptured(frame.capturedAt);
        return frame;
      } catch (error) {
        const cameraError =
          error instanceof CameraError
            ? error
            : new CameraError('capture', `Capture failed: ${toError(error).message}`, { cause: error });
        this.metrics.recordCaptureFailure(cameraError.kind === 'timeout' ? 'timeout' : 'capture');
        throw cameraError;
      }
    });
  }

  /**
   * Stops the current handle and opens a new one once the cooldown is over.
   * Calls made while a reset is pending join it instead of queueing another.
   */
  reset(reason: string): Promise<void> {
    if (this.pendingReset) {
      return this.pendingReset;
    }

    const pending = this.lock
      .run(() => this.resetLocked(reason))
      .finally(() => {
        this.pendingReset = null;
      });
    this.pendingReset = pending;
    return pending;
  }

  async release(): Promise<void> {
    await this.lock.run(async () => {
      await this.releaseLocked();
      if (!this.stopped) {
        this.currentStatus = 'stopped';
      }
    });
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await this.lock.run(async () => {
      await this.releaseLocked();
      this.currentStatus = 'stopped';
    });
  }

  private async resetLocked(reason: string) {
    if (this.stopped) {
      throw new CameraError('init', 'Frame source is stopped');
    }

    const startedAt = this.now();
    this.currentStatus = 'resetting';
    this.emit('reset', reason);
    this.log.warn({ reason }, 'Resetting camera');

    await this.releaseLocked();

    try {
      await this.openLocked();
    } catch (error) {
      this.metrics.recordCameraReset(reason, { ok: false, durationMs: this.now() - startedAt });
      throw error;
    }

    const durationMs = this.now() - startedAt;
    this.metrics.recordCameraReset(reason, { ok: true, durationMs });
    this.log.info({ reason, durationMs }, 'Camera reset completed');
  }

  private async openLocked() {
    if (this.handle) {
      return;
    }
    if (this.stopped) {
      throw new CameraError('init', 'Frame source is stopped');
    }

    this.currentStatus = 'initializing';
    await this.waitForCooldown();
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.initAttempts; attempt += 1) {
      try {
        const handle = await this.driver.open(this.driverConfig);
        try {
          await this.warmUp(handle);
        } catch (error) {
          await this.stopHandle(handle);
          throw error;
        }

        this.handle = handle;
        this.openedCount += 1;
        this.currentStatus = 'running';
        this.metrics.recordCameraInit(true);
        this.log.info(
          { device: this.driverConfig.device, attempt, warmupFrames: this.warmupFrames },
          'Camera ready'
        );
        this.emit('open');
        return;
      } catch (error) {
        lastError = toError(error);
        this.metrics.recordCameraInit(false);
        this.log.warn(
          { err: lastError, attempt, attempts: this.initAttempts },
          'Camera initialization attempt failed'
        );
        if (attempt < this.initAttempts) {
          await this.sleep(this.retryDelayMs);
        }
      }
    }

    this.currentStatus = 'failed';
    const failure = new CameraError(
      'init',
      `Camera failed to initialize after ${this.initAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      { cause: lastError }
    );
    if (this.listenerCount('error') > 0) {
      this.emit('error', failure);
    }
    throw failure;
  }

  private async waitForCooldown() {
    const releasedAt = this.releasedAt;
    if (releasedAt === null) {
      return;
    }
    const remaining = this.resetCooldownMs - (this.now() - releasedAt);
    if (remaining > 0) {
      await this.sleep(remaining);
    }
    this.releasedAt = null;
  }

  private async warmUp(handle: CameraHandle) {
    for (let index = 0; index < this.warmupFrames; index += 1) {
      await handle.capture(this.captureTimeoutMs);
    }
  }

  private async releaseLocked() {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;
    await this.stopHandle(handle);
    this.releasedAt = this.now();
  }

  private async stopHandle(handle: CameraHandle) {
    try {
      await handle.stop();
    } catch (error) {
      this.log.warn({ err: toError(error) }, 'Camera handle did not stop cleanly');
    }
  }
}
