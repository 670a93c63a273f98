import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { RelayConfig } from '../config/index.js';
import type { CameraDriver } from '../camera/driver.js';
import { FfmpegCameraDriver } from '../camera/ffmpegDriver.js';
import { FrameSource } from '../camera/frameSource.js';
import { StreamHub } from '../server/broadcast.js';
import type { Sleep } from '../utils/time.js';
import { Enhancer } from '../video/enhancer.js';
import { NightVisionController } from '../video/nightVision.js';
import type { BitmapFont } from '../video/overlay.js';
import { AdaptiveController } from './adaptiveController.js';
import { CaptureLoop } from './captureLoop.js';
import { EncodeCache, type JpegEncoder } from './encodeCache.js';
import { FpsTracker } from './fpsTracker.js';
import { LatestFrameStore } from './frameStore.js';
import { HealthMonitor } from './healthMonitor.js';

export interface StreamContextOverrides {
  driver?: CameraDriver;
  encoder?: JpegEncoder;
  loadFont?: () => BitmapFont;
  sleep?: Sleep;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export interface StreamContext {
  config: RelayConfig;
  startedAt: number;
  now: () => number;
  frameSource: FrameSource;
  enhancer: Enhancer;
  store: LatestFrameStore;
  cache: EncodeCache;
  fps: FpsTracker;
  nightVision: NightVisionController;
  adaptive: AdaptiveController;
  captureLoop: CaptureLoop;
  health: HealthMonitor;
  hub: StreamHub;
  metrics: MetricsRegistry;
}

/** Wires the pipeline components around one shared set of state. */
export function createStreamContext(config: RelayConfig, overrides: StreamContextOverrides = {}): StreamContext {
  const now = overrides.now ?? Date.now;
  const log = overrides.log ?? logger;
  const metrics = overrides.metrics ?? defaultMetrics;
  const { camera } = config;

  const frameSource = new FrameSource({
    driver: overrides.driver ?? new FfmpegCameraDriver({ forceKillTimeoutMs: camera.forceKillTimeoutMs, log }),
    driverConfig: {
      device: camera.device,
      inputFormat: camera.inputFormat,
      width: camera.width,
      height: camera.height,
      framesPerSecond: camera.framesPerSecond,
      controls: camera.controls
    },
    initAttempts: camera.initAttempts,
    retryDelayMs: camera.retryDelayMs,
    warmupFrames: camera.warmupFrames,
    resetCooldownMs: camera.resetCooldownMs,
    captureTimeoutMs: camera.captureTimeoutMs,
    sleep: overrides.sleep,
    now,
    log,
    metrics
  });

  const store = new LatestFrameStore(now);
  const fps = new FpsTracker();
  const enhancer = new Enhancer({ loadFont: overrides.loadFont, log, metrics });
  const cache = new EncodeCache({
    quality: config.encoding.quality,
    ringSize: config.encoding.ringSize,
    encoder: overrides.encoder,
    now,
    log,
    metrics
  });

  const nightVision = new NightVisionController({
    enabled: config.nightVision.enabled,
    autoMode: config.nightVision.autoMode,
    strength: config.nightVision.strength,
    lightThreshold: config.nightVision.lightThreshold,
    greenMode: config.nightVision.greenMode ?? false,
    debounceMs: config.nightVision.debounceMs,
    now,
    log,
    metrics
  });

  const adaptive = new AdaptiveController({
    fps,
    nightActive: () => nightVision.active,
    intervalMs: config.adaptive.intervalMs,
    standard: config.adaptive.standard,
    night: config.adaptive.night,
    initialLevel: config.adaptive.initialLevel,
    log,
    metrics
  });

  const captureLoop = new CaptureLoop({
    source: frameSource,
    enhancer,
    store,
    cache,
    fps,
    nightVision,
    processing: () => adaptive.processing(),
    targetFps: config.capture.targetFps,
    awaitCameraDelayMs: config.capture.awaitCameraDelayMs,
    failureDelayMs: config.capture.failureDelayMs,
    maxConsecutiveFailures: config.capture.maxConsecutiveFailures,
    sleep: overrides.sleep,
    now,
    log,
    metrics
  });

  const hub = new StreamHub({
    maxClients: config.stream.maxClients,
    clientFps: config.stream.clientFps,
    idleWaitMs: config.stream.idleWaitMs,
    cache,
    reduced: () => adaptive.processing().reduceProcessing || nightVision.active,
    sleep: overrides.sleep,
    now,
    log,
    metrics
  });

  const health = new HealthMonitor({
    source: frameSource,
    lastFrameAt: () => store.lastFrameAt(),
    activeClients: () => hub.activeClients,
    fps: () => fps.stats(),
    // rates from before the stall would otherwise keep steering the adaptive controller
    onStale: () => fps.reset(),
    intervalMs: config.health.intervalMs,
    frameTimeoutMs: config.health.frameTimeoutMs,
    now,
    log,
    metrics
  });

  return {
    config,
    startedAt: now(),
    now,
    frameSource,
    enhancer,
    store,
    cache,
    fps,
    nightVision,
    adaptive,
    captureLoop,
    health,
    hub,
    metrics
  };
}
