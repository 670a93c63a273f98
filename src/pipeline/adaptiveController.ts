import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { AdaptiveNightConfig, AdaptiveStandardConfig } from '../config/index.js';
import type { FpsStats, ProcessingConfig, ProcessingLevel } from '../types.js';

export type AdjustmentDirection = 'down' | 'up' | 'reduce-on' | 'reduce-off';

export interface Adjustment {
  direction: AdjustmentDirection;
  fps: number;
  night: boolean;
  previous: ProcessingConfig;
  next: ProcessingConfig;
}

export interface FpsSource {
  readonly sampleCount: number;
  stats(): FpsStats;
}

export interface AdaptiveControllerOptions {
  fps: FpsSource;
  nightActive: () => boolean;
  intervalMs: number;
  standard: AdaptiveStandardConfig;
  night: AdaptiveNightConfig;
  initialLevel?: number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export function toProcessingLevel(value: number): ProcessingLevel {
  if (value <= 0) {
    return 0;
  }
  if (value >= 2) {
    return 2;
  }
  return 1;
}

/**
 * Trades image processing for frame rate. Each cycle moves the processing
 * level by at most one step; clearing `reduceProcessing` takes a cycle of its
 * own before the level is raised again.
 */
export class AdaptiveController {
  private config: ProcessingConfig;
  private timer: NodeJS.Timeout | null = null;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: AdaptiveControllerOptions) {
    this.config = {
      processingLevel: toProcessingLevel(options.initialLevel ?? 1),
      reduceProcessing: false
    };
    this.log = (options.log ?? logger).child({ component: 'adaptive' });
    this.metrics = options.metrics ?? defaultMetrics;
    this.metrics.setProcessingState({ level: this.config.processingLevel, reduceProcessing: false });
  }

  processing(): ProcessingConfig {
    return { ...this.config };
  }

  start() {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.evaluate();
    }, this.options.intervalMs);
    this.timer.unref?.();
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  evaluate(): Adjustment | null {
    if (this.options.fps.sampleCount < 2) {
      return null;
    }

    const fps = this.options.fps.stats().current;
    const night = this.options.nightActive();
    const previous = this.processing();
    const next = night ? this.nightStep(fps, previous) : this.standardStep(fps, previous);

    if (
      next.processingLevel === previous.processingLevel &&
      next.reduceProcessing === previous.reduceProcessing
    ) {
      return null;
    }

    const direction: AdjustmentDirection =
      next.processingLevel < previous.processingLevel
        ? 'down'
        : next.processingLevel > previous.processingLevel
          ? 'up'
          : next.reduceProcessing
            ? 'reduce-on'
            : 'reduce-off';

    this.config = next;
    this.metrics.recordProcessingAdjustment(direction, {
      level: next.processingLevel,
      reduceProcessing: next.reduceProcessing
    });
    this.log.info(
      {
        fps: Number(fps.toFixed(1)),
        night,
        level: next.processingLevel,
        reduceProcessing: next.reduceProcessing,
        direction
      },
      'Processing level adjusted'
    );

    return { direction, fps, night, previous, next };
  }

  private nightStep(fps: number, current: ProcessingConfig): ProcessingConfig {
    const { criticalFps, floorFps, recoverFps } = this.options.night;
    const level = current.processingLevel;

    if (fps < criticalFps) {
      return { processingLevel: toProcessingLevel(level - 1), reduceProcessing: true };
    }
    if (fps < floorFps) {
      return { processingLevel: toProcessingLevel(level - 1), reduceProcessing: current.reduceProcessing };
    }
    if (fps > recoverFps) {
      return raise(current);
    }
    return current;
  }

  private standardStep(fps: number, current: ProcessingConfig): ProcessingConfig {
    const { minFps, maxFps, reduceRatio } = this.options.standard;

    if (fps < minFps) {
      return {
        processingLevel: toProcessingLevel(current.processingLevel - 1),
        reduceProcessing: current.reduceProcessing || fps < minFps * reduceRatio
      };
    }
    if (fps > maxFps) {
      return raise(current);
    }
    return current;
  }
}

function raise(current: ProcessingConfig): ProcessingConfig {
  if (current.reduceProcessing) {
    return { processingLevel: current.processingLevel, reduceProcessing: false };
  }
  return { processingLevel: toProcessingLevel(current.processingLevel + 1), reduceProcessing: false };
}
