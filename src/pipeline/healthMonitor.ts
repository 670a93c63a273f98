import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { toError } from '../errors.js';
import type { FpsStats } from '../types.js';
import {
  DEFAULT_RESET_SEVERITY_THRESHOLDS,
  evaluateResetSeverity,
  formatResetSeverityReason,
  type ResetSeverityLevel,
  type ResetSeverityThresholds
} from './health.js';

export interface ResettableSource {
  readonly isResetting: boolean;
  reset(reason: string): Promise<void>;
}

export interface HealthMonitorOptions {
  source: ResettableSource;
  lastFrameAt: () => number | null;
  activeClients: () => number;
  fps: () => FpsStats;
  /** Called on every check that finds the stream stale, before any reset. */
  onStale?: (staleMs: number) => void;
  intervalMs: number;
  frameTimeoutMs: number;
  thresholds?: ResetSeverityThresholds;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export type HealthCheckResult = {
  staleMs: number;
  stale: boolean;
  resetTriggered: boolean;
  severity: ResetSeverityLevel;
};

export type HealthStatus = {
  lastCheckAt: number | null;
  lastResetAt: number | null;
  consecutiveResets: number;
  staleMs: number;
  severity: ResetSeverityLevel;
  reason: string | null;
};

export const STALE_FRAME_REASON = 'stale-frame';

export class HealthMonitor {
  private timer: NodeJS.Timeout | null = null;
  private startedAt: number;
  private lastCheckAt: number | null = null;
  private lastResetAt: number | null = null;
  private consecutiveResets = 0;
  private severity: ResetSeverityLevel = 'none';
  private severityReason: string | null = null;
  private readonly thresholds: ResetSeverityThresholds;
  private readonly now: () => number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: HealthMonitorOptions) {
    this.thresholds = options.thresholds ?? DEFAULT_RESET_SEVERITY_THRESHOLDS;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.log = (options.log ?? logger).child({ component: 'health' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  start() {
    if (this.timer) {
      return;
    }
    this.startedAt = this.now();
    this.timer = setInterval(() => {
      this.check().catch(error => {
        this.log.error({ err: toError(error) }, 'Health check failed');
      });
    }, this.options.intervalMs);
    this.timer.unref?.();
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  status(): HealthStatus {
    return {
      lastCheckAt: this.lastCheckAt,
      lastResetAt: this.lastResetAt,
      consecutiveResets: this.consecutiveResets,
      staleMs: this.staleMs(this.now()),
      severity: this.severity,
      reason: this.severityReason
    };
  }

  async check(): Promise<HealthCheckResult> {
    const now = this.now();
    this.lastCheckAt = now;
    const staleMs = this.staleMs(now);
    const stale = staleMs > this.options.frameTimeoutMs;
    if (stale) {
      this.options.onStale?.(staleMs);
    }

    this.log.info(
      {
        clients: this.options.activeClients(),
        fps: Number(this.options.fps().current.toFixed(1)),
        staleMs
      },
      'Stream health'
    );

    if (!stale) {
      this.consecutiveResets = 0;
      this.updateSeverity(staleMs);
      return { staleMs, stale, resetTriggered: false, severity: this.severity };
    }

    if (this.options.source.isResetting) {
      this.log.debug({ staleMs }, 'Camera reset already in progress');
      return { staleMs, stale, resetTriggered: false, severity: this.severity };
    }

    this.consecutiveResets += 1;
    this.updateSeverity(staleMs);
    this.log.warn(
      { staleMs, frameTimeoutMs: this.options.frameTimeoutMs, consecutiveResets: this.consecutiveResets },
      'No frames received, resetting camera'
    );

    try {
      await this.options.source.reset(STALE_FRAME_REASON);
    } catch (error) {
      this.log.error({ err: toError(error) }, 'Camera reset after stale frames failed');
    } finally {
      this.lastResetAt = this.now();
    }

    return { staleMs, stale, resetTriggered: true, severity: this.severity };
  }

  private staleMs(now: number) {
    const lastFrame = this.options.lastFrameAt() ?? this.startedAt;
    const reference = Math.max(lastFrame, this.lastResetAt ?? 0);
    return Math.max(0, now - reference);
  }

  private updateSeverity(staleMs: number) {
    const evaluation = evaluateResetSeverity(
      { consecutiveResets: this.consecutiveResets, staleMs },
      this.thresholds
    );
    const reason = formatResetSeverityReason(evaluation);

    if (evaluation.severity !== this.severity) {
      const context = { severity: evaluation.severity, previous: this.severity, reason };
      if (evaluation.severity === 'none') {
        this.log.info(context, 'Camera health recovered');
      } else {
        this.log.warn(context, 'Camera health degraded');
      }
    }

    this.severity = evaluation.severity;
    this.severityReason = reason;
    this.metrics.setResetSeverity(evaluation.severity);
  }
}
