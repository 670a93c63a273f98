import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import pino from 'pino';
import type { ResetSeverityLevel } from '../pipeline/health.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type CameraResetRecord = {
  reason: string;
  at: number;
  durationMs: number | null;
  ok: boolean;
};

type CameraSnapshot = {
  initAttempts: number;
  initFailures: number;
  resets: number;
  resetFailures: number;
  resetsByReason: CounterMap;
  lastReset: CameraResetRecord | null;
  captureFailures: number;
  captureTimeouts: number;
  severity: ResetSeverityLevel;
};

type FrameSnapshot = {
  captured: number;
  rejected: number;
  enhanced: number;
  fallbacks: number;
  encoded: number;
  encodeFailures: number;
  lastFrameAt: string | null;
};

type ClientSnapshot = {
  active: number;
  connected: number;
  rejected: number;
  disconnected: number;
  framesSent: number;
  bytesSent: number;
};

type ProcessingSnapshot = {
  level: number;
  reduceProcessing: boolean;
  adjustments: CounterMap;
  nightVisionTransitions: number;
};

type LogSnapshot = {
  byLevel: CounterMap;
  byComponent: Record<string, CounterMap>;
  currentLevel: string;
  lastLevelChangeAt: string | null;
  levelChanges: CounterMap;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  camera: CameraSnapshot;
  frames: FrameSnapshot;
  clients: ClientSnapshot;
  processing: ProcessingSnapshot;
  latencies: Record<string, LatencyStats>;
  logs: LogSnapshot;
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByComponent = new Map<string, Map<string, number>>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly resetReasons = new Map<string, number>();
  private readonly adjustmentCounters = new Map<string, number>();
  private cameraInitAttempts = 0;
  private cameraInitFailures = 0;
  private cameraResets = 0;
  private cameraResetFailures = 0;
  private lastReset: CameraResetRecord | null = null;
  private captureFailures = 0;
  private captureTimeouts = 0;
  private resetSeverity: ResetSeverityLevel = 'none';
  private framesCaptured = 0;
  private framesRejected = 0;
  private framesEnhanced = 0;
  private enhancementFallbacks = 0;
  private framesEncoded = 0;
  private encodeFailures = 0;
  private lastFrameAt: number | null = null;
  private activeClients = 0;
  private clientsConnected = 0;
  private clientsRejected = 0;
  private clientsDisconnected = 0;
  private framesSent = 0;
  private bytesSent = 0;
  private processingLevel = 0;
  private reduceProcessing = false;
  private nightVisionTransitions = 0;

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByComponent.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.latencyStats.clear();
    this.resetReasons.clear();
    this.adjustmentCounters.clear();
    this.cameraInitAttempts = 0;
    this.cameraInitFailures = 0;
    this.cameraResets = 0;
    this.cameraResetFailures = 0;
    this.lastReset = null;
    this.captureFailures = 0;
    this.captureTimeouts = 0;
    this.resetSeverity = 'none';
    this.framesCaptured = 0;
    this.framesRejected = 0;
    this.framesEnhanced = 0;
    this.enhancementFallbacks = 0;
    this.framesEncoded = 0;
    this.encodeFailures = 0;
    this.lastFrameAt = null;
    this.activeClients = 0;
    this.clientsConnected = 0;
    this.clientsRejected = 0;
    this.clientsDisconnected = 0;
    this.framesSent = 0;
    this.bytesSent = 0;
    this.processingLevel = 0;
    this.reduceProcessing = false;
    this.nightVisionTransitions = 0;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; component?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.component) {
      const componentMap = this.logLevelByComponent.get(context.component) ?? new Map<string, number>();
      componentMap.set(normalized, (componentMap.get(normalized) ?? 0) + 1);
      this.logLevelByComponent.set(context.component, componentMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.lastLogLevelChangeAt = Date.now();
    this.logLevelChangeCounters.set(normalized, (this.logLevelChangeCounters.get(normalized) ?? 0) + 1);
  }

  recordCameraInit(ok: boolean) {
    this.cameraInitAttempts += 1;
    if (!ok) {
      this.cameraInitFailures += 1;
    }
  }

  recordCameraReset(reason: string, details: { ok: boolean; durationMs?: number; at?: number }) {
    this.cameraResets += 1;
    if (!details.ok) {
      this.cameraResetFailures += 1;
    }
    this.resetReasons.set(reason, (this.resetReasons.get(reason) ?? 0) + 1);
    this.lastReset = {
      reason,
      at: details.at ?? Date.now(),
      durationMs: typeof details.durationMs === 'number' ? details.durationMs : null,
      ok: details.ok
    };
  }

  setResetSeverity(severity: ResetSeverityLevel) {
    this.resetSeverity = severity;
  }

  recordCaptureFailure(kind: 'capture' | 'timeout') {
    if (kind === 'timeout') {
      this.captureTimeouts += 1;
    } else {
      this.captureFailures += 1;
    }
  }

  recordFrameCaptured(at = Date.now()) {
    this.framesCaptured += 1;
    this.lastFrameAt = at;
  }

  recordFrameRejected() {
    this.framesRejected += 1;
  }

  recordFrameEnhanced(fallback: boolean) {
    if (fallback) {
      this.enhancementFallbacks += 1;
    } else {
      this.framesEnhanced += 1;
    }
  }

  recordFrameEncoded() {
    this.framesEncoded += 1;
  }

  recordEncodeFailure() {
    this.encodeFailures += 1;
  }

  recordClientConnected(active: number) {
    this.clientsConnected += 1;
    this.activeClients = active;
  }

  recordClientRejected() {
    this.clientsRejected += 1;
  }

  recordClientDisconnected(active: number) {
    this.clientsDisconnected += 1;
    this.activeClients = active;
  }

  recordFrameSent(bytes: number) {
    this.framesSent += 1;
    this.bytesSent += bytes;
  }

  recordProcessingAdjustment(direction: string, state: { level: number; reduceProcessing: boolean }) {
    this.adjustmentCounters.set(direction, (this.adjustmentCounters.get(direction) ?? 0) + 1);
    this.processingLevel = state.level;
    this.reduceProcessing = state.reduceProcessing;
  }

  setProcessingState(state: { level: number; reduceProcessing: boolean }) {
    this.processingLevel = state.level;
    this.reduceProcessing = state.reduceProcessing;
  }

  recordNightVisionTransition() {
    this.nightVisionTransitions += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => T | Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportLogLevelMetrics(): LogSnapshot {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      byComponent: mapFromNested(this.logLevelByComponent),
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: this.lastLogLevelChangeAt
        ? new Date(this.lastLogLevelChangeAt).toISOString()
        : null,
      levelChanges: mapFrom(this.logLevelChangeCounters),
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage
    };
  }

  snapshot(): MetricsSnapshot {
    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencyStats) {
      latencies[metric] = {
        count: stats.count,
        totalMs: stats.totalMs,
        minMs: stats.count > 0 ? stats.minMs : 0,
        maxMs: stats.maxMs,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    return {
      createdAt: new Date().toISOString(),
      camera: {
        initAttempts: this.cameraInitAttempts,
        initFailures: this.cameraInitFailures,
        resets: this.cameraResets,
        resetFailures: this.cameraResetFailures,
        resetsByReason: mapFrom(this.resetReasons),
        lastReset: this.lastReset ? { ...this.lastReset } : null,
        captureFailures: this.captureFailures,
        captureTimeouts: this.captureTimeouts,
        severity: this.resetSeverity
      },
      frames: {
        captured: this.framesCaptured,
        rejected: this.framesRejected,
        enhanced: this.framesEnhanced,
        fallbacks: this.enhancementFallbacks,
        encoded: this.framesEncoded,
        encodeFailures: this.encodeFailures,
        lastFrameAt: this.lastFrameAt ? new Date(this.lastFrameAt).toISOString() : null
      },
      clients: {
        active: this.activeClients,
        connected: this.clientsConnected,
        rejected: this.clientsRejected,
        disconnected: this.clientsDisconnected,
        framesSent: this.framesSent,
        bytesSent: this.bytesSent
      },
      processing: {
        level: this.processingLevel,
        reduceProcessing: this.reduceProcessing,
        adjustments: mapFrom(this.adjustmentCounters),
        nightVisionTransitions: this.nightVisionTransitions
      },
      latencies,
      logs: this.exportLogLevelMetrics()
    };
  }
}

function mapFrom(map: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const [key, value] of map) {
    result[key] = value;
  }
  return result;
}

function mapFromNested(map: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  for (const [key, nested] of map) {
    result[key] = mapFrom(nested);
  }
  return result;
}

function mapLogLevelCounters(map: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const level of PINO_LEVEL_ORDER) {
    result[level] = map.get(level) ?? 0;
  }
  for (const [level, value] of map) {
    if (!(level in result) && pino.levels.values[level] !== undefined) {
      result[level] = value;
    }
  }
  return result;
}

const defaultRegistry = new MetricsRegistry();

export type { MetricsSnapshot, LatencyStats, CameraSnapshot, FrameSnapshot, ClientSnapshot };
export { MetricsRegistry };
export default defaultRegistry;
