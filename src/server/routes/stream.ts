import { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../../logger.js';
import { ValidationError, toError } from '../../errors.js';
import type { StreamContext } from '../../pipeline/context.js';
import type { HealthCheckProvider, HealthCheckResult } from '../../types.js';
import type { NightVisionSnapshot } from '../../video/nightVision.js';
import { MULTIPART_CONTENT_TYPE, type FrameSink } from '../broadcast.js';

const MAX_BODY_BYTES = 64 * 1024;
const MANUAL_RESET_REASON = 'manual';

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

type JsonObject = Record<string, unknown>;

export interface StreamRouterOptions {
  context: StreamContext;
  /** Registered service health checks, reported under `checks` in `/status`. */
  healthChecks?: HealthCheckProvider;
}

function round(value: number, digits = 1) {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function formatNightVision(state: NightVisionSnapshot, luminance: number | null) {
  return {
    enabled: state.enabled,
    auto_mode: state.autoMode,
    active: state.active,
    manual_active: state.manualActive,
    green_mode: state.greenMode,
    strength: state.strength,
    light_threshold: state.lightThreshold,
    mode: state.mode,
    last_change_time: state.lastChangeTime,
    luminance: luminance === null ? null : round(luminance)
  };
}

export class StreamRouter {
  private readonly context: StreamContext;
  private readonly healthChecks: HealthCheckProvider;
  private readonly handlers: Handler[];
  private readonly streams = new Set<AbortController>();
  private readonly log = logger.child({ component: 'http' });

  constructor(options: StreamRouterOptions) {
    this.context = options.context;
    this.healthChecks = options.healthChecks ?? (async () => []);
    this.handlers = [
      (req, res, url) => this.handleVideoFeed(req, res, url),
      (req, res, url) => this.handleStatus(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url),
      (req, res, url) => this.handleReset(req, res, url),
      (req, res, url) => this.handleNightVision(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  /** Ends every open stream. */
  close() {
    for (const controller of this.streams) {
      controller.abort();
    }
    this.streams.clear();
  }

  status(checks: HealthCheckResult[] = []) {
    const { hub, fps, frameSource, adaptive, captureLoop, nightVision, enhancer, health } = this.context;
    const stats = fps.stats();
    const processing = adaptive.processing();
    const healthStatus = health.status();

    return {
      active_clients: hub.activeClients,
      max_clients: hub.maxClients,
      fps: {
        current: round(stats.current),
        min: round(stats.min),
        max: round(stats.max),
        avg: round(stats.avg)
      },
      uptime: round((this.context.now() - this.context.startedAt) / 1000),
      camera_status: frameSource.status(),
      reduce_processing: processing.reduceProcessing,
      processing_level: processing.processingLevel,
      capture_state: captureLoop.state(),
      client_fps: hub.clientFps(),
      night_vision: formatNightVision(nightVision.snapshot(), enhancer.smoothedLuminance),
      health: {
        severity: healthStatus.severity,
        reason: healthStatus.reason,
        consecutive_resets: healthStatus.consecutiveResets,
        stale_ms: healthStatus.staleMs,
        last_reset_at: healthStatus.lastResetAt
      },
      checks
    };
  }

  private handleVideoFeed(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/video_feed') {
      return false;
    }

    const session = this.context.hub.tryAcquire();
    if (!session) {
      sendJson(res, 503, { error: 'Too many clients' });
      return true;
    }

    res.writeHead(200, {
      'Content-Type': MULTIPART_CONTENT_TYPE,
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      Pragma: 'no-cache',
      Connection: 'close'
    });

    const controller = new AbortController();
    this.streams.add(controller);
    const abort = () => controller.abort();
    res.on('close', abort);

    const sink: FrameSink = {
      write: chunk =>
        new Promise<void>((resolve, reject) => {
          if (res.destroyed || res.writableEnded) {
            reject(new Error('Response already closed'));
            return;
          }
          res.write(chunk, error => {
            if (error) {
              reject(error);
            } else {
              resolve();
            }
          });
        })
    };

    this.context.hub
      .serve(session, sink, controller.signal)
      .catch(error => {
        this.log.error({ err: toError(error), clientId: session.id }, 'Stream client failed');
      })
      .finally(() => {
        this.streams.delete(controller);
        res.off('close', abort);
        if (!res.writableEnded) {
          res.end();
        }
      });

    return true;
  }

  private handleStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/status') {
      return false;
    }
    this.healthChecks()
      .then(checks => {
        sendJson(res, 200, this.status(checks));
      })
      .catch(error => {
        this.fail(res, error);
      });
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/metrics') {
      return false;
    }
    sendJson(res, 200, this.context.metrics.snapshot());
    return true;
  }

  private handleReset(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/reset_camera') {
      return false;
    }

    this.context.frameSource
      .reset(MANUAL_RESET_REASON)
      .then(() => {
        sendJson(res, 200, { status: 'ok', camera_status: this.context.frameSource.status() });
      })
      .catch(error => {
        const failure = toError(error);
        this.log.error({ err: failure }, 'Manual camera reset failed');
        sendJson(res, 500, { error: failure.message });
      });
    return true;
  }

  private handleNightVision(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST') {
      return false;
    }

    const { nightVision } = this.context;
    switch (url.pathname) {
      case '/toggle_night_vision':
        this.respondWith(res, () => nightVision.toggleEnabled());
        return true;
      case '/toggle_night_vision_mode':
        this.respondWith(res, () => nightVision.toggleAutoMode());
        return true;
      case '/toggle_green_night_vision':
        this.respondWith(res, () => nightVision.toggleGreenMode());
        return true;
      case '/set_night_vision_manual':
        this.withBody(req, res, body => nightVision.setManualActive(readBoolean(body, 'active')));
        return true;
      case '/set_night_vision_strength':
        this.withBody(req, res, body => nightVision.setStrength(readNumber(body, 'strength')));
        return true;
      case '/set_light_threshold':
        this.withBody(req, res, body => nightVision.setLightThreshold(readNumber(body, 'threshold')));
        return true;
      default:
        return false;
    }
  }

  private withBody(req: IncomingMessage, res: ServerResponse, apply: (body: JsonObject) => NightVisionSnapshot) {
    readJsonBody(req)
      .then(body => {
        this.respondWith(res, () => apply(body));
      })
      .catch(error => {
        this.fail(res, error);
      });
  }

  private respondWith(res: ServerResponse, apply: () => NightVisionSnapshot) {
    try {
      const state = apply();
      sendJson(res, 200, formatNightVision(state, this.context.enhancer.smoothedLuminance));
    } catch (error) {
      this.fail(res, error);
    }
  }

  private fail(res: ServerResponse, error: unknown) {
    if (error instanceof ValidationError) {
      sendJson(res, 400, { error: error.message, field: error.field });
      return;
    }
    const failure = toError(error);
    this.log.error({ err: failure }, 'Request failed');
    sendJson(res, 500, { error: 'Internal server error' });
  }
}

export function createStreamRouter(options: StreamRouterOptions) {
  return new StreamRouter(options);
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(body: JsonObject, field: string): number {
  const value = body[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(field, `${field} must be a number`);
  }
  return value;
}

function readBoolean(body: JsonObject, field: string): boolean {
  const value = body[field];
  if (typeof value !== 'boolean') {
    throw new ValidationError(field, `${field} must be a boolean`);
  }
  return value;
}

function readJsonBody(req: IncomingMessage): Promise<JsonObject> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        reject(new ValidationError('body', `Request body exceeds ${MAX_BODY_BYTES} bytes`));
        req.destroy();
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8').trim();
      if (!raw) {
        resolve({});
        return;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        reject(new ValidationError('body', 'Request body must be valid JSON'));
        return;
      }

      if (!isJsonObject(parsed)) {
        reject(new ValidationError('body', 'Request body must be a JSON object'));
        return;
      }
      resolve(parsed);
    });

    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, payload: unknown) {
  if (res.writableEnded) {
    return;
  }
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}
