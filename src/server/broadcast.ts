import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { ClientError, toError } from '../errors.js';
import type { ClientSession, EncodedFrame } from '../types.js';
import { isAbortError, sleep as defaultSleep, type Sleep } from '../utils/time.js';

export const MULTIPART_BOUNDARY = 'frame';
export const MULTIPART_CONTENT_TYPE = `multipart/x-mixed-replace; boundary=${MULTIPART_BOUNDARY}`;

const DEFAULT_IDLE_WAIT_MS = 50;

export interface FrameSink {
  write(chunk: Buffer): Promise<void>;
}

export interface EncodedFrameSource {
  getLatest(): EncodedFrame | null;
}

export interface StreamHubOptions {
  maxClients: number;
  clientFps: { standard: number; reduced: number };
  cache: EncodedFrameSource;
  reduced: () => boolean;
  idleWaitMs?: number;
  sleep?: Sleep;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export function formatMultipartPart(jpeg: Buffer): Buffer {
  const header = Buffer.from(
    `--${MULTIPART_BOUNDARY}\r\nContent-Type: image/jpeg\r\nContent-Length: ${jpeg.length}\r\n\r\n`,
    'ascii'
  );
  return Buffer.concat([header, jpeg, Buffer.from('\r\n', 'ascii')]);
}

/**
 * Admission and per-client pacing for the MJPEG stream. Every client reads
 * the same cached JPEG; a slow client only delays its own loop.
 */
export class StreamHub {
  private readonly sessions = new Map<number, ClientSession>();
  private nextId = 1;
  private readonly idleWaitMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: StreamHubOptions) {
    this.idleWaitMs = options.idleWaitMs ?? DEFAULT_IDLE_WAIT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.log = (options.log ?? logger).child({ component: 'broadcast' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  get activeClients(): number {
    return this.sessions.size;
  }

  get maxClients(): number {
    return this.options.maxClients;
  }

  clientFps(): number {
    return this.options.reduced() ? this.options.clientFps.reduced : this.options.clientFps.standard;
  }

  tryAcquire(): ClientSession | null {
    if (this.sessions.size >= this.options.maxClients) {
      this.metrics.recordClientRejected();
      this.log.warn({ active: this.sessions.size, max: this.options.maxClients }, 'Rejecting stream client');
      return null;
    }

    const now = this.now();
    const session: ClientSession = { id: this.nextId, connectedAt: now, lastSentAt: 0, lastSequence: 0 };
    this.nextId += 1;
    this.sessions.set(session.id, session);
    this.metrics.recordClientConnected(this.sessions.size);
    this.log.info({ clientId: session.id, active: this.sessions.size }, 'Stream client connected');
    return session;
  }

  release(session: ClientSession) {
    if (!this.sessions.delete(session.id)) {
      return;
    }
    this.metrics.recordClientDisconnected(this.sessions.size);
    this.log.info({ clientId: session.id, active: this.sessions.size }, 'Stream client disconnected');
  }

  /**
   * Streams parts to the sink until the signal aborts or a write fails. The
   * session's slot is always released on exit.
   */
  async serve(session: ClientSession, sink: FrameSink, signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        const startedAt = this.now();
        const latest = this.options.cache.getLatest();

        if (!latest || latest.sequence === session.lastSequence) {
          await this.sleep(this.idleWaitMs, signal);
          continue;
        }

        const part = formatMultipartPart(latest.data);
        try {
          await sink.write(part);
        } catch (error) {
          throw new ClientError(session.id, `Failed to write frame: ${toError(error).message}`, { cause: error });
        }

        session.lastSequence = latest.sequence;
        session.lastSentAt = this.now();
        this.metrics.recordFrameSent(part.length);

        const intervalMs = 1000 / Math.max(1, this.clientFps());
        await this.sleep(Math.max(0, intervalMs - (session.lastSentAt - startedAt)), signal);
      }
    } catch (error) {
      if (!isAbortError(error)) {
        this.log.info({ clientId: session.id, err: toError(error) }, 'Stream client loop ended');
      }
    } finally {
      this.release(session);
    }
  }
}
