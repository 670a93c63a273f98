import sharp from 'sharp';
import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { EncodeError, toError } from '../errors.js';
import type { DisplayFrame, EncodedFrame } from '../types.js';

const DEFAULT_QUALITY = 80;
const DEFAULT_RING_SIZE = 3;
const EMPTY = Buffer.alloc(0);

export type JpegEncoder = (frame: DisplayFrame, quality: number) => Promise<Buffer>;

export const sharpJpegEncoder: JpegEncoder = (frame, quality) =>
  sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: frame.channels }
  })
    .jpeg({ quality })
    .toBuffer();

export interface EncodeCacheOptions {
  quality?: number;
  ringSize?: number;
  encoder?: JpegEncoder;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export class EncodeCache {
  private latest: EncodedFrame | null = null;
  private readonly ring: EncodedFrame[] = [];
  private sequence = 0;
  private readonly quality: number;
  private readonly ringSize: number;
  private readonly encoder: JpegEncoder;
  private readonly now: () => number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: EncodeCacheOptions = {}) {
    this.quality = options.quality ?? DEFAULT_QUALITY;
    this.ringSize = Math.max(1, options.ringSize ?? DEFAULT_RING_SIZE);
    this.encoder = options.encoder ?? sharpJpegEncoder;
    this.now = options.now ?? Date.now;
    this.log = (options.log ?? logger).child({ component: 'encoder' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Encodes the frame once and swaps it in as the shared bytes. On failure the
   * previous bytes stay in place and null is returned.
   */
  async encodeAndCache(frame: DisplayFrame): Promise<EncodedFrame | null> {
    let data: Buffer;
    try {
      data = await this.metrics.time('encode', () => this.encoder(frame, this.quality));
    } catch (error) {
      const failure = new EncodeError(`JPEG encoding failed: ${toError(error).message}`, { cause: error });
      this.metrics.recordEncodeFailure();
      this.log.warn({ err: failure }, 'Skipping frame that failed to encode');
      return null;
    }

    this.sequence += 1;
    const encoded: EncodedFrame = { data, publishedAt: this.now(), sequence: this.sequence };
    this.latest = encoded;
    this.ring.push(encoded);
    if (this.ring.length > this.ringSize) {
      this.ring.shift();
    }
    this.metrics.recordFrameEncoded();
    return encoded;
  }

  /** Latest JPEG bytes, or an empty buffer before the first encode. */
  getCached(): Buffer {
    return this.latest?.data ?? EMPTY;
  }

  getLatest(): EncodedFrame | null {
    return this.latest;
  }

  recent(): EncodedFrame[] {
    return [...this.ring];
  }
}
