import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import { PNG } from 'pngjs';
import logger from '../logger.js';
import { CameraError, toError } from '../errors.js';
import type { RawFrame } from '../types.js';
import type { CameraDriver, CameraDriverConfig, CameraHandle } from './driver.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const DEFAULT_MAX_BUFFER_BYTES = 16 * 1024 * 1024;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_EXIT_TIMEOUT_MS = 2000;

export type FfmpegCommandFactory = (config: CameraDriverConfig) => ffmpeg.FfmpegCommand;

export type FfmpegCameraDriverOptions = {
  commandFactory?: FfmpegCommandFactory;
  maxBufferBytes?: number;
  forceKillTimeoutMs?: number;
  exitTimeoutMs?: number;
  now?: () => number;
  log?: typeof logger;
};

type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

export class FfmpegCameraDriver implements CameraDriver {
  constructor(private readonly options: FfmpegCameraDriverOptions = {}) {}

  async open(config: CameraDriverConfig): Promise<CameraHandle> {
    const factory = this.options.commandFactory ?? createFfmpegCommand;
    let command: ffmpeg.FfmpegCommand;
    try {
      command = factory(config);
    } catch (error) {
      throw new CameraError('init', `Failed to create ffmpeg command: ${toError(error).message}`, {
        cause: error
      });
    }

    const handle = new FfmpegCameraHandle(command, this.options);
    handle.start();
    return handle;
  }
}

export class FfmpegCameraHandle extends EventEmitter implements CameraHandle {
  private stream: Readable | null = null;
  private streamCleanup: (() => void) | null = null;
  private commandCleanup: (() => void) | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private latest: Buffer | null = null;
  private failure: CameraError | null = null;
  private lastStderr: string | null = null;
  private stopped = false;
  private exited = false;
  private exitPromise: Promise<void>;
  private resolveExit: () => void = () => {};
  private killTimer: NodeJS.Timeout | null = null;
  private exitTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;
  private readonly log: typeof logger;

  constructor(
    private readonly command: ffmpeg.FfmpegCommand,
    private readonly options: FfmpegCameraDriverOptions = {}
  ) {
    super();
    this.now = options.now ?? Date.now;
    this.log = (options.log ?? logger).child({ component: 'ffmpeg' });
    this.exitPromise = new Promise<void>(resolve => {
      this.resolveExit = resolve;
    });
  }

  /**
   * The command keeps its `error` and `end` listeners for as long as it lives:
   * fluent-ffmpeg reports the exit of a killed process after `stop()` returns.
   */
  start() {
    const onError = (err: Error) => {
      this.markExited();
      if (this.stopped) {
        this.log.debug({ err }, 'ffmpeg exited after stop');
        return;
      }
      const detail = this.lastStderr ? ` (${this.lastStderr})` : '';
      this.fail(new CameraError('capture', `ffmpeg failed: ${err.message}${detail}`, { cause: err }));
    };

    const onEnd = () => {
      this.markExited();
      if (this.stopped) {
        this.log.debug('ffmpeg ended after stop');
        return;
      }
      this.fail(new CameraError('capture', 'ffmpeg ended unexpectedly'));
    };

    const onStderr = (line: string) => {
      const trimmed = line.trim();
      if (trimmed) {
        this.lastStderr = trimmed;
      }
    };

    this.command.on('error', onError);
    this.command.on('end', onEnd);
    this.command.on('stderr', onStderr);
    this.commandCleanup = () => {
      this.command.off('stderr', onStderr);
    };

    let output: ReturnType<ffmpeg.FfmpegCommand['pipe']>;
    try {
      output = this.command.pipe();
    } catch (error) {
      this.markExited();
      throw new CameraError('init', `Failed to start ffmpeg: ${toError(error).message}`, { cause: error });
    }

    if (!(output instanceof Readable)) {
      this.markExited();
      throw new CameraError('init', 'ffmpeg did not expose a readable output stream');
    }

    this.consume(output);
  }

  capture(timeoutMs: number): Promise<RawFrame> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.stopped) {
      return Promise.reject(new CameraError('capture', 'Camera handle is stopped'));
    }

    const pending = this.takeLatest();
    if (pending) {
      return Promise.resolve().then(() => this.decode(pending));
    }

    return new Promise<RawFrame>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        this.off('png', onFrame);
        this.off('failure', onFailure);
      };

      const onFrame = () => {
        const png = this.takeLatest();
        if (!png) {
          return;
        }
        cleanup();
        try {
          resolve(this.decode(png));
        } catch (error) {
          reject(error);
        }
      };

      const onFailure = (error: CameraError) => {
        cleanup();
        reject(error);
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(new CameraError('timeout', `No frame received within ${timeoutMs}ms`));
      }, timeoutMs);

      this.on('png', onFrame);
      this.on('failure', onFailure);
    });
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      await this.exitPromise;
      return;
    }

    this.stopped = true;
    this.cleanupStream();
    this.latest = null;
    this.emit('failure', new CameraError('capture', 'Camera handle is stopped'));

    if (this.exited) {
      this.finalize();
      return;
    }

    try {
      this.command.kill('SIGTERM');
    } catch (error) {
      this.markExited();
      this.finalize();
      throw new CameraError('stop', `Failed to stop ffmpeg: ${toError(error).message}`, { cause: error });
    }

    const delay = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
    if (delay <= 0) {
      this.forceKill();
    } else {
      this.killTimer = setTimeout(() => {
        this.killTimer = null;
        this.forceKill();
      }, delay);
      this.killTimer.unref?.();
    }

    await this.exitPromise;
    this.finalize();
  }

  private consume(stream: Readable) {
    this.stream = stream;
    this.buffer = Buffer.alloc(0);
    const maxBuffer = this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

    const onData = (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      const { frames, remainder, corrupted } = extractPngFrames(this.buffer, maxBuffer);
      this.buffer = remainder;

      const newest = frames.at(-1);
      if (newest) {
        this.latest = newest;
        this.emit('png', this.now());
      }

      if (corrupted) {
        this.buffer = Buffer.alloc(0);
      }
    };

    const onError = (err: Error) => {
      if (this.stopped) {
        return;
      }
      this.fail(new CameraError('capture', `ffmpeg output failed: ${err.message}`, { cause: err }));
    };

    const onClose = () => {
      if (this.stopped) {
        return;
      }
      this.fail(new CameraError('capture', 'ffmpeg output closed'));
    };

    stream.on('data', onData);
    stream.once('error', onError);
    stream.once('end', onClose);

    this.streamCleanup = () => {
      stream.off('data', onData);
      stream.off('error', onError);
      stream.off('end', onClose);
    };
  }

  private takeLatest(): Buffer | null {
    const png = this.latest;
    this.latest = null;
    return png;
  }

  private decode(png: Buffer): RawFrame {
    try {
      return decodePngFrame(png, this.now());
    } catch (error) {
      throw new CameraError('capture', `Failed to decode frame: ${toError(error).message}`, { cause: error });
    }
  }

  private fail(error: CameraError) {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.cleanupStream();
    this.emit('failure', error);
  }

  private forceKill() {
    if (this.exited) {
      return;
    }

    try {
      this.command.kill('SIGKILL');
    } catch (error) {
      this.log.warn({ err: toError(error) }, 'Failed to send SIGKILL to ffmpeg');
    }

    const timeoutMs = this.options.exitTimeoutMs ?? DEFAULT_EXIT_TIMEOUT_MS;
    this.exitTimer = setTimeout(() => {
      this.exitTimer = null;
      if (!this.exited) {
        this.log.warn({ timeoutMs }, 'ffmpeg did not report its exit after SIGKILL');
        this.markExited();
      }
    }, timeoutMs);
    this.exitTimer.unref?.();
  }

  private markExited() {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.resolveExit();
  }

  private finalize() {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
    if (this.exitTimer) {
      clearTimeout(this.exitTimer);
      this.exitTimer = null;
    }
    this.commandCleanup?.();
    this.commandCleanup = null;
    this.removeAllListeners();
  }

  private cleanupStream() {
    if (!this.stream) {
      return;
    }

    this.streamCleanup?.();
    this.streamCleanup = null;

    if (!this.stream.destroyed) {
      this.stream.destroy();
    }

    this.stream = null;
    this.buffer = Buffer.alloc(0);
  }
}

export function createFfmpegCommand(config: CameraDriverConfig): ffmpeg.FfmpegCommand {
  const command = ffmpeg(config.device);

  const inputOptions: string[] = [];
  if (config.inputFormat) {
    inputOptions.push('-f', config.inputFormat);
  }
  if (config.inputFormat === 'v4l2') {
    inputOptions.push(
      '-video_size',
      `${config.width}x${config.height}`,
      '-framerate',
      String(config.framesPerSecond)
    );
  }
  if (inputOptions.length > 0) {
    command.inputOptions(inputOptions);
  }

  return command
    .outputOptions('-vf', buildFfmpegFilters(config).join(','))
    .outputOptions('-f', 'image2pipe')
    .outputOptions('-vcodec', 'png');
}

export function buildFfmpegFilters(config: CameraDriverConfig): string[] {
  const filters = [`fps=${config.framesPerSecond}`, `scale=${config.width}:${config.height}`];
  const controls = config.controls;
  if (controls) {
    const eq: string[] = [];
    if (typeof controls.brightness === 'number') {
      eq.push(`brightness=${controls.brightness}`);
    }
    if (typeof controls.contrast === 'number') {
      eq.push(`contrast=${controls.contrast}`);
    }
    if (typeof controls.saturation === 'number') {
      eq.push(`saturation=${controls.saturation}`);
    }
    if (eq.length > 0) {
      filters.push(`eq=${eq.join(':')}`);
    }
  }
  return filters;
}

export function decodePngFrame(png: Buffer, capturedAt: number): RawFrame {
  const image = PNG.sync.read(png);
  const { width, height, data } = image;
  const rgb = new Uint8Array(width * height * 3);

  for (let i = 0, j = 0; i < width * height * 4; i += 4, j += 3) {
    rgb[j] = data[i];
    rgb[j + 1] = data[i + 1];
    rgb[j + 2] = data[i + 2];
  }

  return { width, height, channels: 3, data: rgb, capturedAt };
}

export function extractPngFrames(buffer: Buffer, maxBuffer = DEFAULT_MAX_BUFFER_BYTES) {
  let working: Buffer = buffer;
  const frames: Buffer[] = [];
  let corrupted = false;

  while (true) {
    const pngStart = working.indexOf(PNG_SIGNATURE);

    if (pngStart === -1) {
      if (working.length > maxBuffer) {
        corrupted = true;
        working = Buffer.alloc(0);
      }
      break;
    }

    if (pngStart > 0) {
      working = working.subarray(pngStart);
    }

    const frame = slicePng(working);
    if (!frame) {
      if (working.length > maxBuffer) {
        corrupted = true;
        working = Buffer.alloc(0);
      }
      break;
    }

    frames.push(frame.png);
    working = frame.remainder;
  }

  return { frames, remainder: working, corrupted };
}

export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}
