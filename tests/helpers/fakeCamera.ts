import type { CameraDriver, CameraDriverConfig, CameraHandle } from '../../src/camera/driver.js';
import { CameraError } from '../../src/errors.js';
import type { RawFrame } from '../../src/types.js';

export function makeFrame(
  width: number,
  height: number,
  pixel: (x: number, y: number) => [number, number, number],
  capturedAt = 0
): RawFrame {
  const data = new Uint8Array(width * height * 3);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const [r, g, b] = pixel(x, y);
      const offset = (y * width + x) * 3;
      data[offset] = r;
      data[offset + 1] = g;
      data[offset + 2] = b;
    }
  }
  return { width, height, channels: 3, data, capturedAt };
}

/** 64x48 horizontal/vertical gradient with enough texture to pass the frame guard. */
export function gradientFrame(capturedAt = 0): RawFrame {
  return makeFrame(64, 48, (x, y) => {
    const value = (4 * x + 2 * y) % 256;
    return [value, value, value];
  }, capturedAt);
}

export class FakeHandle implements CameraHandle {
  public captures = 0;
  public stopped = false;
  public failWith: Error | null = null;

  constructor(private readonly produce: () => RawFrame = () => gradientFrame()) {}

  async capture(): Promise<RawFrame> {
    if (this.stopped) {
      throw new CameraError('capture', 'Camera handle is stopped');
    }
    this.captures += 1;
    if (this.failWith) {
      throw this.failWith;
    }
    return this.produce();
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }
}

export class FakeDriver implements CameraDriver {
  public readonly handles: FakeHandle[] = [];
  public readonly configs: CameraDriverConfig[] = [];
  public failuresBeforeOpen = 0;
  public alwaysFail = false;

  constructor(private readonly produce?: () => RawFrame) {}

  async open(config: CameraDriverConfig): Promise<CameraHandle> {
    this.configs.push(config);
    if (this.alwaysFail || this.failuresBeforeOpen > 0) {
      this.failuresBeforeOpen = Math.max(0, this.failuresBeforeOpen - 1);
      throw new CameraError('init', 'device busy');
    }
    const handle = new FakeHandle(this.produce);
    this.handles.push(handle);
    return handle;
  }

  liveHandles(): FakeHandle[] {
    return this.handles.filter(handle => !handle.stopped);
  }

  latest(): FakeHandle | undefined {
    return this.handles.at(-1);
  }
}

export const DRIVER_CONFIG: CameraDriverConfig = {
  device: '/dev/video0',
  inputFormat: 'v4l2',
  width: 64,
  height: 48,
  framesPerSecond: 30
};
