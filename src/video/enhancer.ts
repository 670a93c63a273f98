import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { EnhancementError, toError } from '../errors.js';
import type { DisplayFrame, NightVisionState, ProcessingConfig, RawFrame } from '../types.js';
import {
  GAIN_TABLES,
  HIGHLIGHT_SHIFT,
  HIGHLIGHT_THRESHOLD,
  BRIGHTNESS_LIFT,
  STANDARD_TABLES,
  nightTable
} from './colorTables.js';
import { drawOverlay, getDefaultFont, type BitmapFont } from './overlay.js';
import { blend, blur, centerPatchStats, clampByte, luma, sharpen } from './utils.js';

const MIN_MEAN_LUMINANCE = 5;
const MIN_STD_DEV = 3;
const SMOOTHING = 0.95;
const SHARPEN_WEIGHT = 0.7;

export type NightVisionView = Pick<NightVisionState, 'active' | 'strength' | 'greenMode' | 'lightThreshold'>;

export interface EnhanceResult {
  frame: DisplayFrame | null;
  luminance: number;
  lowLight: boolean;
  fallback: boolean;
}

export interface EnhancerOptions {
  loadFont?: () => BitmapFont;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class Enhancer {
  private smoothed: number | null = null;
  private timestampSecond = Number.NaN;
  private timestampText = '';
  private font: BitmapFont | null = null;
  private readonly loadFont: () => BitmapFont;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: EnhancerOptions = {}) {
    this.loadFont = options.loadFont ?? getDefaultFont;
    this.log = (options.log ?? logger).child({ component: 'enhancer' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /** Exponentially smoothed center-patch luminance, or null before the first valid frame. */
  get smoothedLuminance(): number | null {
    return this.smoothed;
  }

  enhance(
    raw: RawFrame,
    processing: ProcessingConfig,
    night: NightVisionView,
    fps: number,
    now = Date.now()
  ): EnhanceResult {
    const stats = centerPatchStats(raw);
    if (stats.mean < MIN_MEAN_LUMINANCE || stats.stdDev < MIN_STD_DEV) {
      return {
        frame: null,
        luminance: stats.mean,
        lowLight: this.smoothed !== null && this.smoothed < night.lightThreshold,
        fallback: false
      };
    }

    const smoothed =
      this.smoothed === null ? stats.mean : SMOOTHING * this.smoothed + (1 - SMOOTHING) * stats.mean;
    this.smoothed = smoothed;
    const lowLight = smoothed < night.lightThreshold;
    const overlay = this.overlayLines(fps, night.active, now);

    try {
      if (raw.data.length !== raw.width * raw.height * 3) {
        throw new EnhancementError(
          `Frame buffer holds ${raw.data.length} bytes, expected ${raw.width * raw.height * 3}`
        );
      }

      const data = night.active ? this.nightPath(raw, processing, night) : this.standardPath(raw, processing);
      drawOverlay({ width: raw.width, height: raw.height, data }, overlay, this.resolveFont());
      this.metrics.recordFrameEnhanced(false);

      return {
        frame: { ...raw, data, overlay, night: night.active },
        luminance: smoothed,
        lowLight,
        fallback: false
      };
    } catch (error) {
      const failure =
        error instanceof EnhancementError
          ? error
          : new EnhancementError(`Enhancement failed: ${toError(error).message}`, { cause: error });
      this.log.warn({ err: failure }, 'Enhancement failed, publishing raw frame');
      this.metrics.recordFrameEnhanced(true);

      return {
        frame: { ...raw, overlay, night: false },
        luminance: smoothed,
        lowLight,
        fallback: true
      };
    }
  }

  private standardPath(raw: RawFrame, processing: ProcessingConfig): Uint8Array {
    const { red, green, blue } = STANDARD_TABLES;
    const source = raw.data;
    let output: Uint8Array = new Uint8Array(source.length);
    const highlight = processing.processingLevel >= 2;

    for (let i = 0; i < source.length; i += 3) {
      const r = source[i];
      const g = source[i + 1];
      const b = source[i + 2];

      if (highlight) {
        const gainedR = GAIN_TABLES.red[r];
        const gainedG = GAIN_TABLES.green[g];
        const gainedB = GAIN_TABLES.blue[b];
        if ((gainedR + gainedG + gainedB) / 3 > HIGHLIGHT_THRESHOLD) {
          output[i] = clampByte(gainedR + HIGHLIGHT_SHIFT.red + BRIGHTNESS_LIFT);
          output[i + 1] = clampByte(gainedG + HIGHLIGHT_SHIFT.green + BRIGHTNESS_LIFT);
          output[i + 2] = clampByte(gainedB + HIGHLIGHT_SHIFT.blue + BRIGHTNESS_LIFT);
          continue;
        }
      }

      output[i] = red[r];
      output[i + 1] = green[g];
      output[i + 2] = blue[b];
    }

    if (processing.processingLevel >= 1 && !processing.reduceProcessing) {
      const sharpened = sharpen({ width: raw.width, height: raw.height, data: output });
      output = blend(sharpened, output, SHARPEN_WEIGHT);
    }

    return output;
  }

  private nightPath(raw: RawFrame, processing: ProcessingConfig, night: NightVisionView): Uint8Array {
    const table = nightTable(night.strength);
    const source = raw.data;
    let output: Uint8Array = new Uint8Array(source.length);

    for (let i = 0; i < source.length; i += 1) {
      output[i] = table[source[i]];
    }

    if (!processing.reduceProcessing) {
      const passes = processing.processingLevel >= 2 ? 2 : 1;
      for (let pass = 0; pass < passes; pass += 1) {
        output = blur({ width: raw.width, height: raw.height, data: output });
      }
    }

    if (night.greenMode) {
      const weight = night.strength;
      const keep = 1 - weight;
      for (let i = 0; i < output.length; i += 3) {
        const intensity = luma(output[i], output[i + 1], output[i + 2]);
        output[i] = clampByte(output[i] * keep + intensity * 0.2 * weight);
        output[i + 1] = clampByte(output[i + 1] * keep + intensity * weight);
        output[i + 2] = clampByte(output[i + 2] * keep + intensity * 0.2 * weight);
      }
    }

    return output;
  }

  private overlayLines(fps: number, night: boolean, now: number): string[] {
    const second = Math.floor(now / 1000);
    if (second !== this.timestampSecond) {
      this.timestampSecond = second;
      this.timestampText = formatTimestamp(new Date(second * 1000));
    }

    const lines = [this.timestampText, `FPS: ${fps.toFixed(1)}`];
    if (night) {
      lines.push('NIGHT');
    }
    return lines;
  }

  private resolveFont(): BitmapFont {
    if (!this.font) {
      this.font = this.loadFont();
    }
    return this.font;
  }
}
