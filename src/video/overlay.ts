import fs from 'node:fs';
import path from 'node:path';
import type { RgbImage } from './utils.js';

export type BitmapFont = {
  width: number;
  height: number;
  glyphs: Map<string, Uint8Array>;
};

export type OverlayOptions = {
  x?: number;
  y?: number;
  scale?: number;
  padding?: number;
  lineGap?: number;
  backgroundAlpha?: number;
  color?: readonly [number, number, number];
};

export const DEFAULT_FONT_PATH = path.resolve(process.cwd(), 'assets/font5x7.json');

const DEFAULT_OPTIONS: Required<OverlayOptions> = {
  x: 8,
  y: 8,
  scale: 2,
  padding: 4,
  lineGap: 4,
  backgroundAlpha: 0.5,
  color: [255, 255, 255]
};

let defaultFont: BitmapFont | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseBitmapFont(value: unknown): BitmapFont {
  if (!isRecord(value)) {
    throw new Error('Font definition must be an object');
  }

  const { width, height, glyphs } = value;
  if (typeof width !== 'number' || typeof height !== 'number' || width <= 0 || height <= 0) {
    throw new Error('Font definition requires positive width and height');
  }
  if (!isRecord(glyphs)) {
    throw new Error('Font definition requires a glyphs object');
  }

  const parsed = new Map<string, Uint8Array>();
  for (const [char, rows] of Object.entries(glyphs)) {
    if (!Array.isArray(rows) || rows.length !== height) {
      throw new Error(`Glyph "${char}" must have ${height} rows`);
    }

    const bitmap = new Uint8Array(width * height);
    rows.forEach((row: unknown, rowIndex) => {
      if (typeof row !== 'string' || row.length !== width || !/^[01]+$/.test(row)) {
        throw new Error(`Glyph "${char}" row ${rowIndex} must be ${width} characters of 0/1`);
      }
      for (let column = 0; column < width; column += 1) {
        bitmap[rowIndex * width + column] = row[column] === '1' ? 1 : 0;
      }
    });
    parsed.set(char, bitmap);
  }

  return { width, height, glyphs: parsed };
}

export function loadBitmapFont(filePath: string = DEFAULT_FONT_PATH): BitmapFont {
  const raw = fs.readFileSync(filePath, 'utf8');
  return parseBitmapFont(JSON.parse(raw));
}

export function getDefaultFont(): BitmapFont {
  if (!defaultFont) {
    defaultFont = loadBitmapFont();
  }
  return defaultFont;
}

export function measureText(text: string, font: BitmapFont, scale = DEFAULT_OPTIONS.scale) {
  if (text.length === 0) {
    return { width: 0, height: font.height * scale };
  }
  return {
    width: (text.length * (font.width + 1) - 1) * scale,
    height: font.height * scale
  };
}

/**
 * Draws each line in its own darkened box, stacked top to bottom. Mutates
 * `image.data`; callers pass a buffer that has not been published yet.
 */
export function drawOverlay(
  image: RgbImage,
  lines: readonly string[],
  font: BitmapFont,
  options: OverlayOptions = {}
) {
  const settings = { ...DEFAULT_OPTIONS, ...options };
  let top = settings.y;

  for (const line of lines) {
    const { width, height } = measureText(line, font, settings.scale);
    const boxWidth = width + settings.padding * 2;
    const boxHeight = height + settings.padding * 2;

    darkenRect(image, settings.x, top, boxWidth, boxHeight, settings.backgroundAlpha);
    drawText(image, line, font, settings.x + settings.padding, top + settings.padding, settings);

    top += boxHeight + settings.lineGap;
  }
}

function darkenRect(image: RgbImage, x: number, y: number, width: number, height: number, alpha: number) {
  const keep = 1 - alpha;
  const x1 = Math.min(image.width, x + width);
  const y1 = Math.min(image.height, y + height);

  for (let row = Math.max(0, y); row < y1; row += 1) {
    for (let column = Math.max(0, x); column < x1; column += 1) {
      const offset = (row * image.width + column) * 3;
      image.data[offset] = Math.round(image.data[offset] * keep);
      image.data[offset + 1] = Math.round(image.data[offset + 1] * keep);
      image.data[offset + 2] = Math.round(image.data[offset + 2] * keep);
    }
  }
}

function drawText(
  image: RgbImage,
  text: string,
  font: BitmapFont,
  x: number,
  y: number,
  settings: Required<OverlayOptions>
) {
  const { scale, color } = settings;
  const advance = (font.width + 1) * scale;

  for (let index = 0; index < text.length; index += 1) {
    const glyph = font.glyphs.get(text[index].toUpperCase());
    if (!glyph) {
      continue;
    }

    const originX = x + index * advance;
    for (let gy = 0; gy < font.height; gy += 1) {
      for (let gx = 0; gx < font.width; gx += 1) {
        if (glyph[gy * font.width + gx] === 0) {
          continue;
        }
        fillBlock(image, originX + gx * scale, y + gy * scale, scale, color);
      }
    }
  }
}

function fillBlock(
  image: RgbImage,
  x: number,
  y: number,
  size: number,
  color: readonly [number, number, number]
) {
  for (let row = y; row < y + size; row += 1) {
    if (row < 0 || row >= image.height) {
      continue;
    }
    for (let column = x; column < x + size; column += 1) {
      if (column < 0 || column >= image.width) {
        continue;
      }
      const offset = (row * image.width + column) * 3;
      image.data[offset] = color[0];
      image.data[offset + 1] = color[1];
      image.data[offset + 2] = color[2];
    }
  }
}
