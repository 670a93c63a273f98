export type RgbImage = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type PatchStats = {
  mean: number;
  stdDev: number;
  size: number;
};

export const SHARPEN_KERNEL = [
  [0, -1, 0],
  [-1, 5, -1],
  [0, -1, 0]
];

export const BLUR_KERNEL = [
  [1, 2, 1],
  [2, 4, 2],
  [1, 2, 1]
];

export function luma(r: number, g: number, b: number): number {
  // Rec. 601 luma coefficients
  return 0.299 * r + 0.587 * g + 0.114 * b;
}

/**
 * Mean and standard deviation of luma over the centered square patch whose
 * side is a quarter of the shorter frame dimension.
 */
export function centerPatchStats(image: RgbImage): PatchStats {
  const { width, height, data } = image;
  const size = Math.floor(Math.min(width, height) / 4);
  if (size <= 0) {
    return { mean: 0, stdDev: 0, size: 0 };
  }

  const x0 = Math.floor((width - size) / 2);
  const y0 = Math.floor((height - size) / 2);
  let sum = 0;
  let sumSquares = 0;

  for (let y = y0; y < y0 + size; y += 1) {
    for (let x = x0; x < x0 + size; x += 1) {
      const offset = (y * width + x) * 3;
      const value = luma(data[offset], data[offset + 1], data[offset + 2]);
      sum += value;
      sumSquares += value * value;
    }
  }

  const count = size * size;
  const mean = sum / count;
  const variance = Math.max(0, sumSquares / count - mean * mean);
  return { mean, stdDev: Math.sqrt(variance), size };
}

export function convolve3x3(image: RgbImage, kernel: number[][], divisor = 1): Uint8Array {
  const { width, height, data } = image;
  const output = new Uint8Array(data.length);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let r = 0;
      let g = 0;
      let b = 0;

      for (let ky = -1; ky <= 1; ky += 1) {
        for (let kx = -1; kx <= 1; kx += 1) {
          const weight = kernel[ky + 1][kx + 1];
          if (weight === 0) {
            continue;
          }

          const sampleX = clamp(x + kx, 0, width - 1);
          const sampleY = clamp(y + ky, 0, height - 1);
          const offset = (sampleY * width + sampleX) * 3;
          r += data[offset] * weight;
          g += data[offset + 1] * weight;
          b += data[offset + 2] * weight;
        }
      }

      const target = (y * width + x) * 3;
      output[target] = clampByte(r / divisor);
      output[target + 1] = clampByte(g / divisor);
      output[target + 2] = clampByte(b / divisor);
    }
  }

  return output;
}

export function sharpen(image: RgbImage): Uint8Array {
  return convolve3x3(image, SHARPEN_KERNEL);
}

export function blur(image: RgbImage): Uint8Array {
  return convolve3x3(image, BLUR_KERNEL, 16);
}

/** `weight * a + (1 - weight) * b`, per byte. */
export function blend(a: Uint8Array, b: Uint8Array, weight: number): Uint8Array {
  if (a.length !== b.length) {
    throw new Error(`Cannot blend buffers of different sizes (${a.length} vs ${b.length})`);
  }

  const output = new Uint8Array(a.length);
  const inverse = 1 - weight;
  for (let i = 0; i < a.length; i += 1) {
    output[i] = clampByte(a[i] * weight + b[i] * inverse);
  }
  return output;
}

export function clampByte(value: number): number {
  if (value <= 0) {
    return 0;
  }
  if (value >= 255) {
    return 255;
  }
  return Math.round(value);
}

export function clamp(value: number, min: number, max: number) {
  return Math.min(Math.max(value, min), max);
}
