import { clampByte } from './utils.js';

export const CHANNEL_GAINS = { red: 1.15, green: 1.0, blue: 0.75 } as const;
export const BRIGHTNESS_LIFT = 15;
export const HIGHLIGHT_THRESHOLD = 200;
export const HIGHLIGHT_SHIFT = { red: -10, green: -5, blue: 15 } as const;

export type ChannelTables = {
  red: Uint8Array;
  green: Uint8Array;
  blue: Uint8Array;
};

export type GainTables = {
  red: Float32Array;
  green: Float32Array;
  blue: Float32Array;
};

function buildGain(gain: number): Float32Array {
  const table = new Float32Array(256);
  for (let value = 0; value < 256; value += 1) {
    table[value] = value * gain;
  }
  return table;
}

function buildLifted(gains: Float32Array): Uint8Array {
  const table = new Uint8Array(256);
  for (let value = 0; value < 256; value += 1) {
    table[value] = clampByte(gains[value] + BRIGHTNESS_LIFT);
  }
  return table;
}

/** Per-channel gain before the brightness lift; used by highlight correction. */
export const GAIN_TABLES: GainTables = {
  red: buildGain(CHANNEL_GAINS.red),
  green: buildGain(CHANNEL_GAINS.green),
  blue: buildGain(CHANNEL_GAINS.blue)
};

export const STANDARD_TABLES: ChannelTables = {
  red: buildLifted(GAIN_TABLES.red),
  green: buildLifted(GAIN_TABLES.green),
  blue: buildLifted(GAIN_TABLES.blue)
};

const nightTables = new Map<number, Uint8Array>();

/** Linear gain `1 + strength` with offset `30 * strength`, cached per strength. */
export function nightTable(strength: number): Uint8Array {
  const key = Math.round(strength * 100);
  const cached = nightTables.get(key);
  if (cached) {
    return cached;
  }

  const normalized = key / 100;
  const gain = 1 + normalized;
  const offset = 30 * normalized;
  const table = new Uint8Array(256);
  for (let value = 0; value < 256; value += 1) {
    table[value] = clampByte(value * gain + offset);
  }
  nightTables.set(key, table);
  return table;
}
