import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type ServerConfig = {
  host: string;
  port: number;
  staticDir?: string;
};

export type CameraControlsConfig = {
  brightness?: number;
  contrast?: number;
  saturation?: number;
};

export type CameraConfig = {
  device: string;
  inputFormat?: string;
  width: number;
  height: number;
  framesPerSecond: number;
  controls?: CameraControlsConfig;
  initAttempts?: number;
  retryDelayMs?: number;
  warmupFrames?: number;
  resetCooldownMs?: number;
  captureTimeoutMs?: number;
  forceKillTimeoutMs?: number;
};

export type CaptureConfig = {
  targetFps: number;
  awaitCameraDelayMs?: number;
  failureDelayMs?: number;
  maxConsecutiveFailures?: number;
};

export type EncodingConfig = {
  quality: number;
  ringSize?: number;
};

export type StreamConfig = {
  maxClients: number;
  clientFps: {
    standard: number;
    reduced: number;
  };
  idleWaitMs?: number;
};

export type AdaptiveStandardConfig = {
  minFps: number;
  maxFps: number;
  reduceRatio: number;
};

export type AdaptiveNightConfig = {
  criticalFps: number;
  floorFps: number;
  recoverFps: number;
};

export type AdaptiveConfig = {
  intervalMs: number;
  initialLevel?: number;
  standard: AdaptiveStandardConfig;
  night: AdaptiveNightConfig;
};

export type HealthConfig = {
  intervalMs: number;
  frameTimeoutMs: number;
};

export type NightVisionConfig = {
  enabled: boolean;
  autoMode: boolean;
  strength: number;
  lightThreshold: number;
  greenMode?: boolean;
  debounceMs?: number;
};

export type RelayConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  server: ServerConfig;
  camera: CameraConfig;
  capture: CaptureConfig;
  encoding: EncodingConfig;
  stream: StreamConfig;
  adaptive: AdaptiveConfig;
  health: HealthConfig;
  nightVision: NightVisionConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  enum?: number[];
  minimum?: number;
  maximum?: number;
};

const positiveNumber: JsonSchema = { type: 'number', minimum: 0 };

const relayConfigSchema: JsonSchema = {
  type: 'object',
  required: [
    'app',
    'logging',
    'server',
    'camera',
    'capture',
    'encoding',
    'stream',
    'adaptive',
    'health',
    'nightVision'
  ],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    server: {
      type: 'object',
      required: ['host', 'port'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 },
        staticDir: { type: 'string' }
      }
    },
    camera: {
      type: 'object',
      required: ['device', 'width', 'height', 'framesPerSecond'],
      additionalProperties: false,
      properties: {
        device: { type: 'string' },
        inputFormat: { type: 'string' },
        width: { type: 'number', minimum: 1 },
        height: { type: 'number', minimum: 1 },
        framesPerSecond: { type: 'number', minimum: 1, maximum: 120 },
        controls: {
          type: 'object',
          additionalProperties: false,
          properties: {
            brightness: { type: 'number', minimum: -1, maximum: 1 },
            contrast: { type: 'number', minimum: 0, maximum: 4 },
            saturation: { type: 'number', minimum: 0, maximum: 3 }
          }
        },
        initAttempts: { type: 'number', minimum: 1 },
        retryDelayMs: positiveNumber,
        warmupFrames: positiveNumber,
        resetCooldownMs: positiveNumber,
        captureTimeoutMs: { type: 'number', minimum: 1 },
        forceKillTimeoutMs: positiveNumber
      }
    },
    capture: {
      type: 'object',
      required: ['targetFps'],
      additionalProperties: false,
      properties: {
        targetFps: { type: 'number', minimum: 1, maximum: 120 },
        awaitCameraDelayMs: positiveNumber,
        failureDelayMs: positiveNumber,
        maxConsecutiveFailures: { type: 'number', minimum: 1 }
      }
    },
    encoding: {
      type: 'object',
      required: ['quality'],
      additionalProperties: false,
      properties: {
        quality: { type: 'number', minimum: 75, maximum: 85 },
        ringSize: { type: 'number', minimum: 1 }
      }
    },
    stream: {
      type: 'object',
      required: ['maxClients', 'clientFps'],
      additionalProperties: false,
      properties: {
        maxClients: { type: 'number', minimum: 1 },
        clientFps: {
          type: 'object',
          required: ['standard', 'reduced'],
          additionalProperties: false,
          properties: {
            standard: { type: 'number', minimum: 1, maximum: 60 },
            reduced: { type: 'number', minimum: 1, maximum: 60 }
          }
        },
        idleWaitMs: positiveNumber
      }
    },
    adaptive: {
      type: 'object',
      required: ['intervalMs', 'standard', 'night'],
      additionalProperties: false,
      properties: {
        intervalMs: { type: 'number', minimum: 100 },
        initialLevel: { type: 'number', enum: [0, 1, 2] },
        standard: {
          type: 'object',
          required: ['minFps', 'maxFps', 'reduceRatio'],
          additionalProperties: false,
          properties: {
            minFps: positiveNumber,
            maxFps: positiveNumber,
            reduceRatio: { type: 'number', minimum: 0, maximum: 1 }
          }
        },
        night: {
          type: 'object',
          required: ['criticalFps', 'floorFps', 'recoverFps'],
          additionalProperties: false,
          properties: {
            criticalFps: positiveNumber,
            floorFps: positiveNumber,
            recoverFps: positiveNumber
          }
        }
      }
    },
    health: {
      type: 'object',
      required: ['intervalMs', 'frameTimeoutMs'],
      additionalProperties: false,
      properties: {
        intervalMs: { type: 'number', minimum: 100 },
        frameTimeoutMs: { type: 'number', minimum: 100 }
      }
    },
    nightVision: {
      type: 'object',
      required: ['enabled', 'autoMode', 'strength', 'lightThreshold'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        autoMode: { type: 'boolean' },
        strength: { type: 'number', minimum: 0.1, maximum: 1 },
        lightThreshold: { type: 'number', minimum: 10, maximum: 150 },
        greenMode: { type: 'boolean' },
        debounceMs: positiveNumber
      }
    }
  }
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const errors: string[] = [];

  switch (schema.type) {
    case 'object': {
      if (!isPlainObject(value)) {
        errors.push(`${pathLabel} must be an object`);
        return errors;
      }

      for (const key of schema.required ?? []) {
        if (!(key in value)) {
          errors.push(`${pathLabel}.${key} is required`);
        }
      }

      const properties = schema.properties ?? {};
      if (schema.additionalProperties === false) {
        const known = new Set(Object.keys(properties));
        for (const key of Object.keys(value)) {
          if (!known.has(key)) {
            errors.push(`${pathLabel}.${key} is not allowed`);
          }
        }
      }

      for (const [key, childSchema] of Object.entries(properties)) {
        if (key in value) {
          errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
        }
      }
      return errors;
    }

    case 'number': {
      if (typeof value !== 'number' || Number.isNaN(value)) {
        errors.push(`${pathLabel} must be a number`);
        return errors;
      }

      if (typeof schema.minimum === 'number' && value < schema.minimum) {
        errors.push(`${pathLabel} must be >= ${schema.minimum}`);
      }

      if (typeof schema.maximum === 'number' && value > schema.maximum) {
        errors.push(`${pathLabel} must be <= ${schema.maximum}`);
      }

      if (schema.enum && !schema.enum.includes(value)) {
        errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
      }
      return errors;
    }

    case 'string':
      if (typeof value !== 'string') {
        errors.push(`${pathLabel} must be a string`);
      }
      return errors;

    case 'boolean':
      if (typeof value !== 'boolean') {
        errors.push(`${pathLabel} must be a boolean`);
      }
      return errors;
  }
}

function conformsToSchema(value: unknown, errors: string[]): value is RelayConfig {
  errors.push(...validateAgainstSchema(relayConfigSchema, value, 'config'));
  return errors.length === 0;
}

export function validateConfig(config: unknown): asserts config is RelayConfig {
  const errors: string[] = [];
  if (!conformsToSchema(config, errors)) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): RelayConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): RelayConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: RelayConfig) {
  const messages: string[] = [];

  const standard = config.adaptive.standard;
  if (standard.minFps >= standard.maxFps) {
    messages.push('config.adaptive.standard.minFps must be lower than maxFps');
  }

  const night = config.adaptive.night;
  if (night.criticalFps > night.floorFps) {
    messages.push('config.adaptive.night.criticalFps must not exceed floorFps');
  }
  if (night.floorFps >= night.recoverFps) {
    messages.push('config.adaptive.night.floorFps must be lower than recoverFps');
  }

  if (config.stream.clientFps.reduced > config.stream.clientFps.standard) {
    messages.push('config.stream.clientFps.reduced must not exceed clientFps.standard');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: RelayConfig;
  next: RelayConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: RelayConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): RelayConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): RelayConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: RelayConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    if (!this.lastGoodRaw) {
      return;
    }

    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

const defaultManager = new ConfigManager();

export default defaultManager;
export { relayConfigSchema };
