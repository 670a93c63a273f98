export type RawFrame = {
  width: number;
  height: number;
  channels: 3;
  data: Uint8Array;
  capturedAt: number;
};

export type DisplayFrame = RawFrame & {
  overlay: string[];
  night: boolean;
};

export interface EncodedFrame {
  data: Buffer;
  publishedAt: number;
  sequence: number;
}

export interface FpsStats {
  current: number;
  min: number;
  max: number;
  avg: number;
}

export type ProcessingLevel = 0 | 1 | 2;

export interface ProcessingConfig {
  processingLevel: ProcessingLevel;
  reduceProcessing: boolean;
}

export type NightVisionMode = 'disabled' | 'auto-standard' | 'auto-night' | 'manual-on' | 'manual-off';

export interface NightVisionState {
  enabled: boolean;
  autoMode: boolean;
  active: boolean;
  manualActive: boolean;
  greenMode: boolean;
  strength: number;
  lightThreshold: number;
  lastChangeTime: number;
}

export type CameraStatus = 'stopped' | 'initializing' | 'running' | 'resetting' | 'failed';

export type CaptureState = 'idle' | 'awaiting-camera' | 'capturing' | 'stopping';

export interface ClientSession {
  id: number;
  connectedAt: number;
  lastSentAt: number;
  lastSequence: number;
}

export type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export interface HealthCheckResult {
  name: string;
  status: HealthStatus;
  details?: Record<string, unknown>;
}

export type HealthCheckProvider = () => Promise<HealthCheckResult[]>;
