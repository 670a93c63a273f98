import type { RawFrame } from '../types.js';

export type CameraControls = {
  brightness?: number;
  contrast?: number;
  saturation?: number;
};

export type CameraDriverConfig = {
  device: string;
  inputFormat?: string;
  width: number;
  height: number;
  framesPerSecond: number;
  controls?: CameraControls;
};

export interface CameraHandle {
  capture(timeoutMs: number): Promise<RawFrame>;
  stop(): Promise<void>;
}

export interface CameraDriver {
  open(config: CameraDriverConfig): Promise<CameraHandle>;
}
