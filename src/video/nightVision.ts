import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { ValidationError } from '../errors.js';
import type { NightVisionMode, NightVisionState } from '../types.js';

export const STRENGTH_RANGE = { min: 0.1, max: 1.0 } as const;
export const LIGHT_THRESHOLD_RANGE = { min: 10, max: 150 } as const;
const DEFAULT_DEBOUNCE_MS = 3000;

export interface NightVisionOptions {
  enabled: boolean;
  autoMode: boolean;
  strength: number;
  lightThreshold: number;
  greenMode: boolean;
  debounceMs?: number;
  manualActive?: boolean;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export type NightVisionSnapshot = NightVisionState & { mode: NightVisionMode };

function assertInRange(field: string, value: number, range: { min: number; max: number }) {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < range.min || value > range.max) {
    throw new ValidationError(field, `${field} must be between ${range.min} and ${range.max}`);
  }
}

/**
 * Night-vision mode machine. In auto mode the low-light signal flips `active`
 * at most once per debounce window; manual mode applies `manualActive`
 * immediately; disabling always clears `active`.
 */
export class NightVisionController {
  private readonly state: NightVisionState;
  private readonly debounceMs: number;
  private readonly now: () => number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: NightVisionOptions) {
    assertInRange('strength', options.strength, STRENGTH_RANGE);
    assertInRange('lightThreshold', options.lightThreshold, LIGHT_THRESHOLD_RANGE);

    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.now = options.now ?? Date.now;
    this.log = (options.log ?? logger).child({ component: 'night-vision' });
    this.metrics = options.metrics ?? defaultMetrics;

    const manualActive = options.manualActive ?? true;
    this.state = {
      enabled: options.enabled,
      autoMode: options.autoMode,
      active: options.enabled && !options.autoMode ? manualActive : false,
      manualActive,
      greenMode: options.greenMode,
      strength: options.strength,
      lightThreshold: options.lightThreshold,
      lastChangeTime: 0
    };
  }

  get active(): boolean {
    return this.state.active;
  }

  get strength(): number {
    return this.state.strength;
  }

  get greenMode(): boolean {
    return this.state.greenMode;
  }

  get lightThreshold(): number {
    return this.state.lightThreshold;
  }

  mode(): NightVisionMode {
    if (!this.state.enabled) {
      return 'disabled';
    }
    if (this.state.autoMode) {
      return this.state.active ? 'auto-night' : 'auto-standard';
    }
    return this.state.manualActive ? 'manual-on' : 'manual-off';
  }

  snapshot(): NightVisionSnapshot {
    return { ...this.state, mode: this.mode() };
  }

  /** Feeds the low-light signal; returns true when `active` flipped. */
  observe(lowLight: boolean, now = this.now()): boolean {
    if (!this.state.enabled || !this.state.autoMode) {
      return false;
    }
    if (lowLight === this.state.active) {
      return false;
    }
    if (now - this.state.lastChangeTime <= this.debounceMs) {
      return false;
    }

    this.setActive(lowLight, now, 'auto');
    return true;
  }

  toggleEnabled(now = this.now()): NightVisionSnapshot {
    this.state.enabled = !this.state.enabled;
    if (!this.state.enabled) {
      this.setActive(false, now, 'disabled');
    } else if (!this.state.autoMode) {
      this.setActive(this.state.manualActive, now, 'manual');
    }
    this.log.info({ enabled: this.state.enabled }, 'Night vision toggled');
    return this.snapshot();
  }

  toggleAutoMode(now = this.now()): NightVisionSnapshot {
    this.state.autoMode = !this.state.autoMode;
    if (this.state.enabled && !this.state.autoMode) {
      this.setActive(this.state.manualActive, now, 'manual');
    }
    this.log.info({ autoMode: this.state.autoMode }, 'Night vision mode toggled');
    return this.snapshot();
  }

  toggleGreenMode(): NightVisionSnapshot {
    this.state.greenMode = !this.state.greenMode;
    this.log.info({ greenMode: this.state.greenMode }, 'Night vision green mode toggled');
    return this.snapshot();
  }

  setManualActive(active: boolean, now = this.now()): NightVisionSnapshot {
    this.state.manualActive = active;
    if (this.state.enabled && !this.state.autoMode) {
      this.setActive(active, now, 'manual');
    }
    return this.snapshot();
  }

  setStrength(strength: number): NightVisionSnapshot {
    assertInRange('strength', strength, STRENGTH_RANGE);
    this.state.strength = strength;
    this.log.info({ strength }, 'Night vision strength updated');
    return this.snapshot();
  }

  setLightThreshold(threshold: number): NightVisionSnapshot {
    assertInRange('threshold', threshold, LIGHT_THRESHOLD_RANGE);
    this.state.lightThreshold = threshold;
    this.log.info({ threshold }, 'Light threshold updated');
    return this.snapshot();
  }

  private setActive(active: boolean, now: number, cause: 'auto' | 'manual' | 'disabled') {
    if (this.state.active === active) {
      return;
    }
    this.state.active = active;
    this.state.lastChangeTime = now;
    this.metrics.recordNightVisionTransition();
    this.log.info({ active, cause, mode: this.mode() }, 'Night vision state changed');
  }
}
