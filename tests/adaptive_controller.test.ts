import { afterEach, describe, expect, it, vi } from 'vitest';
import { AdaptiveController, toProcessingLevel, type FpsSource } from '../src/pipeline/adaptiveController.js';
import { MetricsRegistry } from '../src/metrics/index.js';

class StubFps implements FpsSource {
  sampleCount = 10;
  current = 30;

  stats() {
    return { current: this.current, min: this.current, max: this.current, avg: this.current };
  }
}

function createController(options: { night?: boolean; initialLevel?: number } = {}) {
  const fps = new StubFps();
  const metrics = new MetricsRegistry();
  let night = options.night ?? false;
  const controller = new AdaptiveController({
    fps,
    nightActive: () => night,
    intervalMs: 3000,
    standard: { minFps: 25, maxFps: 30, reduceRatio: 0.7 },
    night: { criticalFps: 16, floorFps: 18, recoverFps: 22 },
    initialLevel: options.initialLevel,
    metrics
  });
  return {
    controller,
    fps,
    metrics,
    setNight(value: boolean) {
      night = value;
    }
  };
}

describe('AdaptiveController', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('clamps levels into the supported range', () => {
    expect(toProcessingLevel(-3)).toBe(0);
    expect(toProcessingLevel(1)).toBe(1);
    expect(toProcessingLevel(1.4)).toBe(1);
    expect(toProcessingLevel(7)).toBe(2);
  });

  it('waits for at least two fps samples', () => {
    const { controller, fps } = createController();
    fps.sampleCount = 1;
    fps.current = 5;

    expect(controller.evaluate()).toBeNull();
    expect(controller.processing()).toEqual({ processingLevel: 1, reduceProcessing: false });
  });

  it('lowers the level below the standard minimum', () => {
    const { controller, fps } = createController();
    fps.current = 20;

    const adjustment = controller.evaluate();

    expect(adjustment).toMatchObject({
      direction: 'down',
      night: false,
      previous: { processingLevel: 1, reduceProcessing: false },
      next: { processingLevel: 0, reduceProcessing: false }
    });
  });

  it('enables reduced processing when fps falls below the reduce ratio', () => {
    const { controller, fps } = createController();
    fps.current = 15;

    expect(controller.evaluate()?.next).toEqual({ processingLevel: 0, reduceProcessing: true });

    fps.current = 17;
    expect(controller.evaluate()).toBeNull();
  });

  it('turns on reduced processing at the lowest level', () => {
    const { controller, fps } = createController({ initialLevel: 0 });
    fps.current = 10;

    expect(controller.evaluate()).toMatchObject({
      direction: 'reduce-on',
      next: { processingLevel: 0, reduceProcessing: true }
    });
  });

  it('clears reduced processing before raising the level', () => {
    const { controller, fps, metrics } = createController();
    fps.current = 15;
    controller.evaluate();

    fps.current = 35;
    expect(controller.evaluate()).toMatchObject({
      direction: 'reduce-off',
      next: { processingLevel: 0, reduceProcessing: false }
    });
    expect(controller.evaluate()?.next).toEqual({ processingLevel: 1, reduceProcessing: false });
    expect(controller.evaluate()?.next).toEqual({ processingLevel: 2, reduceProcessing: false });
    expect(controller.evaluate()).toBeNull();

    expect(metrics.snapshot().processing).toMatchObject({
      level: 2,
      reduceProcessing: false,
      adjustments: { down: 1, 'reduce-off': 1, up: 2 }
    });
  });

  it('holds steady inside the standard band', () => {
    const { controller, fps } = createController();
    fps.current = 27;

    expect(controller.evaluate()).toBeNull();
  });

  it('applies the night thresholds while night vision is active', () => {
    const { controller, fps } = createController({ night: true, initialLevel: 2 });

    fps.current = 15;
    expect(controller.evaluate()).toMatchObject({
      direction: 'down',
      night: true,
      next: { processingLevel: 1, reduceProcessing: true }
    });

    fps.current = 17;
    expect(controller.evaluate()?.next).toEqual({ processingLevel: 0, reduceProcessing: true });

    fps.current = 20;
    expect(controller.evaluate()).toBeNull();

    fps.current = 23;
    expect(controller.evaluate()?.direction).toBe('reduce-off');
    expect(controller.evaluate()?.next).toEqual({ processingLevel: 1, reduceProcessing: false });
  });

  it('uses the standard rules once night vision turns off', () => {
    const { controller, fps, setNight } = createController({ night: true });
    fps.current = 20;
    expect(controller.evaluate()).toBeNull();

    setNight(false);
    expect(controller.evaluate()?.next).toEqual({ processingLevel: 0, reduceProcessing: false });
  });

  it('never moves more than one level per evaluation', () => {
    const { controller, fps } = createController({ initialLevel: 2 });
    const rates = [5, 5, 40, 40, 40, 3, 60];
    let previous = controller.processing().processingLevel;

    for (const rate of rates) {
      fps.current = rate;
      controller.evaluate();
      const level = controller.processing().processingLevel;
      expect(Math.abs(level - previous)).toBeLessThanOrEqual(1);
      previous = level;
    }
  });

  it('evaluates on its interval once started', () => {
    vi.useFakeTimers();
    const { controller, fps } = createController();
    fps.current = 20;

    controller.start();
    vi.advanceTimersByTime(2999);
    expect(controller.processing().processingLevel).toBe(1);

    vi.advanceTimersByTime(1);
    expect(controller.processing().processingLevel).toBe(0);

    controller.stop();
    fps.current = 40;
    vi.advanceTimersByTime(9000);
    expect(controller.processing().processingLevel).toBe(0);
  });
});
