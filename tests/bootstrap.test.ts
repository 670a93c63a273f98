import { beforeEach, describe, expect, it } from 'vitest';
import {
  bootstrap,
  collectHealthChecks,
  registerHealthIndicator,
  registerShutdownHook,
  resetAppLifecycle,
  runShutdownHooks,
  type AppRuntime
} from '../src/app.js';
import { loadConfigFromFile } from '../src/config/index.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { FakeDriver } from './helpers/fakeCamera.js';

const fastSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, Math.min(ms, 5)));

function start(driver: FakeDriver): Promise<AppRuntime> {
  return bootstrap({
    config: loadConfigFromFile('config/default.json'),
    overrides: {
      driver,
      encoder: async () => Buffer.from([0xff, 0xd8, 0xff, 0xd9]),
      sleep: fastSleep,
      metrics: new MetricsRegistry()
    },
    port: 0,
    host: '127.0.0.1'
  });
}

describe('Bootstrap', () => {
  beforeEach(() => {
    resetAppLifecycle();
  });

  it('opens the camera, serves status and shuts everything down', async () => {
    const driver = new FakeDriver();
    const runtime = await start(driver);

    try {
      const response = await fetch(`http://127.0.0.1:${runtime.http.port}/status`);
      expect(response.status).toBe(200);
      const payload: unknown = await response.json();
      expect(payload).toMatchObject({
        camera_status: 'running',
        max_clients: 5,
        checks: [
          { name: 'camera', status: 'ok', details: { cameraStatus: 'running' } },
          { name: 'stream', status: 'ok', details: { activeClients: 0, maxClients: 5 } }
        ]
      });

      const checks = await collectHealthChecks({ service: { status: 'ok', startedAt: runtime.context.startedAt } });
      expect(checks.map(check => check.name)).toEqual(['camera', 'stream']);
      expect(checks[0]).toMatchObject({ status: 'ok', details: { cameraStatus: 'running' } });
      expect(checks[1]).toMatchObject({ status: 'ok', details: { activeClients: 0, maxClients: 5 } });
    } finally {
      await runtime.shutdown('test');
    }

    expect(runtime.http.server.listening).toBe(false);
    expect(runtime.context.captureLoop.state()).toBe('idle');
    expect(driver.liveHandles()).toHaveLength(0);
    await expect(collectHealthChecks({ service: { status: 'stopping', startedAt: null } })).resolves.toEqual([]);
  });

  it('fails when the camera cannot be opened', async () => {
    const driver = new FakeDriver();
    driver.alwaysFail = true;

    await expect(start(driver)).rejects.toThrow('Camera failed to initialize after 3 attempts: device busy');
    await expect(runShutdownHooks({ reason: 'test' })).resolves.toEqual([]);
  });
});

describe('AppLifecycle', () => {
  beforeEach(() => {
    resetAppLifecycle();
  });

  it('runs shutdown hooks in reverse order and reports failures', async () => {
    const order: string[] = [];
    registerShutdownHook('first', () => {
      order.push('first');
    });
    registerShutdownHook('second', () => {
      throw new Error('close failed');
    });
    registerShutdownHook('third', async () => {
      order.push('third');
    });

    const results = await runShutdownHooks({ reason: 'test' });

    expect(order).toEqual(['third', 'first']);
    expect(results.map(result => [result.name, result.status])).toEqual([
      ['third', 'ok'],
      ['second', 'error'],
      ['first', 'ok']
    ]);
    expect(results[1]?.error?.message).toBe('close failed');
  });

  it('degrades indicators that throw and replaces ones registered twice', async () => {
    registerHealthIndicator('camera', () => ({ status: 'starting' }));
    registerHealthIndicator('camera', () => ({ status: 'ok' }));
    const detach = registerHealthIndicator('encoder', () => {
      throw new Error('encoder unavailable');
    });

    const metrics = new MetricsRegistry().snapshot();
    await expect(collectHealthChecks({ service: { status: 'ok', startedAt: 0 }, metrics })).resolves.toEqual([
      { name: 'camera', status: 'ok', details: undefined },
      { name: 'encoder', status: 'degraded', details: { error: 'encoder unavailable' } }
    ]);

    detach();
    const remaining = await collectHealthChecks({ service: { status: 'ok', startedAt: 0 }, metrics });
    expect(remaining.map(check => check.name)).toEqual(['camera']);
  });
});
