import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfigFromFile } from '../src/config/index.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { createStreamContext, type StreamContext } from '../src/pipeline/context.js';
import { startHttpServer, type HttpServerRuntime } from '../src/server/http.js';
import { FakeDriver } from './helpers/fakeCamera.js';

const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xd9]);

const fastSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, Math.min(ms, 5)));

type JsonBody = Record<string, unknown>;

async function readJson(response: Response): Promise<JsonBody> {
  const value: unknown = await response.json();
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('expected a JSON object');
  }
  return { ...value };
}

describe('HTTP API', () => {
  let driver: FakeDriver;
  let context: StreamContext;
  let runtime: HttpServerRuntime;
  let baseUrl: string;

  beforeEach(async () => {
    driver = new FakeDriver();
    context = createStreamContext(loadConfigFromFile('config/default.json'), {
      driver,
      encoder: async () => JPEG,
      sleep: fastSleep,
      metrics: new MetricsRegistry()
    });
    await context.frameSource.initialize();
    context.captureLoop.start();
    runtime = await startHttpServer({ context, port: 0, host: '127.0.0.1', staticDir: 'public' });
    baseUrl = `http://127.0.0.1:${runtime.port}`;
  });

  afterEach(async () => {
    await runtime.close();
    await context.captureLoop.stop();
    await context.frameSource.stop();
  });

  async function post(path: string, body?: unknown) {
    const response = await fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body)
    });
    const payload = await readJson(response);
    return { status: response.status, payload };
  }

  async function getStatus(): Promise<JsonBody> {
    const response = await fetch(`${baseUrl}/status`);
    expect(response.status).toBe(200);
    return readJson(response);
  }

  it('reports pipeline status', async () => {
    const status = await getStatus();

    expect(status).toMatchObject({
      active_clients: 0,
      max_clients: 5,
      camera_status: 'running',
      reduce_processing: false,
      processing_level: 1,
      client_fps: 30,
      night_vision: {
        enabled: true,
        auto_mode: true,
        active: false,
        green_mode: false,
        strength: 0.6,
        light_threshold: 40,
        mode: 'auto-standard'
      },
      health: { severity: 'none', consecutive_resets: 0 },
      checks: []
    });
    expect(Object.keys(status.fps ?? {})).toEqual(['current', 'min', 'max', 'avg']);
  });

  it('validates and applies night vision strength', async () => {
    await expect(post('/set_night_vision_strength', { strength: 0.05 })).resolves.toEqual({
      status: 400,
      payload: { error: 'strength must be between 0.1 and 1', field: 'strength' }
    });
    await expect(post('/set_night_vision_strength', { strength: 'high' })).resolves.toEqual({
      status: 400,
      payload: { error: 'strength must be a number', field: 'strength' }
    });

    const applied = await post('/set_night_vision_strength', { strength: 0.5 });
    expect(applied.status).toBe(200);
    expect(applied.payload.strength).toBe(0.5);

    const status = await getStatus();
    expect(status.night_vision).toMatchObject({ strength: 0.5 });
  });

  it('validates the light threshold', async () => {
    await expect(post('/set_light_threshold', { threshold: 151 })).resolves.toEqual({
      status: 400,
      payload: { error: 'threshold must be between 10 and 150', field: 'threshold' }
    });

    const applied = await post('/set_light_threshold', { threshold: 60 });
    expect(applied).toMatchObject({ status: 200, payload: { light_threshold: 60 } });
  });

  it('rejects malformed request bodies', async () => {
    await expect(post('/set_light_threshold', '{not json')).resolves.toEqual({
      status: 400,
      payload: { error: 'Request body must be valid JSON', field: 'body' }
    });
  });

  it('toggles night vision settings', async () => {
    const manual = await post('/toggle_night_vision_mode');
    expect(manual).toMatchObject({
      status: 200,
      payload: { auto_mode: false, active: true, mode: 'manual-on' }
    });

    const off = await post('/set_night_vision_manual', { active: false });
    expect(off.payload).toMatchObject({ manual_active: false, active: false, mode: 'manual-off' });

    const green = await post('/toggle_green_night_vision');
    expect(green.payload).toMatchObject({ green_mode: true });

    const disabled = await post('/toggle_night_vision');
    expect(disabled.payload).toMatchObject({ enabled: false, active: false, mode: 'disabled' });
  });

  it('resets the camera on request', async () => {
    const opened = context.frameSource.opened;

    await expect(post('/reset_camera')).resolves.toEqual({
      status: 200,
      payload: { status: 'ok', camera_status: 'running' }
    });
    expect(context.frameSource.opened).toBe(opened + 1);
    expect(driver.liveHandles()).toHaveLength(1);
  });

  it('reports a failed reset', async () => {
    driver.alwaysFail = true;

    await expect(post('/reset_camera')).resolves.toEqual({
      status: 500,
      payload: { error: 'Camera failed to initialize after 3 attempts: device busy' }
    });
  });

  it('streams multipart JPEG parts and limits concurrent clients', async () => {
    const controllers: AbortController[] = [];
    const responses: Response[] = [];
    for (let i = 0; i < 5; i += 1) {
      const controller = new AbortController();
      controllers.push(controller);
      responses.push(await fetch(`${baseUrl}/video_feed`, { signal: controller.signal }));
    }

    expect(responses.map(response => response.status)).toEqual([200, 200, 200, 200, 200]);
    expect(responses[0].headers.get('content-type')).toBe('multipart/x-mixed-replace; boundary=frame');

    const rejected = await fetch(`${baseUrl}/video_feed`);
    expect(rejected.status).toBe(503);
    await expect(readJson(rejected)).resolves.toEqual({ error: 'Too many clients' });

    const body = responses[0].body;
    if (!body) {
      throw new Error('expected a streaming body');
    }
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let received = '';
    while (!received.includes('\r\n\r\n')) {
      const { value, done } = await reader.read();
      if (done) {
        break;
      }
      received += decoder.decode(value, { stream: true });
    }
    expect(received.startsWith('--frame\r\nContent-Type: image/jpeg\r\nContent-Length: 4\r\n\r\n')).toBe(true);

    for (const controller of controllers) {
      controller.abort();
    }
    await vi.waitFor(() => {
      expect(context.hub.activeClients).toBe(0);
    });

    const again = await fetch(`${baseUrl}/video_feed`, { signal: AbortSignal.timeout(1000) });
    expect(again.status).toBe(200);
    await again.body?.cancel();
  });

  it('exposes metrics', async () => {
    const response = await fetch(`${baseUrl}/api/metrics`);
    expect(response.status).toBe(200);
    const payload = await readJson(response);

    expect(payload.camera).toMatchObject({ initAttempts: 1, initFailures: 0 });
  });

  it('serves the status page and 404s unknown paths', async () => {
    const page = await fetch(`${baseUrl}/`);
    expect(page.status).toBe(200);
    expect(page.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await page.text()).toContain('<img src="/video_feed"');

    const missing = await fetch(`${baseUrl}/missing`);
    expect(missing.status).toBe(404);
    await expect(readJson(missing)).resolves.toEqual({ error: 'Not found' });
  });
});
