import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { afterEach, describe, expect, it } from 'vitest';
import { evaluateStatus, runHealthcheck } from '../scripts/healthcheck.js';

function createIo() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    streams: {
      stdout: {
        write(chunk: string | Uint8Array) {
          stdout.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
          return true;
        }
      },
      stderr: {
        write(chunk: string | Uint8Array) {
          stderr.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
          return true;
        }
      }
    },
    stdout,
    stderr
  };
}

let server: http.Server | null = null;

async function serveStatus(status: number, payload: unknown): Promise<string> {
  server = http.createServer((_req, res) => {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(payload));
  });
  await new Promise<void>(resolve => server?.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return `http://127.0.0.1:${(address satisfies AddressInfo).port}/status`;
}

describe('HealthcheckCli', () => {
  afterEach(async () => {
    const current = server;
    server = null;
    if (current) {
      await new Promise<void>(resolve => current.close(() => resolve()));
    }
  });

  it('exits 0 while the camera is running', async () => {
    const url = await serveStatus(200, {
      camera_status: 'running',
      active_clients: 2,
      health: { severity: 'warning' },
      checks: [{ name: 'camera', status: 'ok' }]
    });
    const io = createIo();

    await expect(runHealthcheck(['--url', url], io.streams)).resolves.toBe(0);
    expect(io.stdout.join('')).toBe(
      `${JSON.stringify({
        healthy: true,
        status: 200,
        cameraStatus: 'running',
        severity: 'warning',
        activeClients: 2,
        degradedChecks: []
      })}\n`
    );
    expect(io.stderr).toHaveLength(0);
  });

  it('exits 1 when resets have become critical', async () => {
    const url = await serveStatus(200, {
      camera_status: 'resetting',
      active_clients: 0,
      health: { severity: 'critical' }
    });
    const io = createIo();

    await expect(runHealthcheck(['-u', url, '--pretty'], io.streams)).resolves.toBe(1);
    expect(io.stdout.join('')).toContain('"severity": "critical"');
  });

  it('exits 1 when a registered health check is degraded', async () => {
    const url = await serveStatus(200, {
      camera_status: 'running',
      active_clients: 0,
      health: { severity: 'none' },
      checks: [
        { name: 'camera', status: 'ok' },
        { name: 'stream', status: 'degraded', details: { error: 'hub closed' } }
      ]
    });
    const io = createIo();

    await expect(runHealthcheck(['--url', url], io.streams)).resolves.toBe(1);
    expect(JSON.parse(io.stdout.join(''))).toMatchObject({ healthy: false, degradedChecks: ['stream'] });
  });

  it('exits 1 when the server cannot be reached', async () => {
    const io = createIo();
    const refusing: typeof fetch = async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:8000');
    };

    await expect(runHealthcheck([], io.streams, refusing)).resolves.toBe(1);
    expect(JSON.parse(io.stdout.join(''))).toMatchObject({
      healthy: false,
      status: null,
      error: 'connect ECONNREFUSED 127.0.0.1:8000'
    });
  });

  it('rejects unknown options and prints usage', async () => {
    const io = createIo();

    await expect(runHealthcheck(['--verbose', '--timeout', 'soon'], io.streams)).resolves.toBe(1);
    expect(io.stderr).toEqual(['Unknown option: --verbose\n', 'Invalid value for --timeout\n']);
    expect(io.stdout.join('')).toContain('Camera relay healthcheck');
  });

  it('prints usage on --help', async () => {
    const io = createIo();

    await expect(runHealthcheck(['--help'], io.streams)).resolves.toBe(0);
    expect(io.stdout.join('')).toContain('Usage:');
  });

  it('treats a non-object payload as unhealthy', () => {
    expect(evaluateStatus(200, ['running'])).toMatchObject({
      healthy: false,
      error: 'Status payload is not a JSON object'
    });
  });
});
