import http, { IncomingMessage, ServerResponse } from 'node:http';
import fs from 'node:fs';
import path from 'node:path';
import { URL } from 'node:url';
import logger from '../logger.js';
import type { StreamContext } from '../pipeline/context.js';
import type { HealthCheckProvider } from '../types.js';
import { createStreamRouter } from './routes/stream.js';

export interface HttpServerOptions {
  context: StreamContext;
  port?: number;
  host?: string;
  staticDir?: string;
  healthChecks?: HealthCheckProvider;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 8000;
  const host = options.host ?? '0.0.0.0';
  const staticDir = options.staticDir ?? path.resolve(process.cwd(), 'public');

  const streamRouter = createStreamRouter({ context: options.context, healthChecks: options.healthChecks });

  const server = http.createServer((req, res) => {
    try {
      if (streamRouter.handle(req, res)) {
        return;
      }

      if (serveStatic(req, res, staticDir)) {
        return;
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        streamRouter.close();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}

function serveStatic(req: IncomingMessage, res: ServerResponse, directory: string): boolean {
  if (!req.url) {
    return false;
  }

  if (req.method !== 'GET' && req.method !== 'HEAD') {
    return false;
  }

  const url = new URL(req.url, 'http://localhost');
  let pathname = decodeURIComponent(url.pathname);
  if (pathname === '/' || pathname === '') {
    pathname = '/index.html';
  } else if (pathname.endsWith('/')) {
    pathname = `${pathname}index.html`;
  }

  const normalized = path.normalize(pathname).replace(/^[/\\]+/, '');
  const root = path.resolve(directory);
  const candidatePath = path.resolve(root, normalized);
  const rootWithSep = root.endsWith(path.sep) ? root : `${root}${path.sep}`;
  if (candidatePath !== root && !candidatePath.startsWith(rootWithSep)) {
    return false;
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(candidatePath);
  } catch {
    return false;
  }

  let resolvedPath = candidatePath;
  if (stats.isDirectory()) {
    resolvedPath = path.join(candidatePath, 'index.html');
    try {
      stats = fs.statSync(resolvedPath);
    } catch {
      return false;
    }
  }

  if (!stats.isFile()) {
    return false;
  }

  const contentType = getContentType(resolvedPath);
  res.writeHead(200, { 'Content-Type': contentType });

  if (req.method === 'HEAD') {
    res.end();
    return true;
  }

  const stream = fs.createReadStream(resolvedPath);
  stream.on('error', error => {
    logger.error({ err: error }, 'Failed to read static asset');
    if (!res.headersSent) {
      res.statusCode = 500;
    }
    res.end('Internal Server Error');
  });

  stream.pipe(res);
  return true;
}

function getContentType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.html':
      return 'text/html; charset=utf-8';
    case '.js':
      return 'application/javascript; charset=utf-8';
    case '.css':
      return 'text/css; charset=utf-8';
    case '.json':
      return 'application/json; charset=utf-8';
    case '.png':
      return 'image/png';
    case '.jpg':
    case '.jpeg':
      return 'image/jpeg';
    case '.gif':
      return 'image/gif';
    case '.svg':
      return 'image/svg+xml';
    default:
      return 'application/octet-stream';
  }
}

export default startHttpServer;
