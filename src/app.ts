import { fileURLToPath } from 'node:url';
import logger, { setLogLevel } from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import configManager, { type ConfigReloadEvent, type RelayConfig } from './config/index.js';
import { toError } from './errors.js';
import { createStreamContext, type StreamContext, type StreamContextOverrides } from './pipeline/context.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import type { HealthCheckResult, HealthStatus } from './types.js';

export type HealthIndicatorContext = {
  service: {
    status: string;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context: HealthIndicatorContext): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];
  const metricsSnapshot = context.metrics ?? metrics.snapshot();
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsSnapshot.createdAt
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: {
          error: toError(error).message
        }
      });
    }
  }
  return results;
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({ name: entry.name, status: 'error', error: toError(error) });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

export type BootstrapOptions = {
  config?: RelayConfig;
  overrides?: StreamContextOverrides;
  port?: number;
  host?: string;
  watchConfig?: boolean;
};

export type AppRuntime = {
  context: StreamContext;
  http: HttpServerRuntime;
  shutdown: (reason: string, signal?: NodeJS.Signals) => Promise<void>;
};

export async function bootstrap(options: BootstrapOptions = {}): Promise<AppRuntime> {
  const relayConfig = options.config ?? configManager.getConfig();
  logger.info({ device: relayConfig.camera.device }, 'Camera relay starting');

  const context = createStreamContext(relayConfig, options.overrides);
  let serviceStatus: HealthStatus = 'starting';

  // Startup is the one place where a camera that cannot be opened is fatal.
  await context.frameSource.initialize();

  context.captureLoop.start();
  context.adaptive.start();
  context.health.start();

  registerShutdownHook('pipeline', async () => {
    context.health.stop();
    context.adaptive.stop();
    await context.captureLoop.stop();
    await context.frameSource.stop();
  });

  const http = await startHttpServer({
    context,
    port: options.port ?? relayConfig.server.port,
    host: options.host ?? relayConfig.server.host,
    staticDir: relayConfig.server.staticDir,
    healthChecks: () =>
      collectHealthChecks({
        service: { status: serviceStatus, startedAt: context.startedAt },
        metrics: context.metrics.snapshot()
      })
  });
  registerShutdownHook('http', () => http.close());

  registerHealthIndicator('camera', () => ({
    status: context.frameSource.status() === 'running' ? 'ok' : 'degraded',
    details: {
      cameraStatus: context.frameSource.status(),
      captureState: context.captureLoop.state(),
      severity: context.health.status().severity
    }
  }));
  registerHealthIndicator('stream', () => ({
    status: 'ok',
    details: {
      activeClients: context.hub.activeClients,
      maxClients: context.hub.maxClients,
      fps: context.fps.stats().current
    }
  }));

  if (options.watchConfig) {
    const onReload = ({ next }: ConfigReloadEvent) => {
      try {
        setLogLevel(next.logging.level);
      } catch (error) {
        logger.warn({ err: toError(error) }, 'Ignoring invalid log level from reloaded configuration');
      }
    };
    const onError = (error: Error) => {
      logger.error({ err: error }, 'Configuration reload failed, previous file restored');
    };
    configManager.on('reload', onReload);
    configManager.on('error', onError);
    const stopWatching = configManager.watch();
    registerShutdownHook('config-watch', () => {
      stopWatching();
      configManager.off('reload', onReload);
      configManager.off('error', onError);
    });
  }

  let shuttingDown: Promise<void> | null = null;
  const shutdown = (reason: string, signal?: NodeJS.Signals) => {
    if (!shuttingDown) {
      shuttingDown = (async () => {
        serviceStatus = 'stopping';
        logger.info({ reason, signal }, 'Camera relay stopping');
        const results = await runShutdownHooks({ reason, signal });
        for (const result of results) {
          if (result.status === 'error') {
            logger.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
          }
        }
        resetAppLifecycle();
      })();
    }
    return shuttingDown;
  };

  serviceStatus = 'ok';
  logger.info({ port: http.port }, 'Camera relay ready');
  return { context, http, shutdown };
}

function registerSignalHandlers(runtime: AppRuntime) {
  const handleSignal = (signal: NodeJS.Signals) => {
    runtime
      .shutdown('signal', signal)
      .catch(error => {
        logger.error({ err: toError(error) }, 'Shutdown failed');
        process.exitCode = 1;
      });
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap({ watchConfig: true })
    .then(registerSignalHandlers)
    .catch(error => {
      logger.fatal({ err: toError(error) }, 'Camera relay failed to start');
      process.exit(1);
    });
}
