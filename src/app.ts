import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { LogSink } from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { describeError } from './utils/timeout.js';

export type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

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

export type HealthCheckResult = {
  name: string;
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthReport = {
  status: 'ok' | 'degraded';
  service: HealthIndicatorContext['service'];
  checks: HealthCheckResult[];
  metrics: MetricsSnapshot;
};

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

export type ShutdownHookResult = {
  name: string;
  status: 'ok' | 'error';
  error?: Error;
};

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
        details: { error: describeError(error) }
      });
    }
  }
  return results;
}

/**
 * Runs every indicator against one metrics snapshot. The report is `ok` only
 * when the service and every check are `ok`.
 */
export async function buildHealthReport(service: HealthIndicatorContext['service']): Promise<HealthReport> {
  const snapshot = metrics.snapshot();
  const checks = await collectHealthChecks({ service, metrics: snapshot });
  const healthy = service.status === 'ok' && checks.every(check => check.status === 'ok');
  return {
    status: healthy ? 'ok' : 'degraded',
    service,
    checks,
    metrics: snapshot
  };
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

export async function runShutdownHooks(context: ShutdownHookContext): Promise<ShutdownHookResult[]> {
  const results: ShutdownHookResult[] = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'error',
        error: error instanceof Error ? error : new Error(String(error))
      });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

export interface StoppableRuntime {
  stop(reason: string, signal?: NodeJS.Signals): Promise<ShutdownHookResult[]>;
}

/**
 * Starts a runtime and keeps it running until SIGINT or SIGTERM, then runs
 * its shutdown hooks. Resolves with the process exit code.
 */
export async function runUntilSignal(
  start: () => Promise<StoppableRuntime>,
  log: LogSink
): Promise<number> {
  const runtime = await start();
  const signal = await new Promise<NodeJS.Signals>(resolve => {
    const onSignal = (received: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(received);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });

  log.info(`Received ${signal}, shutting down`);
  const results = await runtime.stop('signal', signal);
  let exitCode = 0;
  for (const result of results) {
    if (result.status === 'error') {
      exitCode = 1;
      log.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
    }
  }
  return exitCode;
}

/** True when `moduleUrl` is the script node was started with. */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return fileURLToPath(moduleUrl) === fs.realpathSync(entry);
  } catch {
    return false;
  }
}
