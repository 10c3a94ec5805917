import logger, { setLogLevel } from './logger.js';
import {
  buildHealthReport,
  registerHealthIndicator,
  registerShutdownHook,
  isMainModule,
  runShutdownHooks,
  runUntilSignal,
  type StoppableRuntime
} from './app.js';
import { AlertLedger } from './alerts/ledger.js';
import { loadRuntimeConfig, type GatewardenConfig } from './config/index.js';
import { DashboardBridge } from './dashboard/bridge.js';
import { GateRegistry } from './dashboard/registry.js';
import { closeDatabase, storeAlert } from './db.js';
import { MqttTransport } from './relay/mqttTransport.js';
import type { PubSubTransport } from './relay/transport.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import type { Router } from './server/http.js';
import { createDashboardRouter } from './server/routes/dashboard.js';
import { sendJson } from './server/json.js';
import type { Alert } from './types.js';

export interface DashboardStartOptions {
  config?: GatewardenConfig;
  transport?: PubSubTransport;
  store?: ((alert: Alert) => void) | null;
  port?: number;
}

export type DashboardRuntime = StoppableRuntime & {
  config: GatewardenConfig;
  ledger: AlertLedger;
  registry: GateRegistry;
  bridge: DashboardBridge;
  server: HttpServerRuntime;
};

function createHealthRouter(report: () => ReturnType<typeof buildHealthReport>): Router {
  return {
    handle(req, res) {
      if (req.method !== 'GET' || !req.url || new URL(req.url, 'http://localhost').pathname !== '/health') {
        return false;
      }
      report().then(
        result => sendJson(res, result.status === 'ok' ? 200 : 503, result),
        error => {
          logger.error({ err: error }, 'Health check failed');
          sendJson(res, 500, { error: 'Internal server error' });
        }
      );
      return true;
    }
  };
}

export async function startDashboard(options: DashboardStartOptions = {}): Promise<DashboardRuntime> {
  const config = options.config ?? loadRuntimeConfig();
  try {
    setLogLevel(config.logging.level);
  } catch (error) {
    logger.warn({ err: error, level: config.logging.level }, 'Failed to apply configured log level');
  }
  try {
    return await launchDashboard(config, options);
  } catch (error) {
    logger.error({ err: error }, 'Dashboard runtime failed to start, running shutdown hooks');
    await runShutdownHooks({ reason: 'startup-failed' });
    throw error;
  }
}

async function launchDashboard(config: GatewardenConfig, options: DashboardStartOptions): Promise<DashboardRuntime> {
  const startedAt = Date.now();
  let serviceStatus: 'starting' | 'ok' | 'stopping' = 'starting';

  const store = options.store === undefined ? storeAlert : options.store ?? undefined;
  if (store === storeAlert) {
    registerShutdownHook('database', () => closeDatabase());
  }
  const ledger = new AlertLedger({ capacity: config.alerts.capacity, store });

  const transport = options.transport ?? new MqttTransport(config.dashboard.broker);
  registerShutdownHook('transport', () => transport.close());

  const registry = new GateRegistry({ timeoutMs: config.dashboard.gateTimeoutMs });
  const bridge = new DashboardBridge({
    transport,
    ledger,
    registry,
    commandTimeoutMs: config.dashboard.commandTimeoutMs
  });
  registerShutdownHook('bridge', () => bridge.stop());
  bridge.start().catch(error => {
    logger.warn({ err: error }, 'Gate topic subscription failed; gate updates are unavailable until restart');
  });
  registerHealthIndicator('broker', () => ({
    status: transport.isConnected() ? 'ok' : 'degraded',
    details: { connected: transport.isConnected() }
  }));

  const server = await startHttpServer({
    host: config.dashboard.host,
    port: options.port ?? config.dashboard.port,
    routers: [
      createDashboardRouter({ ledger, bridge, defaultGateId: config.dashboard.defaultGateId }),
      createHealthRouter(() => buildHealthReport({ status: serviceStatus, startedAt }))
    ]
  });
  registerShutdownHook('http', () => server.close());

  serviceStatus = 'ok';
  logger.info({ port: server.port }, 'Dashboard runtime started');

  return {
    config,
    ledger,
    registry,
    bridge,
    server,
    stop: async (reason, signal) => {
      serviceStatus = 'stopping';
      logger.info({ reason, signal }, 'Dashboard runtime stopping');
      return runShutdownHooks({ reason, signal });
    }
  };
}

if (isMainModule(import.meta.url)) {
  runUntilSignal(() => startDashboard(), logger).then(
    exitCode => {
      process.exitCode = exitCode;
    },
    error => {
      logger.error({ err: error }, 'Dashboard runtime failed');
      process.exitCode = 1;
    }
  );
}
