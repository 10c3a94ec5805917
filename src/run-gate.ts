import logger, { setLogLevel } from './logger.js';
import {
  buildHealthReport,
  registerHealthIndicator,
  registerShutdownHook,
  isMainModule,
  runShutdownHooks,
  runUntilSignal,
  type ShutdownHookResult,
  type StoppableRuntime
} from './app.js';
import { AlertLedger } from './alerts/ledger.js';
import { loadRuntimeConfig, type GatewardenConfig } from './config/index.js';
import { DetectionLoop } from './detection/loop.js';
import { createInferenceEngine, type InferenceEngine } from './detection/engines.js';
import { createActuator, type Actuator } from './gate/actuator.js';
import { GateStateMachine } from './gate/stateMachine.js';
import { RelayClient, type FetchFn } from './relay/client.js';
import { MqttTransport } from './relay/mqttTransport.js';
import type { PubSubTransport } from './relay/transport.js';
import { compileRules } from './rules/engine.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { createGateRouter } from './server/routes/gate.js';
import { evaluateTunnelHealth, formatTunnelHealthReason } from './tunnel/health.js';
import { TunnelSupervisor, type SpawnTunnel } from './tunnel/supervisor.js';

export interface GateStartOptions {
  config?: GatewardenConfig;
  transport?: PubSubTransport;
  engine?: InferenceEngine;
  actuator?: Actuator;
  spawnTunnel?: SpawnTunnel;
  fetch?: FetchFn;
  http?: boolean;
  port?: number;
}

export type GateRuntime = StoppableRuntime & {
  config: GatewardenConfig;
  ledger: AlertLedger;
  gate: GateStateMachine;
  relay: RelayClient;
  detection: DetectionLoop;
  tunnel: TunnelSupervisor | null;
  server: HttpServerRuntime | null;
};

function applyConfiguredLogLevel(level: string) {
  try {
    setLogLevel(level);
  } catch (error) {
    logger.warn({ err: error, level }, 'Failed to apply configured log level');
  }
}

export async function startGate(options: GateStartOptions = {}): Promise<GateRuntime> {
  const config = options.config ?? loadRuntimeConfig();
  applyConfiguredLogLevel(config.logging.level);
  try {
    return await launchGate(config, options);
  } catch (error) {
    logger.error({ err: error }, 'Gate runtime failed to start, running shutdown hooks');
    await runShutdownHooks({ reason: 'startup-failed' });
    throw error;
  }
}

async function launchGate(config: GatewardenConfig, options: GateStartOptions): Promise<GateRuntime> {
  const startedAt = Date.now();
  let serviceStatus: 'starting' | 'ok' | 'stopping' = 'starting';

  const gateId = config.gate.id;
  const ledger = new AlertLedger({ capacity: config.alerts.capacity });
  const gate = new GateStateMachine({
    gateId,
    actuator: options.actuator ?? createActuator(config.gate.actuator),
    ledger,
    initialState: config.gate.initialState
  });

  const transport = options.transport ?? new MqttTransport(config.relay.broker);
  registerShutdownHook('transport', () => transport.close());

  let tunnel: TunnelSupervisor | null = null;
  if (config.tunnel.enabled) {
    const supervisor = new TunnelSupervisor({
      tunnel: config.tunnel,
      timing: config.tunnel,
      ledger,
      spawn: options.spawnTunnel
    });
    tunnel = supervisor;
    registerShutdownHook('tunnel', () => supervisor.stop());
    registerHealthIndicator('tunnel', () => {
      const stats = supervisor.stats();
      const evaluation = evaluateTunnelHealth(stats);
      return {
        status: evaluation.severity === 'none' ? 'ok' : 'degraded',
        details: {
          status: stats.status,
          restarts: stats.restarts,
          reason: formatTunnelHealthReason(evaluation)
        }
      };
    });
  }

  const relay = new RelayClient({
    gateId,
    transport,
    gate,
    ledger,
    tunnel: tunnel ?? undefined,
    detectionUrl: config.relay.detectionUrl,
    timeoutMs: config.relay.timeoutMs,
    heartbeatIntervalMs: config.relay.heartbeatIntervalMs,
    fetch: options.fetch
  });
  registerShutdownHook('relay', () => relay.stop());
  relay.start().catch(error => {
    logger.warn({ err: error, gateId }, 'Command subscription failed; commands are unavailable until restart');
  });
  registerHealthIndicator('relay', () => {
    const stats = relay.stats();
    return {
      status: transport.isConnected() ? 'ok' : 'degraded',
      details: { connected: transport.isConnected(), ...stats }
    };
  });

  const detection = new DetectionLoop({
    engine: options.engine ?? createInferenceEngine(config.detection.engine),
    rules: compileRules(config.rules),
    gate,
    relay,
    ledger,
    minConfidence: config.detection.minConfidence,
    failureBackoffMs: config.detection.failureBackoffMs
  });
  detection.start();
  registerShutdownHook('detection', () => detection.stop());
  registerHealthIndicator('detection', () => ({
    status: detection.isRunning() ? 'ok' : 'degraded',
    details: { running: detection.isRunning() }
  }));

  if (tunnel && config.tunnel.autoStart) {
    tunnel.start();
  }

  let server: HttpServerRuntime | null = null;
  if (options.http !== false) {
    const runtimeServer = await startHttpServer({
      host: config.server.host,
      port: options.port ?? config.server.port,
      routers: [
        createGateRouter({
          gateId,
          ledger,
          gate,
          detection,
          relay,
          health: () => buildHealthReport({ status: serviceStatus, startedAt })
        })
      ]
    });
    server = runtimeServer;
    registerShutdownHook('http', () => runtimeServer.close());
  }

  serviceStatus = 'ok';
  ledger.addAlert(`gate ${gateId} online`, 'info', { gateId });
  logger.info({ gateId, tunnel: Boolean(tunnel), port: server?.port ?? null }, 'Gate runtime started');

  return {
    config,
    ledger,
    gate,
    relay,
    detection,
    tunnel,
    server,
    stop: async (reason: string, signal?: NodeJS.Signals): Promise<ShutdownHookResult[]> => {
      serviceStatus = 'stopping';
      logger.info({ reason, signal }, 'Gate runtime stopping');
      return runShutdownHooks({ reason, signal });
    }
  };
}

if (isMainModule(import.meta.url)) {
  runUntilSignal(() => startGate(), logger).then(
    exitCode => {
      process.exitCode = exitCode;
    },
    error => {
      logger.error({ err: error }, 'Gate runtime failed');
      process.exitCode = 1;
    }
  );
}
