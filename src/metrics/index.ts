import pino from 'pino';
import type { AlertLevel } from '../types.js';

export type RelayDeliveryKind = 'detection' | 'status' | 'command-ack' | 'heartbeat';

export type RelayDeliveryOutcome = 'delivered' | 'timeout' | 'failed';

export type ActuationOutcome = 'actuated' | 'noop' | 'failed';

export type DetectionCycleStatus = 'actuated' | 'evaluated' | 'no-match' | 'empty' | 'inference-failed';

type LastError = {
  message: string;
  at: number;
};

type TunnelRestartRecord = {
  at: number;
  attempt: number;
  delayMs: number;
  reason: string;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: Record<string, number>;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  alerts: {
    total: number;
    byLevel: Record<AlertLevel, number>;
    storeFailures: number;
  };
  actuations: Record<string, Record<ActuationOutcome, number>>;
  relay: Record<RelayDeliveryKind, Record<RelayDeliveryOutcome, number>> & {
    lastFailure: (LastError & { kind: RelayDeliveryKind }) | null;
  };
  tunnel: {
    restarts: number;
    deaths: number;
    lastRestart: TunnelRestartRecord | null;
  };
  detection: {
    cycles: Record<DetectionCycleStatus, number>;
    lastCycleAt: string | null;
  };
};

function createDeliveryCounters(): Record<RelayDeliveryOutcome, number> {
  return { delivered: 0, timeout: 0, failed: 0 };
}

function createRelayCounters(): Record<RelayDeliveryKind, Record<RelayDeliveryOutcome, number>> {
  return {
    detection: createDeliveryCounters(),
    status: createDeliveryCounters(),
    'command-ack': createDeliveryCounters(),
    heartbeat: createDeliveryCounters()
  };
}

function createActuationCounters(): Record<ActuationOutcome, number> {
  return { actuated: 0, noop: 0, failed: 0 };
}

function createCycleCounters(): Record<DetectionCycleStatus, number> {
  return { actuated: 0, evaluated: 0, 'no-match': 0, empty: 0, 'inference-failed': 0 };
}

function copyRelayCounters(source: Record<RelayDeliveryKind, Record<RelayDeliveryOutcome, number>>) {
  return {
    detection: { ...source.detection },
    status: { ...source.status },
    'command-ack': { ...source['command-ack'] },
    heartbeat: { ...source.heartbeat }
  };
}

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private alertTotal = 0;
  private alertsByLevel: Record<AlertLevel, number> = { info: 0, warning: 0, critical: 0 };
  private alertStoreFailures = 0;
  private readonly actuations = new Map<string, Record<ActuationOutcome, number>>();
  private relayDeliveries = createRelayCounters();
  private lastRelayFailure: (LastError & { kind: RelayDeliveryKind }) | null = null;
  private tunnelRestarts = 0;
  private tunnelDeaths = 0;
  private lastTunnelRestart: TunnelRestartRecord | null = null;
  private detectionCycles = createCycleCounters();
  private lastCycleAt: number | null = null;
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevelCounters.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.alertTotal = 0;
    this.alertsByLevel = { info: 0, warning: 0, critical: 0 };
    this.alertStoreFailures = 0;
    this.actuations.clear();
    this.relayDeliveries = createRelayCounters();
    this.lastRelayFailure = null;
    this.tunnelRestarts = 0;
    this.tunnelDeaths = 0;
    this.lastTunnelRestart = null;
    this.detectionCycles = createCycleCounters();
    this.lastCycleAt = null;
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    const levelValue = pino.levels.values[normalized];
    const errorValue = pino.levels.values.error;
    if (typeof levelValue === 'number' && typeof errorValue === 'number' && levelValue >= errorValue) {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string) {
    this.currentLogLevel = level.toLowerCase();
  }

  recordAlert(level: AlertLevel) {
    this.alertTotal += 1;
    this.alertsByLevel[level] += 1;
  }

  recordAlertStoreFailure() {
    this.alertStoreFailures += 1;
  }

  recordActuation(action: string, outcome: ActuationOutcome) {
    const counters = this.actuations.get(action) ?? createActuationCounters();
    counters[outcome] += 1;
    this.actuations.set(action, counters);
  }

  recordRelayDelivery(kind: RelayDeliveryKind, outcome: RelayDeliveryOutcome, error?: unknown) {
    this.relayDeliveries[kind][outcome] += 1;
    if (outcome !== 'delivered') {
      this.lastRelayFailure = {
        kind,
        message: error instanceof Error ? error.message : String(error ?? outcome),
        at: Date.now()
      };
    }
  }

  recordTunnelDeath() {
    this.tunnelDeaths += 1;
  }

  recordTunnelRestart(record: Omit<TunnelRestartRecord, 'at'>) {
    this.tunnelRestarts += 1;
    this.lastTunnelRestart = { ...record, at: Date.now() };
  }

  recordDetectionCycle(status: DetectionCycleStatus) {
    this.detectionCycles[status] += 1;
    this.lastCycleAt = Date.now();
  }

  exportLogLevelMetrics() {
    return {
      byLevel: Object.fromEntries(this.logLevelCounters),
      currentLevel: this.currentLogLevel,
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      alerts: {
        total: this.alertTotal,
        byLevel: { ...this.alertsByLevel },
        storeFailures: this.alertStoreFailures
      },
      actuations: Object.fromEntries(
        Array.from(this.actuations.entries()).map(([action, counters]) => [action, { ...counters }])
      ),
      relay: {
        ...copyRelayCounters(this.relayDeliveries),
        lastFailure: this.lastRelayFailure ? { ...this.lastRelayFailure } : null
      },
      tunnel: {
        restarts: this.tunnelRestarts,
        deaths: this.tunnelDeaths,
        lastRestart: this.lastTunnelRestart ? { ...this.lastTunnelRestart } : null
      },
      detection: {
        cycles: { ...this.detectionCycles },
        lastCycleAt: this.lastCycleAt ? new Date(this.lastCycleAt).toISOString() : null
      }
    };
  }
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
