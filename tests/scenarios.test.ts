import { afterEach, describe, expect, it, vi } from 'vitest';
import { AlertLedger } from '../src/alerts/ledger.js';
import { resetAppLifecycle } from '../src/app.js';
import { loadRuntimeConfig } from '../src/config/index.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { startDashboard, type DashboardRuntime } from '../src/run-dashboard.js';
import { startGate } from '../src/run-gate.js';
import { TunnelSupervisor } from '../src/tunnel/supervisor.js';
import type { GateState } from '../src/types.js';
import { createSpawnRecorder } from './helpers/fakeProcess.js';
import { createLogStub } from './helpers/logStub.js';
import { MemoryBroker, MemoryTransport } from './helpers/memoryTransport.js';
import { ScriptedEngine } from './helpers/scriptedEngine.js';

describe('gate and dashboard over a shared broker', () => {
  let dashboard: DashboardRuntime | null = null;
  let gateTransport: MemoryTransport | null = null;

  async function startBoth(initialState: GateState = 'CLOSED') {
    const baseConfig = loadRuntimeConfig();
    const config = { ...baseConfig, gate: { ...baseConfig.gate, initialState } };
    const broker = new MemoryBroker();
    const engine = new ScriptedEngine();
    const transport = new MemoryTransport(broker);
    gateTransport = transport;
    const gateRuntime = await startGate({ config, transport, engine, http: false });
    const dashboardRuntime = await startDashboard({ config, transport: new MemoryTransport(broker), store: null, port: 0 });
    dashboard = dashboardRuntime;
    await gateRuntime.relay.start();
    await dashboardRuntime.bridge.start();
    return { gate: gateRuntime, dashboard: dashboardRuntime, engine };
  }

  afterEach(async () => {
    // Both runtimes share the process-wide hook registry; one run stops everything.
    await dashboard?.stop('test');
    await gateTransport?.close();
    dashboard = null;
    gateTransport = null;
    resetAppLifecycle();
  });

  it('opens the gate when a dog is detected', async () => {
    const { gate, dashboard, engine } = await startBoth();

    engine.push([{ label: 'dog', confidence: 0.92 }]);

    await vi.waitFor(() => expect(gate.gate.state()).toBe('OPEN'));
    expect(gate.ledger.listAlerts().map(alert => [alert.level, alert.message])).toEqual([
      ['info', 'door_opened'],
      ['info', 'gate 1 online']
    ]);

    await vi.waitFor(() => expect(dashboard.registry.get('1')?.state).toBe('OPEN'));
    await vi.waitFor(() =>
      expect(dashboard.ledger.listAlerts().map(alert => alert.message)).toEqual(
        expect.arrayContaining(['Gate 1: animal detected: dog', 'Gate 1 status: OPEN'])
      )
    );
  });

  it('closes the gate when a dog and a cat are seen together', async () => {
    const { gate, engine } = await startBoth('OPEN');

    engine.push([{ label: 'dog' }, { label: 'cat' }]);

    await vi.waitFor(() => expect(gate.gate.state()).toBe('CLOSED'));
    expect(gate.ledger.listAlerts().map(alert => [alert.level, alert.message])).toEqual([
      ['info', 'door_closed'],
      ['info', 'gate 1 online']
    ]);
  });

  it('opens the gate on an operator command without consulting the rules', async () => {
    const { gate, dashboard } = await startBoth();

    await dashboard.bridge.sendCommand('1', 'OPEN_DOOR');

    await vi.waitFor(() => expect(gate.gate.state()).toBe('OPEN'));
    expect(gate.detection.latest()).toBeNull();
    await vi.waitFor(() => expect(dashboard.registry.get('1')?.state).toBe('OPEN'));
  });
});

describe('tunnel recovery', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('goes HEALTHY, STOPPED on death, then STARTING with one critical alert', async () => {
    vi.useFakeTimers();
    const recorder = createSpawnRecorder();
    const ledger = new AlertLedger({ log: createLogStub(), metrics: new MetricsRegistry() });
    const supervisor = new TunnelSupervisor({
      tunnel: {
        host: 'relay.example.test',
        user: 'gate',
        port: 22,
        keyPath: 'keys/test_key',
        remotePort: 2222,
        localPort: 8080
      },
      ledger,
      timing: { restartJitterFactor: 0 },
      spawn: recorder.spawn,
      log: createLogStub(),
      metrics: new MetricsRegistry()
    });

    supervisor.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(supervisor.status()).toBe('HEALTHY');

    recorder.processes[0].exit(255, null);
    expect(supervisor.status()).toBe('STOPPED');

    await vi.advanceTimersByTimeAsync(1000);
    expect(supervisor.status()).toBe('STARTING');
    expect(ledger.listAlerts().filter(alert => alert.level === 'critical')).toHaveLength(1);

    await supervisor.stop();
  });
});
