import { afterEach, describe, expect, it } from 'vitest';
import { resetAppLifecycle } from '../src/app.js';
import { startDashboard, type DashboardRuntime } from '../src/run-dashboard.js';
import { startGate, type GateRuntime } from '../src/run-gate.js';
import { startHttpServer, type HttpServerRuntime } from '../src/server/http.js';
import { MemoryTransport } from './helpers/memoryTransport.js';
import { ScriptedEngine } from './helpers/scriptedEngine.js';

function url(port: number, pathname: string) {
  return `http://127.0.0.1:${port}${pathname}`;
}

function postJson(port: number, pathname: string, body: unknown) {
  return fetch(url(port, pathname), {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
}

describe('startHttpServer', () => {
  let runtime: HttpServerRuntime | null = null;

  afterEach(async () => {
    await runtime?.close();
    runtime = null;
  });

  it('answers 404 when no router claims the request', async () => {
    runtime = await startHttpServer({ host: '127.0.0.1', port: 0, routers: [{ handle: () => false }] });

    const response = await fetch(url(runtime.port, '/nowhere'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('turns a throwing router into a 500', async () => {
    runtime = await startHttpServer({
      host: '127.0.0.1',
      port: 0,
      routers: [
        {
          handle: () => {
            throw new Error('boom');
          }
        }
      ]
    });

    const response = await fetch(url(runtime.port, '/'));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Internal server error' });
  });
});

describe('gate HTTP API', () => {
  let gate: GateRuntime | null = null;
  let transport: MemoryTransport;

  async function start() {
    transport = new MemoryTransport();
    const runtime = await startGate({ transport, engine: new ScriptedEngine(), port: 0 });
    gate = runtime;
    if (!runtime.server) {
      throw new Error('gate server did not start');
    }
    return { runtime, port: runtime.server.port };
  }

  afterEach(async () => {
    await gate?.stop('test');
    gate = null;
    resetAppLifecycle();
  });

  it('reports the gate state', async () => {
    const { port } = await start();

    const response = await fetch(url(port, '/gate-status'));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ gates: { '1': 'CLOSED' }, lastChangedAt: null });
  });

  it('applies local commands and acknowledges them over the relay', async () => {
    const { port, runtime } = await start();

    const response = await postJson(port, '/command', { action: 'OPEN_DOOR' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'applied', action: 'OPEN_DOOR', gate: 'OPEN' });
    await runtime.relay.flush();
    expect(transport.publishedJson('gates/1/status')).toEqual([
      expect.objectContaining({ status: 'OPEN', action: 'OPEN_DOOR', gateId: '1' })
    ]);
  });

  it('rejects a command without an action', async () => {
    const { port } = await start();

    const response = await postJson(port, '/command', { gate: '1' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: 'error', error: 'action is required' });
  });

  it('lists alerts newest first with a limit', async () => {
    const { port, runtime } = await start();
    await runtime.gate.applyAction('OPEN');

    const response = await fetch(url(port, '/alerts?limit=1'));
    const body = await response.json();

    expect(body).toEqual({ alerts: [expect.objectContaining({ message: 'door_opened', level: 'info' })] });
  });

  it('has no capture before the first detection', async () => {
    const { port } = await start();

    const response = await fetch(url(port, '/latest-capture'));

    expect(await response.json()).toEqual({ capture: null });
  });

  it('reports health from the registered indicators', async () => {
    const { port } = await start();

    const healthy = await fetch(url(port, '/health'));
    const body = await healthy.json();
    expect(healthy.status).toBe(200);
    expect(body).toMatchObject({
      status: 'ok',
      checks: [
        { name: 'relay', status: 'ok' },
        { name: 'detection', status: 'ok' }
      ]
    });

    transport.connected = false;
    const degraded = await fetch(url(port, '/health'));
    expect(degraded.status).toBe(503);
  });
});

describe('dashboard HTTP API', () => {
  let dashboard: DashboardRuntime | null = null;
  let transport: MemoryTransport;

  async function start() {
    transport = new MemoryTransport();
    const runtime = await startDashboard({ transport, port: 0 });
    dashboard = runtime;
    return { runtime, port: runtime.server.port };
  }

  afterEach(async () => {
    await dashboard?.stop('test');
    dashboard = null;
    resetAppLifecycle();
  });

  it('records posted detections as alerts', async () => {
    const { port } = await start();

    const response = await postJson(port, '/detection', { objects: ['dog', 'fox'], timestamp: 99, gateId: '2' });
    expect(await response.json()).toEqual({ status: 'received' });

    const alerts = await (await fetch(url(port, '/alerts'))).json();
    expect(alerts).toEqual({
      alerts: [expect.objectContaining({ message: 'Gate 2: animal detected: dog, fox', level: 'warning' })]
    });

    const status = await (await fetch(url(port, '/gate-status'))).json();
    expect(status).toMatchObject({
      gates: { '2': { online: true, lastDetection: { objects: ['dog', 'fox'], timestamp: 99 } } }
    });
  });

  it('rejects detections without a label array', async () => {
    const { port } = await start();

    const response = await postJson(port, '/detection', { objects: [1, 2] });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: 'error', error: 'objects must be an array of labels' });
  });

  it('publishes operator commands to the default gate', async () => {
    const { port } = await start();

    const response = await postJson(port, '/send_command', { command: 'OPEN_DOOR' });

    expect(await response.json()).toEqual({ status: 'sent', gate: '1' });
    expect(transport.publishedJson('gates/1/commands')).toEqual([
      expect.objectContaining({ action: 'OPEN_DOOR', gateId: '1' })
    ]);
  });

  it('answers 400 without a command and 502 when the broker is down', async () => {
    const { port } = await start();

    const missing = await postJson(port, '/send_command', { gate: '1' });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ status: 'error', error: 'command is required' });

    transport.connected = false;
    const failed = await postJson(port, '/send_command', { command: 'CLOSE_DOOR', gate: '3' });
    expect(failed.status).toBe(502);
    expect(await failed.json()).toEqual({ status: 'error', error: 'broker not connected' });
  });

  it('pages through the alert archive', async () => {
    const { port, runtime } = await start();
    runtime.ledger.addAlert('first', 'info');
    runtime.ledger.addAlert('second', 'warning');
    runtime.ledger.addAlert('third', 'critical');

    const response = await fetch(url(port, '/alerts/history?limit=2&offset=1'));
    const body = await response.json();

    expect(body).toMatchObject({ total: 3 });
    expect(body).toEqual({
      total: 3,
      alerts: [
        expect.objectContaining({ message: 'second', level: 'warning' }),
        expect.objectContaining({ message: 'first', level: 'info' })
      ]
    });
  });
});
