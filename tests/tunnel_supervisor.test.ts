import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AlertLedger } from '../src/alerts/ledger.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { evaluateTunnelHealth, formatTunnelHealthReason } from '../src/tunnel/health.js';
import { TunnelSupervisor, buildTunnelCommand, type TunnelConfig } from '../src/tunnel/supervisor.js';
import type { TunnelStatus } from '../src/types.js';
import { computeRestartDelay } from '../src/utils/backoff.js';
import { createSpawnRecorder } from './helpers/fakeProcess.js';
import { createLogStub } from './helpers/logStub.js';

const tunnelConfig: TunnelConfig = {
  host: 'relay.example.test',
  user: 'gate',
  port: 2222,
  keyPath: '/etc/gatewarden/id_test',
  remotePort: 9001,
  localPort: 8080
};

function createSupervisor(spawn = createSpawnRecorder().spawn) {
  const metrics = new MetricsRegistry();
  const ledger = new AlertLedger({ log: createLogStub(), metrics });
  const supervisor = new TunnelSupervisor({
    tunnel: tunnelConfig,
    ledger,
    timing: { restartJitterFactor: 0, restartDelayMs: 1000 },
    spawn,
    log: createLogStub(),
    metrics
  });
  return { supervisor, ledger, metrics };
}

describe('buildTunnelCommand', () => {
  it('builds a reverse forward with keepalive options', () => {
    expect(buildTunnelCommand(tunnelConfig)).toEqual({
      command: 'ssh',
      args: [
        '-N',
        '-R',
        '9001:localhost:8080',
        '-i',
        '/etc/gatewarden/id_test',
        '-p',
        '2222',
        '-o',
        'ExitOnForwardFailure=yes',
        '-o',
        'ServerAliveInterval=30',
        '-o',
        'ServerAliveCountMax=3',
        '-o',
        'StrictHostKeyChecking=accept-new',
        'gate@relay.example.test'
      ]
    });
  });

  it('honours a custom command and option list', () => {
    const { command, args } = buildTunnelCommand({ ...tunnelConfig, command: 'autossh', extraOptions: [] });
    expect(command).toBe('autossh');
    expect(args.at(-1)).toBe('gate@relay.example.test');
    expect(args).not.toContain('-o');
  });
});

describe('TunnelSupervisor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('restarts exactly once after an unexpected exit', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor, ledger, metrics } = createSupervisor(recorder.spawn);

    supervisor.start();
    expect(supervisor.status()).toBe('STARTING');

    await vi.advanceTimersByTimeAsync(3000);
    expect(supervisor.status()).toBe('HEALTHY');

    recorder.processes[0].exit(1, null);
    expect(supervisor.status()).toBe('STOPPED');
    const critical = ledger.listAlerts().filter(alert => alert.level === 'critical');
    expect(critical.map(alert => alert.message)).toEqual(['tunnel process exited (code=1, signal=null)']);

    await vi.advanceTimersByTimeAsync(1000);
    expect(recorder.calls).toHaveLength(2);
    expect(supervisor.status()).toBe('STARTING');
    expect(supervisor.stats().restarts).toBe(1);
    expect(metrics.snapshot().tunnel).toMatchObject({ deaths: 1, restarts: 1 });

    await vi.advanceTimersByTimeAsync(10_000);
    expect(recorder.calls).toHaveLength(2);
  });

  it('emits status transitions', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor } = createSupervisor(recorder.spawn);
    const seen: TunnelStatus[] = [];
    supervisor.on('status', (change: { status: TunnelStatus }) => seen.push(change.status));

    supervisor.start();
    await vi.advanceTimersByTimeAsync(3000);
    await supervisor.stop();

    expect(seen).toEqual(['STARTING', 'HEALTHY', 'STOPPED']);
  });

  it('ignores start while already running', () => {
    const recorder = createSpawnRecorder();
    const { supervisor } = createSupervisor(recorder.spawn);

    supervisor.start();
    supervisor.start();

    expect(recorder.calls).toHaveLength(1);
    expect(recorder.calls[0].command).toBe('ssh');
  });

  it('doubles the restart delay while the tunnel keeps dying', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor } = createSupervisor(recorder.spawn);

    supervisor.start();
    recorder.processes[0].exit(255, null);
    expect(supervisor.stats().nextRestartDelayMs).toBe(1000);

    await vi.advanceTimersByTimeAsync(1000);
    recorder.processes[1].exit(255, null);
    expect(supervisor.stats()).toMatchObject({ consecutiveFailures: 2, nextRestartDelayMs: 2000 });

    await vi.advanceTimersByTimeAsync(1999);
    expect(recorder.calls).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(recorder.calls).toHaveLength(3);
  });

  it('resets the backoff once the tunnel has been healthy', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor } = createSupervisor(recorder.spawn);

    supervisor.start();
    recorder.processes[0].exit(255, null);
    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(3000);
    expect(supervisor.stats().consecutiveFailures).toBe(0);

    recorder.processes[1].exit(255, null);
    expect(supervisor.stats().nextRestartDelayMs).toBe(1000);
  });

  it('marks the tunnel FAILED when the process cannot be spawned', async () => {
    const spawn = vi.fn(() => {
      throw new Error('spawn ssh ENOENT');
    });
    const { supervisor, ledger } = createSupervisor(spawn);

    supervisor.start();

    expect(supervisor.status()).toBe('FAILED');
    expect(ledger.listAlerts()[0]).toMatchObject({
      message: 'tunnel process failed to start (spawn ssh ENOENT)',
      level: 'critical'
    });

    await vi.advanceTimersByTimeAsync(1000);
    expect(spawn).toHaveBeenCalledTimes(2);
    await supervisor.stop();
    expect(supervisor.status()).toBe('STOPPED');
  });

  it('treats a process error event as a failed start', () => {
    const recorder = createSpawnRecorder();
    const { supervisor, ledger } = createSupervisor(recorder.spawn);

    supervisor.start();
    recorder.processes[0].emit('error', new Error('EACCES'));

    expect(supervisor.status()).toBe('FAILED');
    expect(ledger.listAlerts()[0].message).toBe('tunnel process failed to start (EACCES)');
  });

  it('stops with SIGTERM and raises no alert', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor, ledger } = createSupervisor(recorder.spawn);

    supervisor.start();
    await supervisor.stop();

    expect(recorder.processes[0].signals).toEqual(['SIGTERM']);
    expect(supervisor.status()).toBe('STOPPED');
    expect(ledger.size()).toBe(0);

    await vi.advanceTimersByTimeAsync(5000);
    expect(recorder.calls).toHaveLength(1);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor } = createSupervisor(recorder.spawn);

    supervisor.start();
    recorder.processes[0].exitOnSignal = null;
    const stopped = supervisor.stop();

    await vi.advanceTimersByTimeAsync(3000);
    await stopped;

    expect(recorder.processes[0].signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(supervisor.status()).toBe('STOPPED');
  });

  it('waits for the old process to exit before starting again', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor, ledger } = createSupervisor(recorder.spawn);

    supervisor.start();
    recorder.processes[0].exitOnSignal = null;
    const stopped = supervisor.stop();
    supervisor.start();
    expect(recorder.calls).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(3000);
    await stopped;

    expect(recorder.processes[0].signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(recorder.calls).toHaveLength(2);
    expect(supervisor.status()).toBe('STARTING');
    expect(ledger.size()).toBe(0);

    await vi.advanceTimersByTimeAsync(3000);
    expect(supervisor.status()).toBe('HEALTHY');
    expect(supervisor.stats().pid).toBe(4243);
  });

  it('drops a deferred start when stop is called again', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor } = createSupervisor(recorder.spawn);

    supervisor.start();
    recorder.processes[0].exitOnSignal = null;
    const first = supervisor.stop();
    supervisor.start();
    const second = supervisor.stop();
    expect(second).toBe(first);

    await vi.advanceTimersByTimeAsync(3000);
    await second;

    expect(recorder.calls).toHaveLength(1);
    expect(supervisor.status()).toBe('STOPPED');
  });

  it('cancels a pending restart on stop', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor } = createSupervisor(recorder.spawn);

    supervisor.start();
    recorder.processes[0].exit(1, null);
    await supervisor.stop();
    await vi.advanceTimersByTimeAsync(10_000);

    expect(recorder.calls).toHaveLength(1);
    expect(supervisor.status()).toBe('STOPPED');
  });

  it('captures the last stderr line', async () => {
    const recorder = createSpawnRecorder();
    const { supervisor } = createSupervisor(recorder.spawn);

    supervisor.start();
    recorder.processes[0].stderr.write('Permission denied (publickey).\n');

    await vi.waitFor(() => expect(supervisor.stats().lastError).toBe('Permission denied (publickey).'));
  });
});

describe('computeRestartDelay', () => {
  const options = { restartDelayMs: 1000, restartMaxDelayMs: 60_000, restartJitterFactor: 0.2 };

  it('grows exponentially and clamps to the maximum', () => {
    const centered = () => 0.5;
    expect(computeRestartDelay(1, { ...options, random: centered }).delayMs).toBe(1000);
    expect(computeRestartDelay(3, { ...options, random: centered }).delayMs).toBe(4000);
    expect(computeRestartDelay(10, { ...options, random: centered }).delayMs).toBe(60_000);
  });

  it('applies jitter within the bounds', () => {
    expect(computeRestartDelay(1, { ...options, random: () => 1 }).delayMs).toBe(1200);
    expect(computeRestartDelay(1, { ...options, random: () => 0 }).delayMs).toBe(1000);
    expect(computeRestartDelay(2, { ...options, random: () => 0 })).toEqual({
      delayMs: 1600,
      meta: { minDelayMs: 1000, maxDelayMs: 60_000, baseDelayMs: 2000, appliedJitterMs: -400 }
    });
  });
});

describe('evaluateTunnelHealth', () => {
  it('reports nothing for a steady tunnel', () => {
    const evaluation = evaluateTunnelHealth({ consecutiveFailures: 0, nextRestartDelayMs: null });
    expect(evaluation.severity).toBe('none');
    expect(formatTunnelHealthReason(evaluation)).toBeNull();
  });

  it('warns on repeated failures and escalates to critical', () => {
    const warning = evaluateTunnelHealth({ consecutiveFailures: 3, nextRestartDelayMs: 4000 });
    expect(warning).toEqual({ severity: 'warning', triggeredBy: 'consecutive-failures', threshold: 3, actual: 3 });
    expect(formatTunnelHealthReason(warning)).toBe('tunnel failures 3 >= 3');

    const critical = evaluateTunnelHealth({ consecutiveFailures: 1, nextRestartDelayMs: 60_000 });
    expect(critical.severity).toBe('critical');
    expect(formatTunnelHealthReason(critical)).toBe('tunnel restart delay 60000ms >= 60000ms');
  });
});
