import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import logger, { type LogSink } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { AlertLedger } from '../alerts/ledger.js';
import { computeRestartDelay } from '../utils/backoff.js';
import { describeError } from '../utils/timeout.js';
import type { TunnelStatus } from '../types.js';

export interface TunnelProcess {
  readonly pid?: number;
  readonly stderr: NodeJS.ReadableStream | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnTunnel = (command: string, args: string[]) => TunnelProcess;

export type TunnelConfig = {
  host: string;
  user: string;
  port: number;
  keyPath: string;
  remotePort: number;
  localPort: number;
  command?: string;
  extraOptions?: string[];
};

export type TunnelTimingOptions = {
  healthyAfterMs: number;
  restartDelayMs: number;
  restartMaxDelayMs: number;
  restartJitterFactor: number;
  forceKillTimeoutMs: number;
};

export const DEFAULT_TUNNEL_TIMING: TunnelTimingOptions = {
  healthyAfterMs: 3000,
  restartDelayMs: 1000,
  restartMaxDelayMs: 60_000,
  restartJitterFactor: 0.2,
  forceKillTimeoutMs: 3000
};

export interface TunnelSupervisorOptions {
  tunnel: TunnelConfig;
  ledger: AlertLedger;
  timing?: Partial<TunnelTimingOptions>;
  spawn?: SpawnTunnel;
  random?: () => number;
  log?: LogSink;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export type TunnelExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  at: number;
};

export type TunnelStats = {
  status: TunnelStatus;
  pid: number | null;
  restarts: number;
  consecutiveFailures: number;
  lastExit: TunnelExit | null;
  lastError: string | null;
  nextRestartDelayMs: number | null;
  healthySince: number | null;
};

export type TunnelStatusChange = {
  status: TunnelStatus;
  previous: TunnelStatus;
};

const DEFAULT_SSH_OPTIONS = [
  'ExitOnForwardFailure=yes',
  'ServerAliveInterval=30',
  'ServerAliveCountMax=3',
  'StrictHostKeyChecking=accept-new'
];

export function buildTunnelCommand(tunnel: TunnelConfig): { command: string; args: string[] } {
  const options = tunnel.extraOptions ?? DEFAULT_SSH_OPTIONS;
  const args = [
    '-N',
    '-R',
    `${tunnel.remotePort}:localhost:${tunnel.localPort}`,
    '-i',
    tunnel.keyPath,
    '-p',
    String(tunnel.port),
    ...options.flatMap(option => ['-o', option]),
    `${tunnel.user}@${tunnel.host}`
  ];
  return { command: tunnel.command ?? 'ssh', args };
}

/**
 * Keeps one reverse tunnel process alive. Each unexpected exit produces a
 * single critical alert and a single restart, delayed by exponential backoff
 * that resets once the process has been HEALTHY.
 */
export class TunnelSupervisor extends EventEmitter {
  private readonly tunnel: TunnelConfig;
  private readonly ledger: AlertLedger;
  private readonly timing: TunnelTimingOptions;
  private readonly spawnFn: SpawnTunnel;
  private readonly random?: () => number;
  private readonly log: LogSink;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private currentStatus: TunnelStatus = 'STOPPED';
  private child: TunnelProcess | null = null;
  private wanted = false;
  private attempt = 0;
  private restarts = 0;
  private lastExit: TunnelExit | null = null;
  private lastError: string | null = null;
  private nextRestartDelayMs: number | null = null;
  private healthySince: number | null = null;
  private healthyTimer: NodeJS.Timeout | null = null;
  private restartTimer: NodeJS.Timeout | null = null;
  private killTimer: NodeJS.Timeout | null = null;
  private stopping: Promise<void> | null = null;
  private resolveStop: (() => void) | null = null;
  private startAfterStop = false;

  constructor(options: TunnelSupervisorOptions) {
    super();
    this.tunnel = options.tunnel;
    this.ledger = options.ledger;
    this.timing = { ...DEFAULT_TUNNEL_TIMING, ...options.timing };
    this.spawnFn =
      options.spawn ?? ((command, args) => spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] }));
    this.random = options.random;
    this.log = options.log ?? logger.child({ component: 'tunnel' });
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? Date.now;
  }

  status(): TunnelStatus {
    return this.currentStatus;
  }

  stats(): TunnelStats {
    return {
      status: this.currentStatus,
      pid: this.child?.pid ?? null,
      restarts: this.restarts,
      consecutiveFailures: this.attempt,
      lastExit: this.lastExit ? { ...this.lastExit } : null,
      lastError: this.lastError,
      nextRestartDelayMs: this.nextRestartDelayMs,
      healthySince: this.healthySince
    };
  }

  /**
   * Launches the tunnel. While a stop is still waiting for the old process to
   * exit, the launch is deferred until it has, so two processes never hold
   * the remote port at once.
   */
  start(): void {
    if (this.stopping) {
      this.startAfterStop = true;
      return;
    }
    if (this.wanted) {
      return;
    }
    this.wanted = true;
    this.attempt = 0;
    this.launch();
  }

  stop(): Promise<void> {
    this.startAfterStop = false;
    if (this.stopping) {
      return this.stopping;
    }
    this.wanted = false;
    this.clearRestartTimer();
    this.clearHealthyTimer();

    const child = this.child;
    if (!child) {
      this.setStatus('STOPPED');
      return Promise.resolve();
    }

    this.stopping = new Promise<void>(resolve => {
      this.resolveStop = resolve;
    });

    this.log.info({ pid: child.pid }, 'Stopping tunnel');
    child.kill('SIGTERM');
    this.killTimer = setTimeout(() => {
      if (this.child !== child) {
        return;
      }
      this.log.warn({ pid: child.pid }, 'Tunnel ignored SIGTERM, sending SIGKILL');
      child.kill('SIGKILL');
      this.killTimer = setTimeout(() => {
        if (this.child === child) {
          this.log.error({ pid: child.pid }, 'Tunnel did not exit after SIGKILL, abandoning it');
          this.finishStop();
        }
      }, this.timing.forceKillTimeoutMs);
    }, this.timing.forceKillTimeoutMs);

    return this.stopping;
  }

  private launch() {
    this.restartTimer = null;
    this.nextRestartDelayMs = null;
    this.setStatus('STARTING');

    const { command, args } = buildTunnelCommand(this.tunnel);
    let child: TunnelProcess;
    try {
      child = this.spawnFn(command, args);
    } catch (error) {
      this.handleFailure(null, error);
      return;
    }

    this.child = child;
    this.log.info({ pid: child.pid, remotePort: this.tunnel.remotePort, host: this.tunnel.host }, 'Tunnel process spawned');

    child.on('error', error => this.handleFailure(child, error));
    child.on('exit', (code, signal) => this.handleExit(child, code, signal));
    child.stderr?.on('data', (chunk: Buffer | string) => {
      const line = chunk.toString().trim();
      if (line) {
        this.lastError = line;
        this.log.debug({ pid: child.pid, stderr: line }, 'Tunnel stderr');
      }
    });

    this.healthyTimer = setTimeout(() => {
      this.healthyTimer = null;
      if (this.child !== child || this.currentStatus !== 'STARTING') {
        return;
      }
      this.attempt = 0;
      this.healthySince = this.now();
      this.setStatus('HEALTHY');
    }, this.timing.healthyAfterMs);
  }

  private handleFailure(child: TunnelProcess | null, error: unknown) {
    if (child !== null && this.child !== child) {
      return;
    }
    this.child = null;
    this.clearHealthyTimer();
    const reason = describeError(error);
    this.lastError = reason;
    this.log.error({ err: error }, 'Tunnel process failed to start');

    if (!this.wanted) {
      this.finishStop();
      return;
    }

    this.setStatus('FAILED');
    this.ledger.addAlert(`tunnel process failed to start (${reason})`, 'critical', { component: 'tunnel' });
    this.scheduleRestart(reason);
  }

  private handleExit(child: TunnelProcess, code: number | null, signal: NodeJS.Signals | null) {
    if (this.child !== child) {
      return;
    }
    this.child = null;
    this.healthySince = null;
    this.clearHealthyTimer();
    this.lastExit = { code, signal, at: this.now() };

    if (!this.wanted) {
      this.log.info({ code, signal }, 'Tunnel stopped');
      this.finishStop();
      return;
    }

    this.metrics.recordTunnelDeath();
    this.setStatus('STOPPED');
    this.ledger.addAlert(`tunnel process exited (code=${code}, signal=${signal})`, 'critical', {
      component: 'tunnel',
      code,
      signal
    });
    this.scheduleRestart(`exit code=${code} signal=${signal}`);
  }

  private scheduleRestart(reason: string) {
    this.clearRestartTimer();
    this.attempt += 1;
    const { delayMs } = computeRestartDelay(this.attempt, {
      restartDelayMs: this.timing.restartDelayMs,
      restartMaxDelayMs: this.timing.restartMaxDelayMs,
      restartJitterFactor: this.timing.restartJitterFactor,
      random: this.random
    });
    this.nextRestartDelayMs = delayMs;
    this.metrics.recordTunnelRestart({ attempt: this.attempt, delayMs, reason });
    this.log.warn({ attempt: this.attempt, delayMs, reason }, 'Tunnel restart scheduled');

    this.restartTimer = setTimeout(() => {
      if (!this.wanted) {
        return;
      }
      this.restarts += 1;
      this.launch();
    }, delayMs);
  }

  private finishStop() {
    this.child = null;
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
    this.setStatus('STOPPED');
    const resolve = this.resolveStop;
    this.resolveStop = null;
    this.stopping = null;
    resolve?.();
    if (this.startAfterStop) {
      this.startAfterStop = false;
      this.start();
    }
  }

  private setStatus(next: TunnelStatus) {
    const previous = this.currentStatus;
    if (previous === next) {
      return;
    }
    this.currentStatus = next;
    this.emit('status', { status: next, previous } satisfies TunnelStatusChange);
  }

  private clearHealthyTimer() {
    if (this.healthyTimer) {
      clearTimeout(this.healthyTimer);
      this.healthyTimer = null;
    }
  }

  private clearRestartTimer() {
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    this.nextRestartDelayMs = null;
  }
}

export default TunnelSupervisor;
