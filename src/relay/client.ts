import logger, { type LogSink } from '../logger.js';
import metrics, { type MetricsRegistry, type RelayDeliveryKind } from '../metrics/index.js';
import type { AlertLedger } from '../alerts/ledger.js';
import type { ApplyActionResult } from '../gate/stateMachine.js';
import { Mutex } from '../utils/mutex.js';
import { RelayTimeoutError, describeError, withTimeout } from '../utils/timeout.js';
import type { Command, CommandAction, DetectionSet, GateState, TunnelStatus } from '../types.js';
import { gateTopic } from './topics.js';
import type { PubSubTransport, Unsubscribe } from './transport.js';

export const DEFAULT_RELAY_TIMEOUT_MS = 2000;
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 10_000;

export interface GateControl {
  applyAction(action: string): Promise<ApplyActionResult>;
  state(): GateState;
}

export interface StreamControl {
  start(): void;
  stop(): Promise<void>;
  status(): TunnelStatus;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface RelayClientOptions {
  gateId: string;
  transport: PubSubTransport;
  gate: GateControl;
  ledger: AlertLedger;
  tunnel?: StreamControl;
  detectionUrl?: string | null;
  timeoutMs?: number;
  heartbeatIntervalMs?: number;
  fetch?: FetchFn;
  log?: LogSink;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export type RelayFailure = {
  kind: RelayDeliveryKind;
  message: string;
  at: number;
};

export type RelayStats = {
  delivered: number;
  failed: number;
  timedOut: number;
  inFlight: number;
  commandsReceived: number;
  lastFailure: RelayFailure | null;
};

export class RelayClient {
  readonly gateId: string;
  private readonly transport: PubSubTransport;
  private readonly gate: GateControl;
  private readonly ledger: AlertLedger;
  private readonly tunnel?: StreamControl;
  private readonly detectionUrl: string | null;
  private readonly timeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly fetchFn: FetchFn;
  private readonly log: LogSink;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly commandQueue = new Mutex();
  private readonly inFlight = new Set<Promise<void>>();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private unsubscribe: Unsubscribe | null = null;
  private subscribing: Promise<void> | null = null;
  private generation = 0;
  private counters = { delivered: 0, failed: 0, timedOut: 0, commandsReceived: 0 };
  private lastFailure: RelayFailure | null = null;

  constructor(options: RelayClientOptions) {
    this.gateId = options.gateId;
    this.transport = options.transport;
    this.gate = options.gate;
    this.ledger = options.ledger;
    this.tunnel = options.tunnel;
    this.detectionUrl = options.detectionUrl ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RELAY_TIMEOUT_MS;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.log = options.log ?? logger.child({ component: 'relay', gateId: options.gateId });
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? Date.now;
  }

  /**
   * Starts heartbeats at once and subscribes to the command topic in the
   * background. The returned promise settles with the subscription; callers
   * on the control path must not wait for it, since an offline broker holds
   * the subscribe until it reconnects.
   */
  start(): Promise<void> {
    if (this.subscribing) {
      return this.subscribing;
    }
    this.generation += 1;
    if (this.heartbeatIntervalMs > 0 && !this.heartbeatTimer) {
      this.heartbeatTimer = setInterval(() => this.sendHeartbeat(), this.heartbeatIntervalMs);
      this.heartbeatTimer.unref?.();
    }
    this.log.info({ heartbeatIntervalMs: this.heartbeatIntervalMs }, 'Relay client started');
    const subscribing = this.subscribeToCommands(this.generation).catch((error: unknown) => {
      if (this.subscribing === subscribing) {
        this.subscribing = null;
      }
      throw error;
    });
    this.subscribing = subscribing;
    return subscribing;
  }

  async stop() {
    this.generation += 1;
    this.subscribing = null;
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    const unsubscribe = this.unsubscribe;
    this.unsubscribe = null;
    if (unsubscribe) {
      await this.safeUnsubscribe(unsubscribe);
    }
    await this.flush();
  }

  private async subscribeToCommands(generation: number) {
    const unsubscribe = await this.transport.subscribe(gateTopic(this.gateId, 'commands'), (_topic, payload) => {
      const command = this.parseCommand(payload);
      if (command) {
        void this.receiveCommand(command);
      }
    });
    if (generation !== this.generation) {
      await this.safeUnsubscribe(unsubscribe);
      return;
    }
    this.unsubscribe = unsubscribe;
    this.log.info({ topic: gateTopic(this.gateId, 'commands') }, 'Subscribed to command topic');
  }

  private async safeUnsubscribe(unsubscribe: Unsubscribe) {
    try {
      await unsubscribe();
    } catch (error) {
      this.log.warn({ err: error }, 'Failed to unsubscribe from command topic');
    }
  }

  /** Waits for every outstanding delivery; each is bounded by the relay timeout. */
  async flush() {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  stats(): RelayStats {
    return {
      ...this.counters,
      inFlight: this.inFlight.size,
      lastFailure: this.lastFailure ? { ...this.lastFailure } : null
    };
  }

  reportDetection(detectionSet: DetectionSet): void {
    const objects = Array.from(detectionSet.labels);
    const timestamp = detectionSet.timestamp;

    const detectionUrl = this.detectionUrl;
    if (detectionUrl) {
      const body = JSON.stringify({ objects, timestamp, gateId: this.gateId });
      this.deliver('detection', signal => this.postJson(detectionUrl, body, signal));
      return;
    }

    const payload = JSON.stringify({
      objects,
      confidence: Object.fromEntries(detectionSet.confidences),
      timestamp,
      gateId: this.gateId
    });
    this.deliver('detection', () => this.publish(gateTopic(this.gateId, 'detection'), payload));
  }

  reportCommandAck(command: Command): void {
    const status = this.isStreamCommand(command.action) ? this.tunnel?.status() ?? 'STOPPED' : this.gate.state();
    const payload = JSON.stringify({
      status,
      action: command.action,
      gateId: this.gateId,
      timestamp: this.now()
    });
    this.deliver('command-ack', () => this.publish(gateTopic(this.gateId, 'status'), payload));
  }

  reportGateStatus(state: GateState, cause: string): void {
    const payload = JSON.stringify({ status: state, cause, gateId: this.gateId, timestamp: this.now() });
    this.deliver('status', () => this.publish(gateTopic(this.gateId, 'status'), payload));
  }

  /**
   * Applies commands strictly in receipt order. Never rejects: collaborator
   * errors and unusable commands end up in the alert ledger.
   */
  receiveCommand(command: Command): Promise<void> {
    this.counters.commandsReceived += 1;
    return this.commandQueue.runExclusive(() => this.handleCommand(command));
  }

  private async handleCommand(command: Command) {
    if (command.gateId !== this.gateId) {
      this.ledger.addAlert(`command for gate ${command.gateId} ignored: ${command.action}`, 'warning', {
        gateId: this.gateId,
        target: command.gateId
      });
      return;
    }

    this.log.info({ action: command.action }, 'Command received');
    try {
      switch (command.action) {
        case 'OPEN_DOOR':
          await this.gate.applyAction('OPEN');
          break;
        case 'CLOSE_DOOR':
          await this.gate.applyAction('CLOSE');
          break;
        case 'START_STREAM':
          this.requireTunnel().start();
          break;
        case 'STOP_STREAM':
          await this.requireTunnel().stop();
          break;
        default:
          this.ledger.addAlert(`unknown command: ${command.action}`, 'warning', { gateId: this.gateId });
          return;
      }
    } catch (error) {
      this.ledger.addAlert(`command failed: ${command.action} (${describeError(error)})`, 'warning', {
        gateId: this.gateId
      });
      return;
    }

    this.reportCommandAck(command);
  }

  private requireTunnel(): StreamControl {
    if (!this.tunnel) {
      throw new Error('tunnel not configured');
    }
    return this.tunnel;
  }

  private isStreamCommand(action: string): action is Extract<CommandAction, 'START_STREAM' | 'STOP_STREAM'> {
    return action === 'START_STREAM' || action === 'STOP_STREAM';
  }

  private parseCommand(payload: Buffer): Command | null {
    const parsed = this.decodeJson(payload);
    if (parsed === undefined) {
      return null;
    }
    if (typeof parsed !== 'object' || parsed === null || !('action' in parsed) || typeof parsed.action !== 'string') {
      this.log.warn({ payload: payload.toString('utf8') }, 'Dropping command without action');
      return null;
    }
    const gateId = 'gateId' in parsed && typeof parsed.gateId === 'string' ? parsed.gateId : this.gateId;
    const timestamp = 'timestamp' in parsed && typeof parsed.timestamp === 'number' ? parsed.timestamp : this.now();
    return { action: parsed.action, gateId, timestamp };
  }

  private decodeJson(payload: Buffer): unknown {
    try {
      return JSON.parse(payload.toString('utf8'));
    } catch (error) {
      this.log.warn({ err: error }, 'Dropping malformed command payload');
      return undefined;
    }
  }

  private sendHeartbeat() {
    const payload = JSON.stringify({
      gateId: this.gateId,
      timestamp: this.now(),
      gate: this.gate.state(),
      tunnel: this.tunnel?.status() ?? 'STOPPED'
    });
    this.deliver('heartbeat', () => this.publish(gateTopic(this.gateId, 'heartbeat'), payload));
  }

  private async publish(topic: string, payload: string) {
    if (!this.transport.isConnected()) {
      throw new Error('broker not connected');
    }
    await this.transport.publish(topic, payload);
  }

  private async postJson(url: string, body: string, signal: AbortSignal) {
    const response = await this.fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
  }

  private deliver(kind: RelayDeliveryKind, operation: (signal: AbortSignal) => Promise<void>) {
    const controller = new AbortController();
    const tracked: Promise<void> = withTimeout(
      Promise.resolve().then(() => operation(controller.signal)),
      this.timeoutMs,
      `${kind} delivery`,
      () => controller.abort()
    )
      .then(
        () => {
          this.counters.delivered += 1;
          this.metrics.recordRelayDelivery(kind, 'delivered');
        },
        error => this.recordFailure(kind, error)
      )
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  private recordFailure(kind: RelayDeliveryKind, error: unknown) {
    const timedOut = error instanceof RelayTimeoutError;
    if (timedOut) {
      this.counters.timedOut += 1;
    } else {
      this.counters.failed += 1;
    }
    this.lastFailure = { kind, message: describeError(error), at: this.now() };
    this.metrics.recordRelayDelivery(kind, timedOut ? 'timeout' : 'failed', error);
    this.log.warn({ err: error, kind }, 'Relay delivery failed');
  }
}

export default RelayClient;
