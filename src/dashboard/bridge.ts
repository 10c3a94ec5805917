import logger, { type LogSink } from '../logger.js';
import type { AlertLedger } from '../alerts/ledger.js';
import { allGatesTopic, gateTopic, parseGateTopic } from '../relay/topics.js';
import type { PubSubTransport, Unsubscribe } from '../relay/transport.js';
import { withTimeout } from '../utils/timeout.js';
import { GateRegistry } from './registry.js';

const GATE_STATES = new Set(['OPEN', 'CLOSED']);

export interface DashboardBridgeOptions {
  transport: PubSubTransport;
  ledger: AlertLedger;
  registry: GateRegistry;
  commandTimeoutMs?: number;
  log?: LogSink;
  now?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toObjectLabels(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const labels: string[] = [];
  for (const entry of value) {
    if (typeof entry === 'string') {
      labels.push(entry);
    } else if (isRecord(entry) && typeof entry.label === 'string') {
      labels.push(entry.label);
    } else {
      return null;
    }
  }
  return labels;
}

/**
 * Cloud side of the relay: turns gate traffic into registry updates and
 * ledger alerts, and publishes operator commands.
 */
export class DashboardBridge {
  private readonly transport: PubSubTransport;
  private readonly ledger: AlertLedger;
  readonly registry: GateRegistry;
  private readonly commandTimeoutMs: number;
  private readonly log: LogSink;
  private readonly now: () => number;
  private unsubscribers: Unsubscribe[] = [];
  private subscribing: Promise<void> | null = null;
  private generation = 0;

  constructor(options: DashboardBridgeOptions) {
    this.transport = options.transport;
    this.ledger = options.ledger;
    this.registry = options.registry;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 2000;
    this.log = options.log ?? logger.child({ component: 'dashboard' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Subscribes to the gate topics. Settles once the broker accepts every
   * subscription; the dashboard serves HTTP without waiting for it.
   */
  start(): Promise<void> {
    if (this.subscribing) {
      return this.subscribing;
    }
    this.generation += 1;
    const subscribing = this.subscribeAll(this.generation).catch((error: unknown) => {
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
    const unsubscribers = this.unsubscribers;
    this.unsubscribers = [];
    for (const unsubscribe of unsubscribers) {
      await this.safeUnsubscribe(unsubscribe);
    }
  }

  private async subscribeAll(generation: number) {
    const handler = (topic: string, payload: Buffer) => this.handleMessage(topic, payload);
    for (const kind of ['status', 'detection', 'heartbeat'] as const) {
      const unsubscribe = await this.transport.subscribe(allGatesTopic(kind), handler);
      if (generation !== this.generation) {
        await this.safeUnsubscribe(unsubscribe);
        return;
      }
      this.unsubscribers.push(unsubscribe);
    }
    this.log.info('Dashboard bridge subscribed to gate topics');
  }

  private async safeUnsubscribe(unsubscribe: Unsubscribe) {
    try {
      await unsubscribe();
    } catch (error) {
      this.log.warn({ err: error }, 'Failed to unsubscribe from gate topic');
    }
  }

  recordDetection(gateId: string, objects: string[], timestamp: number = this.now()) {
    this.registry.touch(gateId, { lastDetection: { objects: [...objects], timestamp } });
    if (objects.length > 0) {
      this.ledger.addAlert(`Gate ${gateId}: animal detected: ${objects.join(', ')}`, 'warning', { gateId });
    }
  }

  recordStatus(gateId: string, status: string, cause?: string) {
    if (GATE_STATES.has(status)) {
      this.registry.touch(gateId, { state: status });
    } else {
      this.registry.touch(gateId, { tunnel: status });
    }
    this.ledger.addAlert(`Gate ${gateId} status: ${status}`, 'info', cause ? { gateId, cause } : { gateId });
  }

  recordHeartbeat(gateId: string, gateState: string | null, tunnel: string | null) {
    this.registry.touch(gateId, {
      ...(gateState ? { state: gateState } : {}),
      ...(tunnel ? { tunnel } : {})
    });
  }

  /** Publishes `{ action }` to the gate; rejects when the broker does not accept it in time. */
  async sendCommand(gateId: string, command: string) {
    if (!this.transport.isConnected()) {
      throw new Error('broker not connected');
    }
    const payload = JSON.stringify({ action: command, gateId, timestamp: this.now() });
    await withTimeout(this.transport.publish(gateTopic(gateId, 'commands'), payload), this.commandTimeoutMs, 'command publish');
    this.ledger.addAlert(`Command sent to gate ${gateId}: ${command}`, 'info', { gateId, command });
  }

  private handleMessage(topic: string, payload: Buffer) {
    const parsedTopic = parseGateTopic(topic);
    if (!parsedTopic) {
      return;
    }

    let body: unknown;
    try {
      body = JSON.parse(payload.toString('utf8'));
    } catch (error) {
      this.log.warn({ err: error, topic }, 'Dropping malformed gate message');
      return;
    }
    if (!isRecord(body)) {
      this.log.warn({ topic }, 'Dropping non-object gate message');
      return;
    }

    const { gateId, kind } = parsedTopic;
    switch (kind) {
      case 'detection': {
        const objects = toObjectLabels(body.objects);
        if (!objects) {
          this.log.warn({ topic }, 'Dropping detection without objects');
          return;
        }
        const timestamp = typeof body.timestamp === 'number' ? body.timestamp : this.now();
        this.recordDetection(gateId, objects, timestamp);
        return;
      }
      case 'status':
        if (typeof body.status !== 'string') {
          this.log.warn({ topic }, 'Dropping status without status field');
          return;
        }
        this.recordStatus(gateId, body.status, typeof body.cause === 'string' ? body.cause : undefined);
        return;
      case 'heartbeat':
        this.recordHeartbeat(
          gateId,
          typeof body.gate === 'string' ? body.gate : null,
          typeof body.tunnel === 'string' ? body.tunnel : null
        );
        return;
      default:
        return;
    }
  }
}

export default DashboardBridge;
