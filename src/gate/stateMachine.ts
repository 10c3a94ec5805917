import { EventEmitter } from 'node:events';
import logger, { type LogSink } from '../logger.js';
import metrics, { type ActuationOutcome, type MetricsRegistry } from '../metrics/index.js';
import type { AlertLedger } from '../alerts/ledger.js';
import { Mutex } from '../utils/mutex.js';
import { describeError } from '../utils/timeout.js';
import { isGateAction, type Alert, type GateAction, type GateState } from '../types.js';
import type { Actuator } from './actuator.js';

export class GateActionError extends Error {
  readonly action: unknown;

  constructor(action: unknown) {
    super(`unknown gate action: ${String(action)}`);
    this.name = 'GateActionError';
    this.action = action;
  }
}

export type ApplyActionResult = {
  outcome: ActuationOutcome;
  state: GateState;
  previous: GateState;
  alert: Alert;
};

export type GateSnapshot = {
  gateId: string;
  state: GateState;
  lastChangedAt: number | null;
  lastAction: GateAction | null;
};

export type GateChangeEvent = {
  gateId: string;
  state: GateState;
  previous: GateState;
  action: GateAction;
  at: number;
};

export interface GateStateMachineOptions {
  gateId: string;
  actuator: Actuator;
  ledger: AlertLedger;
  initialState?: GateState;
  log?: LogSink;
  metrics?: MetricsRegistry;
  now?: () => number;
}

const TARGET_STATE: Record<GateAction, GateState> = {
  OPEN: 'OPEN',
  CLOSE: 'CLOSED'
};

const CHANGED_MESSAGE: Record<GateAction, string> = {
  OPEN: 'door_opened',
  CLOSE: 'door_closed'
};

const UNCHANGED_MESSAGE: Record<GateAction, string> = {
  OPEN: 'already open',
  CLOSE: 'already closed'
};

export class GateStateMachine extends EventEmitter {
  readonly gateId: string;
  private current: GateState;
  private lastChangedAt: number | null = null;
  private lastAction: GateAction | null = null;
  private readonly actuator: Actuator;
  private readonly ledger: AlertLedger;
  private readonly mutex = new Mutex();
  private readonly log: LogSink;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(options: GateStateMachineOptions) {
    super();
    this.gateId = options.gateId;
    this.current = options.initialState ?? 'CLOSED';
    this.actuator = options.actuator;
    this.ledger = options.ledger;
    this.log = options.log ?? logger.child({ component: 'gate', gateId: options.gateId });
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? Date.now;
  }

  state(): GateState {
    return this.current;
  }

  snapshot(): GateSnapshot {
    return {
      gateId: this.gateId,
      state: this.current,
      lastChangedAt: this.lastChangedAt,
      lastAction: this.lastAction
    };
  }

  /**
   * Applies `action` once every earlier call has finished. Actuator failures
   * resolve with outcome `failed`; only an unknown action rejects.
   */
  applyAction(action: string): Promise<ApplyActionResult> {
    if (!isGateAction(action)) {
      return Promise.reject(new GateActionError(action));
    }
    return this.mutex.runExclusive(() => this.transition(action));
  }

  private async transition(action: GateAction): Promise<ApplyActionResult> {
    const previous = this.current;
    const target = TARGET_STATE[action];

    if (previous === target) {
      this.metrics.recordActuation(action, 'noop');
      const alert = this.ledger.addAlert(UNCHANGED_MESSAGE[action], 'info', { gateId: this.gateId, action });
      return { outcome: 'noop', state: previous, previous, alert };
    }

    try {
      if (action === 'OPEN') {
        await this.actuator.open();
      } else {
        await this.actuator.close();
      }
    } catch (error) {
      const reason = describeError(error);
      this.metrics.recordActuation(action, 'failed');
      this.log.error({ err: error, action, state: previous }, 'Gate actuation failed');
      const alert = this.ledger.addAlert(`actuation failed: ${action} (${reason})`, 'critical', {
        gateId: this.gateId,
        action
      });
      return { outcome: 'failed', state: previous, previous, alert };
    }

    const at = this.now();
    this.current = target;
    this.lastChangedAt = at;
    this.lastAction = action;
    this.metrics.recordActuation(action, 'actuated');
    const alert = this.ledger.addAlert(CHANGED_MESSAGE[action], 'info', { gateId: this.gateId, action });
    this.emit('change', { gateId: this.gateId, state: target, previous, action, at } satisfies GateChangeEvent);
    return { outcome: 'actuated', state: target, previous, alert };
  }
}

export default GateStateMachine;
