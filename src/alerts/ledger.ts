import { EventEmitter } from 'node:events';
import logger, { type LogSink } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import { ALERT_LEVELS, isAlertLevel, type Alert, type AlertLevel } from '../types.js';

export const DEFAULT_ALERT_CAPACITY = 100;

export class AlertLedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AlertLedgerError';
  }
}

export interface AlertLedgerDependencies {
  capacity?: number;
  store?: (alert: Alert) => void;
  log?: LogSink;
  metrics?: MetricsRegistry;
  now?: () => number;
}

/**
 * Bounded, newest-first alert list shared by every component of a runtime.
 * `addAlert` is synchronous so insertion and eviction cannot interleave.
 */
export class AlertLedger extends EventEmitter {
  readonly capacity: number;
  private readonly alerts: Alert[] = [];
  private nextId = 1;
  private readonly store?: (alert: Alert) => void;
  private readonly log: LogSink;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(dependencies: AlertLedgerDependencies = {}) {
    super();
    const capacity = dependencies.capacity ?? DEFAULT_ALERT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new AlertLedgerError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.store = dependencies.store;
    this.log = dependencies.log ?? logger.child({ component: 'alerts' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? Date.now;
  }

  addAlert(message: string, level: AlertLevel, meta?: Record<string, unknown>): Alert {
    if (!isAlertLevel(level)) {
      throw new AlertLedgerError(`unknown alert level "${String(level)}" (expected ${ALERT_LEVELS.join(', ')})`);
    }
    if (typeof message !== 'string' || message.trim().length === 0) {
      throw new AlertLedgerError('alert message must be a non-empty string');
    }

    const alert: Alert = Object.freeze({
      id: this.nextId,
      message,
      level,
      timestamp: this.now(),
      ...(meta ? { meta: Object.freeze({ ...meta }) } : {})
    });
    this.nextId += 1;

    this.alerts.unshift(alert);
    if (this.alerts.length > this.capacity) {
      this.alerts.length = this.capacity;
    }

    this.metrics.recordAlert(level);
    this.logAlert(alert);
    this.persist(alert);
    this.emit('alert', alert);
    return alert;
  }

  listAlerts(limit?: number): Alert[] {
    if (limit === undefined) {
      return this.alerts.slice();
    }
    const bounded = Math.max(0, Math.floor(limit));
    return this.alerts.slice(0, bounded);
  }

  size() {
    return this.alerts.length;
  }

  clear() {
    this.alerts.length = 0;
  }

  private logAlert(alert: Alert) {
    const context = { alertId: alert.id, level: alert.level, meta: alert.meta };
    switch (alert.level) {
      case 'critical':
        this.log.error(context, alert.message);
        break;
      case 'warning':
        this.log.warn(context, alert.message);
        break;
      default:
        this.log.info(context, alert.message);
    }
  }

  private persist(alert: Alert) {
    if (!this.store) {
      return;
    }
    try {
      this.store(alert);
    } catch (error) {
      this.metrics.recordAlertStoreFailure();
      this.log.error({ err: error, alertId: alert.id }, 'Failed to archive alert');
    }
  }
}

export default AlertLedger;
