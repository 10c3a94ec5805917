import { describe, expect, it, vi } from 'vitest';
import { AlertLedger, AlertLedgerError } from '../src/alerts/ledger.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { Alert } from '../src/types.js';
import { createLogStub } from './helpers/logStub.js';

function createLedger(options: { capacity?: number; store?: (alert: Alert) => void } = {}) {
  const log = createLogStub();
  const metrics = new MetricsRegistry();
  let clock = 0;
  const ledger = new AlertLedger({ ...options, log, metrics, now: () => ++clock });
  return { ledger, log, metrics };
}

describe('AlertLedger', () => {
  it('assigns increasing ids and lists newest first', () => {
    const { ledger } = createLedger();
    ledger.addAlert('first', 'info');
    ledger.addAlert('second', 'warning');
    ledger.addAlert('third', 'critical');

    const alerts = ledger.listAlerts();
    expect(alerts.map(alert => alert.id)).toEqual([3, 2, 1]);
    expect(alerts.map(alert => alert.message)).toEqual(['third', 'second', 'first']);
    expect(alerts[0].timestamp).toBe(3);
  });

  it('keeps exactly the newest 100 alerts', () => {
    const { ledger } = createLedger();
    for (let index = 1; index <= 150; index += 1) {
      ledger.addAlert(`alert ${index}`, 'info');
    }

    const alerts = ledger.listAlerts();
    expect(ledger.capacity).toBe(100);
    expect(alerts.map(alert => alert.id)).toEqual(Array.from({ length: 100 }, (_, offset) => 150 - offset));
    expect(alerts[0].message).toBe('alert 150');
    expect(alerts[99].message).toBe('alert 51');
  });

  it('never reuses ids after eviction or clear', () => {
    const { ledger } = createLedger({ capacity: 2 });
    ledger.addAlert('a', 'info');
    ledger.addAlert('b', 'info');
    ledger.addAlert('c', 'info');
    ledger.clear();
    const next = ledger.addAlert('d', 'info');
    expect(next.id).toBe(4);
    expect(ledger.size()).toBe(1);
  });

  it('honours the list limit and returns a copy', () => {
    const { ledger } = createLedger();
    ledger.addAlert('a', 'info');
    ledger.addAlert('b', 'info');

    const limited = ledger.listAlerts(1);
    expect(limited.map(alert => alert.message)).toEqual(['b']);

    limited.pop();
    expect(ledger.size()).toBe(2);
    expect(ledger.listAlerts(0)).toEqual([]);
  });

  it('freezes stored alerts', () => {
    const { ledger } = createLedger();
    const alert = ledger.addAlert('frozen', 'info', { gateId: '1' });
    expect(Object.isFrozen(alert)).toBe(true);
    expect(alert.meta).toEqual({ gateId: '1' });
  });

  it('rejects empty messages without consuming an id', () => {
    const { ledger } = createLedger();
    expect(() => ledger.addAlert('   ', 'info')).toThrow(AlertLedgerError);
    expect(ledger.size()).toBe(0);
    expect(ledger.addAlert('real', 'info').id).toBe(1);
  });

  it('logs each alert at the matching pino level and counts it', () => {
    const { ledger, log, metrics } = createLedger();
    ledger.addAlert('all good', 'info');
    ledger.addAlert('look here', 'warning');
    ledger.addAlert('on fire', 'critical');

    expect(log.info).toHaveBeenCalledWith(expect.objectContaining({ alertId: 1, level: 'info' }), 'all good');
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ alertId: 2, level: 'warning' }), 'look here');
    expect(log.error).toHaveBeenCalledWith(expect.objectContaining({ alertId: 3, level: 'critical' }), 'on fire');
    expect(metrics.snapshot().alerts).toEqual({
      total: 3,
      byLevel: { info: 1, warning: 1, critical: 1 },
      storeFailures: 0
    });
  });

  it('passes alerts to the store and survives store failures', () => {
    const store = vi.fn<(alert: Alert) => void>();
    store.mockImplementationOnce(() => {
      throw new Error('disk full');
    });
    const { ledger, log, metrics } = createLedger({ store });

    ledger.addAlert('first', 'info');
    ledger.addAlert('second', 'info');

    expect(store).toHaveBeenCalledTimes(2);
    expect(ledger.size()).toBe(2);
    expect(metrics.snapshot().alerts.storeFailures).toBe(1);
    expect(log.error).toHaveBeenCalledWith(expect.objectContaining({ alertId: 1 }), 'Failed to archive alert');
  });

  it('emits an alert event for each insert', () => {
    const { ledger } = createLedger();
    const seen: Alert[] = [];
    ledger.on('alert', (alert: Alert) => seen.push(alert));
    const alert = ledger.addAlert('hello', 'info');
    expect(seen).toEqual([alert]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new AlertLedger({ capacity: 0 })).toThrow(AlertLedgerError);
  });
});
