import type { IncomingMessage, ServerResponse } from 'node:http';
import type { HealthReport } from '../../app.js';
import type { AlertLedger } from '../../alerts/ledger.js';
import type { GateSnapshot } from '../../gate/stateMachine.js';
import type { Command, DetectionSet } from '../../types.js';
import type { Router } from '../http.js';
import { isRecord, parseLimit, readJsonBody, respondAsync, sendJson } from '../json.js';

export interface GateRouterOptions {
  gateId: string;
  ledger: AlertLedger;
  gate: { snapshot(): GateSnapshot };
  detection: { latest(): DetectionSet | null };
  relay: { receiveCommand(command: Command): Promise<void> };
  health: () => Promise<HealthReport>;
  now?: () => number;
}

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

/**
 * Local status API of the edge runtime, reachable through the tunnel.
 */
export class GateRouter implements Router {
  private readonly options: GateRouterOptions;
  private readonly now: () => number;
  private readonly handlers: Handler[];

  constructor(options: GateRouterOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.handlers = [
      (req, res, url) => this.handleAlerts(req, res, url),
      (req, res, url) => this.handleGateStatus(req, res, url),
      (req, res, url) => this.handleLatestCapture(req, res, url),
      (req, res, url) => this.handleHealth(req, res, url),
      (req, res, url) => this.handleCommand(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  private handleAlerts(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/alerts') {
      return false;
    }
    const limit = parseLimit(url.searchParams.get('limit'));
    sendJson(res, 200, { alerts: this.options.ledger.listAlerts(limit) });
    return true;
  }

  private handleGateStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/gate-status') {
      return false;
    }
    const snapshot = this.options.gate.snapshot();
    sendJson(res, 200, {
      gates: { [snapshot.gateId]: snapshot.state },
      lastChangedAt: snapshot.lastChangedAt
    });
    return true;
  }

  private handleLatestCapture(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/latest-capture') {
      return false;
    }
    const latest = this.options.detection.latest();
    sendJson(res, 200, {
      capture: latest
        ? {
            objects: Array.from(latest.labels),
            confidence: Object.fromEntries(latest.confidences),
            timestamp: latest.timestamp
          }
        : null
    });
    return true;
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/health') {
      return false;
    }
    respondAsync(res, async () => {
      const report = await this.options.health();
      sendJson(res, report.status === 'ok' ? 200 : 503, report);
    });
    return true;
  }

  private handleCommand(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/command') {
      return false;
    }
    respondAsync(res, async () => {
      const body = await readJsonBody(req).catch(() => null);
      if (!isRecord(body) || typeof body.action !== 'string' || body.action.trim() === '') {
        sendJson(res, 400, { status: 'error', error: 'action is required' });
        return;
      }
      const action = body.action.trim();
      await this.options.relay.receiveCommand({ action, gateId: this.options.gateId, timestamp: this.now() });
      sendJson(res, 200, { status: 'applied', action, gate: this.options.gate.snapshot().state });
    });
    return true;
  }
}

export function createGateRouter(options: GateRouterOptions) {
  return new GateRouter(options);
}
