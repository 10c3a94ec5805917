import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AlertLedger } from '../../alerts/ledger.js';
import type { DashboardBridge } from '../../dashboard/bridge.js';
import { listArchivedAlerts, type ListArchivedAlertsOptions, type PaginatedAlerts } from '../../db.js';
import { describeError } from '../../utils/timeout.js';
import type { Router } from '../http.js';
import { isRecord, parseLimit, readJsonBody, respondAsync, sendJson } from '../json.js';

export interface DashboardRouterOptions {
  ledger: AlertLedger;
  bridge: Pick<DashboardBridge, 'recordDetection' | 'sendCommand' | 'registry'>;
  defaultGateId: string;
  archive?: (options: ListArchivedAlertsOptions) => PaginatedAlerts;
}

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

export class DashboardRouter implements Router {
  private readonly options: DashboardRouterOptions;
  private readonly archive: (options: ListArchivedAlertsOptions) => PaginatedAlerts;
  private readonly handlers: Handler[];

  constructor(options: DashboardRouterOptions) {
    this.options = options;
    this.archive = options.archive ?? listArchivedAlerts;
    this.handlers = [
      (req, res, url) => this.handleDetection(req, res, url),
      (req, res, url) => this.handleSendCommand(req, res, url),
      (req, res, url) => this.handleAlertHistory(req, res, url),
      (req, res, url) => this.handleAlerts(req, res, url),
      (req, res, url) => this.handleGateStatus(req, res, url)
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

  private handleDetection(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/detection') {
      return false;
    }
    respondAsync(res, async () => {
      const body = await readJsonBody(req).catch(() => null);
      if (!isRecord(body) || !Array.isArray(body.objects)) {
        sendJson(res, 400, { status: 'error', error: 'objects must be an array of labels' });
        return;
      }
      const objects: string[] = [];
      for (const entry of body.objects) {
        if (typeof entry !== 'string') {
          sendJson(res, 400, { status: 'error', error: 'objects must be an array of labels' });
          return;
        }
        objects.push(entry);
      }
      const gateId = typeof body.gateId === 'string' && body.gateId ? body.gateId : this.options.defaultGateId;
      const timestamp = typeof body.timestamp === 'number' ? body.timestamp : undefined;
      this.options.bridge.recordDetection(gateId, objects, timestamp);
      sendJson(res, 200, { status: 'received' });
    });
    return true;
  }

  private handleSendCommand(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/send_command') {
      return false;
    }
    respondAsync(res, async () => {
      const body = await readJsonBody(req).catch(() => null);
      if (!isRecord(body) || typeof body.command !== 'string' || body.command.trim() === '') {
        sendJson(res, 400, { status: 'error', error: 'command is required' });
        return;
      }
      const command = body.command.trim();
      const gate = typeof body.gate === 'string' && body.gate.trim() ? body.gate.trim() : this.options.defaultGateId;
      try {
        await this.options.bridge.sendCommand(gate, command);
      } catch (error) {
        sendJson(res, 502, { status: 'error', error: describeError(error) });
        return;
      }
      sendJson(res, 200, { status: 'sent', gate });
    });
    return true;
  }

  private handleAlerts(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/alerts') {
      return false;
    }
    const limit = parseLimit(url.searchParams.get('limit'));
    sendJson(res, 200, { alerts: this.options.ledger.listAlerts(limit) });
    return true;
  }

  private handleAlertHistory(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/alerts/history') {
      return false;
    }
    const result = this.archive({
      limit: parseLimit(url.searchParams.get('limit')),
      offset: parseLimit(url.searchParams.get('offset'))
    });
    sendJson(res, 200, { alerts: result.alerts, total: result.total });
    return true;
  }

  private handleGateStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/gate-status') {
      return false;
    }
    sendJson(res, 200, { gates: this.options.bridge.registry.snapshot() });
    return true;
  }
}

export function createDashboardRouter(options: DashboardRouterOptions) {
  return new DashboardRouter(options);
}
