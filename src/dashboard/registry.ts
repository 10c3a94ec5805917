export type GateRecord = {
  gateId: string;
  state: string | null;
  tunnel: string | null;
  lastSeen: number | null;
  lastDetection: { objects: string[]; timestamp: number } | null;
};

export type GateView = {
  state: string | null;
  online: boolean;
  lastSeen: number | null;
  tunnel: string | null;
  lastDetection: { objects: string[]; timestamp: number } | null;
};

export type GateUpdate = Partial<Pick<GateRecord, 'state' | 'tunnel' | 'lastDetection'>>;

export const DEFAULT_GATE_TIMEOUT_MS = 30_000;

/**
 * Gates known to the dashboard, keyed by id. A gate is online while it has
 * been heard from within `timeoutMs`.
 */
export class GateRegistry {
  private readonly gates = new Map<string, GateRecord>();
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: { timeoutMs?: number; now?: () => number } = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GATE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  touch(gateId: string, update: GateUpdate = {}): GateRecord {
    const existing = this.gates.get(gateId) ?? {
      gateId,
      state: null,
      tunnel: null,
      lastSeen: null,
      lastDetection: null
    };
    const next: GateRecord = {
      ...existing,
      ...update,
      lastSeen: this.now()
    };
    this.gates.set(gateId, next);
    return next;
  }

  get(gateId: string): GateRecord | undefined {
    const record = this.gates.get(gateId);
    return record ? { ...record } : undefined;
  }

  isOnline(gateId: string): boolean {
    const lastSeen = this.gates.get(gateId)?.lastSeen;
    if (lastSeen === null || lastSeen === undefined) {
      return false;
    }
    return this.now() - lastSeen <= this.timeoutMs;
  }

  snapshot(): Record<string, GateView> {
    const result: Record<string, GateView> = {};
    for (const [gateId, record] of this.gates) {
      result[gateId] = {
        state: record.state,
        online: this.isOnline(gateId),
        lastSeen: record.lastSeen,
        tunnel: record.tunnel,
        lastDetection: record.lastDetection
      };
    }
    return result;
  }
}

export default GateRegistry;
