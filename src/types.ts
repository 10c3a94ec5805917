export type AlertLevel = 'info' | 'warning' | 'critical';

export const ALERT_LEVELS: readonly AlertLevel[] = ['info', 'warning', 'critical'];

export interface Alert {
  readonly id: number;
  readonly message: string;
  readonly level: AlertLevel;
  readonly timestamp: number;
  readonly meta?: Readonly<Record<string, unknown>>;
}

export type GateAction = 'OPEN' | 'CLOSE';

export type GateState = 'OPEN' | 'CLOSED';

export interface Rule {
  id: string;
  triggerLabels: ReadonlySet<string>;
  action: GateAction;
}

export interface Detection {
  label: string;
  confidence?: number;
}

export interface DetectionSet {
  labels: ReadonlySet<string>;
  confidences: ReadonlyMap<string, number>;
  timestamp: number;
}

export type CommandAction = 'OPEN_DOOR' | 'CLOSE_DOOR' | 'START_STREAM' | 'STOP_STREAM';

/**
 * A command as delivered by the remote side. `action` stays a plain string so
 * that values this build does not know yet can still be received and reported.
 */
export interface Command {
  action: string;
  gateId: string;
  timestamp: number;
}

export type TunnelStatus = 'STOPPED' | 'STARTING' | 'HEALTHY' | 'FAILED';

export function isGateAction(value: unknown): value is GateAction {
  return value === 'OPEN' || value === 'CLOSE';
}

export function isAlertLevel(value: unknown): value is AlertLevel {
  return value === 'info' || value === 'warning' || value === 'critical';
}
