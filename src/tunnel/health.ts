import type { TunnelStats } from './supervisor.js';

export type TunnelHealthSeverity = 'none' | 'warning' | 'critical';

export type TunnelHealthThreshold = {
  consecutiveFailures: number;
  restartDelayMs: number;
};

export type TunnelHealthThresholds = {
  warning: TunnelHealthThreshold;
  critical: TunnelHealthThreshold;
};

export type TunnelHealthEvaluation = {
  severity: TunnelHealthSeverity;
  triggeredBy: 'consecutive-failures' | 'restart-delay' | null;
  threshold: number | null;
  actual: number;
};

export const DEFAULT_TUNNEL_HEALTH_THRESHOLDS: TunnelHealthThresholds = {
  warning: {
    consecutiveFailures: 3,
    restartDelayMs: 8_000
  },
  critical: {
    consecutiveFailures: 6,
    restartDelayMs: 60_000
  }
};

export function evaluateTunnelHealth(
  stats: Pick<TunnelStats, 'consecutiveFailures' | 'nextRestartDelayMs'>,
  thresholds: TunnelHealthThresholds = DEFAULT_TUNNEL_HEALTH_THRESHOLDS
): TunnelHealthEvaluation {
  const failures = stats.consecutiveFailures;
  const delayMs = stats.nextRestartDelayMs ?? 0;

  if (failures >= thresholds.critical.consecutiveFailures) {
    return {
      severity: 'critical',
      triggeredBy: 'consecutive-failures',
      threshold: thresholds.critical.consecutiveFailures,
      actual: failures
    };
  }

  if (delayMs >= thresholds.critical.restartDelayMs) {
    return {
      severity: 'critical',
      triggeredBy: 'restart-delay',
      threshold: thresholds.critical.restartDelayMs,
      actual: delayMs
    };
  }

  if (failures >= thresholds.warning.consecutiveFailures) {
    return {
      severity: 'warning',
      triggeredBy: 'consecutive-failures',
      threshold: thresholds.warning.consecutiveFailures,
      actual: failures
    };
  }

  if (delayMs >= thresholds.warning.restartDelayMs) {
    return {
      severity: 'warning',
      triggeredBy: 'restart-delay',
      threshold: thresholds.warning.restartDelayMs,
      actual: delayMs
    };
  }

  return { severity: 'none', triggeredBy: null, threshold: null, actual: failures };
}

export function formatTunnelHealthReason(evaluation: TunnelHealthEvaluation): string | null {
  if (evaluation.severity === 'none' || !evaluation.triggeredBy || evaluation.threshold === null) {
    return null;
  }

  if (evaluation.triggeredBy === 'consecutive-failures') {
    return `tunnel failures ${evaluation.actual} >= ${evaluation.threshold}`;
  }

  return `tunnel restart delay ${evaluation.actual}ms >= ${evaluation.threshold}ms`;
}
