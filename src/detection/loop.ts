import { EventEmitter } from 'node:events';
import logger, { type LogSink } from '../logger.js';
import metrics, { type ActuationOutcome, type DetectionCycleStatus, type MetricsRegistry } from '../metrics/index.js';
import type { AlertLedger } from '../alerts/ledger.js';
import type { ApplyActionResult } from '../gate/stateMachine.js';
import { explain, toDetectionSet } from '../rules/engine.js';
import { describeError } from '../utils/timeout.js';
import type { Detection, DetectionSet, GateAction, GateState, Rule } from '../types.js';
import type { InferenceEngine } from './engines.js';

export const DEFAULT_FAILURE_BACKOFF_MS = 1000;
const DEFAULT_STOP_GRACE_MS = 5000;

export interface DetectionGate {
  applyAction(action: GateAction): Promise<ApplyActionResult>;
}

export interface DetectionReporter {
  reportDetection(detectionSet: DetectionSet): void;
  reportGateStatus(state: GateState, cause: string): void;
}

export interface DetectionLoopOptions {
  engine: InferenceEngine;
  rules: readonly Rule[];
  gate: DetectionGate;
  relay: DetectionReporter;
  ledger: AlertLedger;
  minConfidence?: number;
  failureBackoffMs?: number;
  stopGraceMs?: number;
  log?: LogSink;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export type CycleSummary = {
  status: DetectionCycleStatus;
  detectionSet: DetectionSet | null;
  action: GateAction | null;
  matchedRules: string[];
  outcome: ActuationOutcome | null;
  error: string | null;
};

export class DetectionLoop extends EventEmitter {
  private readonly engine: InferenceEngine;
  private readonly rules: readonly Rule[];
  private readonly gate: DetectionGate;
  private readonly relay: DetectionReporter;
  private readonly ledger: AlertLedger;
  private readonly minConfidence: number;
  private readonly failureBackoffMs: number;
  private readonly stopGraceMs: number;
  private readonly log: LogSink;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private running = false;
  private closingEngine = false;
  private loopPromise: Promise<void> | null = null;
  private lastDetectionSet: DetectionSet | null = null;
  private inferring = false;
  private backoffTimer: NodeJS.Timeout | null = null;
  private wakeBackoff: (() => void) | null = null;

  constructor(options: DetectionLoopOptions) {
    super();
    this.engine = options.engine;
    this.rules = options.rules;
    this.gate = options.gate;
    this.relay = options.relay;
    this.ledger = options.ledger;
    this.minConfidence = options.minConfidence ?? 0;
    this.failureBackoffMs = options.failureBackoffMs ?? DEFAULT_FAILURE_BACKOFF_MS;
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.log = options.log ?? logger.child({ component: 'detection' });
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? Date.now;
  }

  isRunning() {
    return this.running;
  }

  latest(): DetectionSet | null {
    return this.lastDetectionSet;
  }

  async runCycle(): Promise<CycleSummary> {
    let detections: Detection[];
    this.inferring = true;
    try {
      detections = await this.engine.nextDetections();
    } catch (error) {
      const reason = describeError(error);
      if (this.closingEngine) {
        this.log.debug({ reason }, 'Inference interrupted by shutdown');
      } else {
        this.ledger.addAlert(`inference failed: ${reason}`, 'warning', { component: 'detection' });
      }
      return this.finish({ status: 'inference-failed', error: reason });
    } finally {
      this.inferring = false;
    }

    const detectionSet = toDetectionSet(detections, { minConfidence: this.minConfidence, timestamp: this.now() });
    if (detectionSet.labels.size === 0) {
      return this.finish({ status: 'empty' });
    }

    this.lastDetectionSet = detectionSet;
    const explanation = explain(detectionSet, this.rules);
    let outcome: ActuationOutcome | null = null;

    if (explanation.action) {
      this.log.debug(
        { labels: Array.from(detectionSet.labels), matched: explanation.matched, action: explanation.action },
        'Rules matched'
      );
      try {
        const result = await this.gate.applyAction(explanation.action);
        outcome = result.outcome;
        if (result.outcome === 'actuated') {
          this.relay.reportGateStatus(result.state, 'detection');
        }
      } catch (error) {
        this.ledger.addAlert(`gate action rejected: ${describeError(error)}`, 'warning', {
          component: 'detection',
          action: explanation.action
        });
      }
    }

    this.relay.reportDetection(detectionSet);

    const status: DetectionCycleStatus = !explanation.action
      ? 'no-match'
      : outcome === 'actuated'
        ? 'actuated'
        : 'evaluated';
    return this.finish({
      status,
      detectionSet,
      action: explanation.action,
      matchedRules: explanation.matched,
      outcome
    });
  }

  start() {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loopPromise = this.run();
    this.log.info({ rules: this.rules.length, minConfidence: this.minConfidence }, 'Detection loop started');
  }

  /**
   * Lets a cycle that is past inference finish, then closes the engine. A loop
   * parked on the engine, or still busy after the grace period, is released
   * by closing the engine.
   */
  async stop() {
    const loop = this.loopPromise;
    if (!this.running || !loop) {
      return;
    }
    this.running = false;
    this.cancelBackoff();

    if (!this.inferring) {
      const finishedInTime = await this.waitWithGrace(loop);
      if (!finishedInTime) {
        this.log.warn({ graceMs: this.stopGraceMs }, 'Detection cycle still running, closing engine');
      }
    }
    this.closingEngine = true;
    try {
      await this.closeEngine();
      await loop;
    } finally {
      this.closingEngine = false;
    }
    this.loopPromise = null;
    this.log.info('Detection loop stopped');
  }

  private async waitWithGrace(loop: Promise<void>): Promise<boolean> {
    let expireGrace: (value: boolean) => void = () => undefined;
    const grace = new Promise<boolean>(resolve => {
      expireGrace = resolve;
    });
    const graceTimer = setTimeout(() => expireGrace(false), this.stopGraceMs);
    const finishedInTime = await Promise.race([loop.then(() => true), grace]);
    clearTimeout(graceTimer);
    return finishedInTime;
  }

  private async run() {
    while (this.running) {
      let summary: CycleSummary;
      try {
        summary = await this.runCycle();
      } catch (error) {
        this.log.error({ err: error }, 'Detection cycle crashed');
        summary = this.finish({ status: 'inference-failed', error: describeError(error) });
      }
      if (summary.status === 'inference-failed' && this.running) {
        await this.backoff(this.failureBackoffMs);
      }
    }
  }

  private backoff(ms: number) {
    return new Promise<void>(resolve => {
      this.wakeBackoff = resolve;
      this.backoffTimer = setTimeout(() => {
        this.backoffTimer = null;
        this.wakeBackoff = null;
        resolve();
      }, ms);
    });
  }

  private cancelBackoff() {
    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer);
      this.backoffTimer = null;
    }
    const wake = this.wakeBackoff;
    this.wakeBackoff = null;
    wake?.();
  }

  private async closeEngine() {
    if (!this.engine.close) {
      return;
    }
    try {
      await this.engine.close();
    } catch (error) {
      this.log.warn({ err: error }, 'Failed to close inference engine');
    }
  }

  private finish(partial: Partial<CycleSummary> & { status: DetectionCycleStatus }): CycleSummary {
    const summary: CycleSummary = {
      detectionSet: null,
      action: null,
      matchedRules: [],
      outcome: null,
      error: null,
      ...partial
    };
    this.metrics.recordDetectionCycle(summary.status);
    this.emit('cycle', summary);
    return summary;
  }
}

export default DetectionLoop;
