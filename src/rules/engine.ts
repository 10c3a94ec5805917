import { isGateAction, type Detection, type DetectionSet, type GateAction, type Rule } from '../types.js';

export type RuleConfig = {
  id: string;
  triggerLabels: string[];
  action: string;
};

export type DetectionSetOptions = {
  minConfidence?: number;
  timestamp?: number;
};

export type RuleExplanation = {
  action: GateAction | null;
  matched: string[];
  skipped: string[];
};

export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase();
}

/**
 * Collapses raw detections into a set. Duplicate labels keep the highest
 * confidence; blank labels and those under `minConfidence` are dropped.
 */
export function toDetectionSet(detections: Iterable<Detection>, options: DetectionSetOptions = {}): DetectionSet {
  const minConfidence = options.minConfidence ?? 0;
  const confidences = new Map<string, number>();

  for (const detection of detections) {
    const label = normalizeLabel(detection.label);
    if (!label) {
      continue;
    }
    const confidence = typeof detection.confidence === 'number' && Number.isFinite(detection.confidence)
      ? detection.confidence
      : 1;
    if (confidence < minConfidence) {
      continue;
    }
    const previous = confidences.get(label);
    if (previous === undefined || confidence > previous) {
      confidences.set(label, confidence);
    }
  }

  return {
    labels: new Set(confidences.keys()),
    confidences,
    timestamp: options.timestamp ?? Date.now()
  };
}

export function compileRules(configs: readonly RuleConfig[]): Rule[] {
  return configs.map(entry => {
    if (!isGateAction(entry.action)) {
      throw new Error(`Rule ${entry.id} has unknown action ${entry.action}`);
    }
    const triggerLabels = new Set(entry.triggerLabels.map(normalizeLabel).filter(label => label.length > 0));
    return { id: entry.id, triggerLabels, action: entry.action };
  });
}

function isUsable(rule: Rule) {
  return rule.triggerLabels.size > 0 && isGateAction(rule.action);
}

function matches(rule: Rule, labels: ReadonlySet<string>) {
  for (const label of rule.triggerLabels) {
    if (!labels.has(label)) {
      return false;
    }
  }
  return true;
}

export function explain(detectionSet: DetectionSet, rules: readonly Rule[]): RuleExplanation {
  const matched: string[] = [];
  const skipped: string[] = [];
  let sawOpen = false;
  let sawClose = false;

  for (const rule of rules) {
    if (!isUsable(rule)) {
      skipped.push(rule.id);
      continue;
    }
    if (!matches(rule, detectionSet.labels)) {
      continue;
    }
    matched.push(rule.id);
    if (rule.action === 'CLOSE') {
      sawClose = true;
    } else {
      sawOpen = true;
    }
  }

  // CLOSE outranks OPEN regardless of rule order.
  const action: GateAction | null = sawClose ? 'CLOSE' : sawOpen ? 'OPEN' : null;
  return { action, matched, skipped };
}

export function evaluate(detectionSet: DetectionSet, rules: readonly Rule[]): GateAction | null {
  return explain(detectionSet, rules).action;
}
