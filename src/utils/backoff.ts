export type RestartDelayOptions = {
  restartDelayMs: number;
  restartMaxDelayMs: number;
  restartJitterFactor: number;
  random?: () => number;
};

export type RestartDelayResult = {
  delayMs: number;
  meta: {
    minDelayMs: number;
    maxDelayMs: number;
    baseDelayMs: number;
    appliedJitterMs: number;
  };
};

/**
 * Exponential backoff for the n-th consecutive restart (1-based), with a
 * symmetric jitter clamped into `[restartDelayMs, restartMaxDelayMs]`.
 */
export function computeRestartDelay(attempt: number, options: RestartDelayOptions): RestartDelayResult {
  const minDelayMs = Math.max(0, options.restartDelayMs);
  const maxDelayMs = Math.max(minDelayMs, options.restartMaxDelayMs);

  let baseDelayMs = minDelayMs;
  if (attempt > 1) {
    const exponential = minDelayMs * 2 ** (attempt - 1);
    baseDelayMs = Math.min(maxDelayMs, Math.max(minDelayMs, Math.round(exponential)));
  }

  const factor = Math.max(0, options.restartJitterFactor);
  const random = options.random?.() ?? Math.random();
  const jitterRange = Math.round(baseDelayMs * factor);
  let appliedJitterMs = 0;

  if (jitterRange > 0) {
    const centered = random * 2 - 1;
    appliedJitterMs = Math.round(centered * jitterRange);
  }

  let delayMs = baseDelayMs + appliedJitterMs;
  if (delayMs > maxDelayMs) {
    delayMs = maxDelayMs;
  } else if (delayMs < minDelayMs) {
    delayMs = minDelayMs;
  }

  appliedJitterMs = delayMs - baseDelayMs;

  return {
    delayMs,
    meta: { minDelayMs, maxDelayMs, baseDelayMs, appliedJitterMs }
  };
}
