import type { InferenceEngine } from '../../src/detection/engines.js';
import type { Detection } from '../../src/types.js';

export type ScriptedStep = Detection[] | Error;

/** Serves scripted frames, then blocks until closed. */
export class ScriptedEngine implements InferenceEngine {
  closed = false;
  private readonly steps: ScriptedStep[];
  private release: ((detections: Detection[]) => void) | null = null;

  constructor(steps: ScriptedStep[] = []) {
    this.steps = [...steps];
  }

  push(step: ScriptedStep) {
    const release = this.release;
    if (release && !(step instanceof Error)) {
      this.release = null;
      release(step);
      return;
    }
    this.steps.push(step);
  }

  async nextDetections(): Promise<Detection[]> {
    const step = this.steps.shift();
    if (step instanceof Error) {
      throw step;
    }
    if (step) {
      return step;
    }
    if (this.closed) {
      return [];
    }
    return new Promise<Detection[]>(resolve => {
      this.release = resolve;
    });
  }

  async close() {
    this.closed = true;
    const release = this.release;
    this.release = null;
    release?.([]);
  }
}
