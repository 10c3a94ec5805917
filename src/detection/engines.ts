import { spawn } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import readline from 'node:readline';
import logger, { type LogSink } from '../logger.js';
import type { Detection } from '../types.js';

export interface InferenceEngine {
  nextDetections(): Promise<Detection[]>;
  close?(): Promise<void>;
}

export class InferenceFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InferenceFormatError';
  }
}

/**
 * Accepts `["dog", {"label": "cat", "confidence": 0.9}]`, or an object with
 * that array under `objects`.
 */
export function parseDetections(value: unknown): Detection[] {
  const list =
    typeof value === 'object' && value !== null && !Array.isArray(value) && 'objects' in value
      ? value.objects
      : value;
  if (!Array.isArray(list)) {
    throw new InferenceFormatError('detections must be an array');
  }
  return list.map((entry: unknown): Detection => {
    if (typeof entry === 'string') {
      return { label: entry };
    }
    if (typeof entry === 'object' && entry !== null && 'label' in entry && typeof entry.label === 'string') {
      const confidence = 'confidence' in entry && typeof entry.confidence === 'number' ? entry.confidence : undefined;
      return confidence === undefined ? { label: entry.label } : { label: entry.label, confidence };
    }
    throw new InferenceFormatError(`unsupported detection entry: ${JSON.stringify(entry)}`);
  });
}

export type ReplayFrame = {
  detections: Detection[];
  delayMs?: number;
};

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export type ReplayEngineOptions = {
  intervalMs?: number;
  loop?: boolean;
  sleep?: Sleep;
};

export function parseReplayFrames(value: unknown): ReplayFrame[] {
  if (!Array.isArray(value)) {
    throw new InferenceFormatError('replay file must contain an array of frames');
  }
  return value.map((frame: unknown): ReplayFrame => {
    const detections = parseDetections(frame);
    const delayMs =
      typeof frame === 'object' && frame !== null && 'delayMs' in frame && typeof frame.delayMs === 'number'
        ? frame.delayMs
        : undefined;
    return { detections, delayMs };
  });
}

/**
 * Plays back recorded frames, one per call, pacing them by `delayMs` or the
 * configured interval. Stands in for a camera on benches and in demos.
 */
export class ReplayInferenceEngine implements InferenceEngine {
  private readonly frames: ReplayFrame[];
  private readonly intervalMs: number;
  private readonly loop: boolean;
  private readonly sleep: Sleep;
  private index = 0;

  constructor(frames: ReplayFrame[], options: ReplayEngineOptions = {}) {
    this.frames = frames;
    this.intervalMs = options.intervalMs ?? 1000;
    this.loop = options.loop ?? true;
    this.sleep = options.sleep ?? defaultSleep;
  }

  static fromFile(filePath: string, options: ReplayEngineOptions = {}) {
    const raw = fs.readFileSync(filePath, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    return new ReplayInferenceEngine(parseReplayFrames(parsed), options);
  }

  async nextDetections(): Promise<Detection[]> {
    if (this.frames.length === 0) {
      await this.sleep(this.intervalMs);
      return [];
    }
    if (this.index >= this.frames.length) {
      if (!this.loop) {
        await this.sleep(this.intervalMs);
        return [];
      }
      this.index = 0;
    }
    const frame = this.frames[this.index];
    this.index += 1;
    await this.sleep(frame.delayMs ?? this.intervalMs);
    return frame.detections.map(detection => ({ ...detection }));
  }
}

export interface DetectorProcess {
  readonly pid?: number;
  readonly stdout: NodeJS.ReadableStream;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnDetector = (command: string, args: string[]) => DetectorProcess;

export type ProcessEngineOptions = {
  command: string;
  args?: string[];
  spawn?: SpawnDetector;
  log?: LogSink;
};

type PendingRead = {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
};

/**
 * Wraps a long-running detector that prints one JSON detection list per line
 * on stdout. When the detector dies the pending read fails and the next call
 * spawns a fresh process.
 */
export class ProcessInferenceEngine implements InferenceEngine {
  private readonly command: string;
  private readonly args: string[];
  private readonly spawnFn: SpawnDetector;
  private readonly log: LogSink;
  private child: DetectorProcess | null = null;
  private readonly buffered: string[] = [];
  private readonly pending: PendingRead[] = [];
  private closed = false;

  constructor(options: ProcessEngineOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.spawnFn = options.spawn ?? ((command, args) => spawn(command, args, { stdio: ['ignore', 'pipe', 'inherit'] }));
    this.log = options.log ?? logger.child({ component: 'detector' });
  }

  async nextDetections(): Promise<Detection[]> {
    const line = await this.readLine();
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new InferenceFormatError(`detector printed invalid JSON: ${line.slice(0, 120)}`);
    }
    return parseDetections(parsed);
  }

  async close() {
    this.closed = true;
    const child = this.child;
    this.child = null;
    this.failPending(new Error('inference engine closed'));
    if (child) {
      child.kill('SIGTERM');
    }
  }

  private readLine(): Promise<string> {
    if (this.closed) {
      return Promise.reject(new Error('inference engine closed'));
    }
    const next = this.buffered.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    this.ensureProcess();
    return new Promise<string>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  private ensureProcess() {
    if (this.child) {
      return;
    }
    const child = this.spawnFn(this.command, this.args);
    this.child = child;
    this.log.info({ pid: child.pid, command: this.command }, 'Detector process spawned');

    const lines = readline.createInterface({ input: child.stdout });
    lines.on('line', line => {
      const trimmed = line.trim();
      if (!trimmed || this.child !== child) {
        return;
      }
      const waiter = this.pending.shift();
      if (waiter) {
        waiter.resolve(trimmed);
      } else {
        this.buffered.push(trimmed);
      }
    });

    child.on('error', error => {
      this.handleDeath(child, error);
    });
    child.on('exit', (code, signal) => {
      this.handleDeath(child, new Error(`detector exited (code=${code}, signal=${signal})`));
    });
  }

  private handleDeath(child: DetectorProcess, error: Error) {
    if (this.child !== child) {
      return;
    }
    this.child = null;
    this.buffered.length = 0;
    this.log.warn({ err: error, pid: child.pid }, 'Detector process died');
    this.failPending(error);
  }

  private failPending(error: Error) {
    for (const waiter of this.pending.splice(0)) {
      waiter.reject(error);
    }
  }
}

export type InferenceEngineConfig =
  | { type: 'replay'; file: string; intervalMs?: number; loop?: boolean }
  | { type: 'process'; command: string; args?: string[] };

export function createInferenceEngine(engineConfig: InferenceEngineConfig, baseDir = process.cwd()): InferenceEngine {
  if (engineConfig.type === 'process') {
    return new ProcessInferenceEngine({ command: engineConfig.command, args: engineConfig.args });
  }
  return ReplayInferenceEngine.fromFile(path.resolve(baseDir, engineConfig.file), {
    intervalMs: engineConfig.intervalMs,
    loop: engineConfig.loop
  });
}
