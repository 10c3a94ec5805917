import { execFile } from 'node:child_process';
import logger, { type LogSink } from '../logger.js';
import type { GateAction } from '../types.js';

export interface Actuator {
  open(): Promise<void>;
  close(): Promise<void>;
}

export type SimulatedActuatorOptions = {
  latencyMs?: number;
  log?: LogSink;
};

export class SimulatedActuator implements Actuator {
  private readonly latencyMs: number;
  private readonly log: LogSink;

  constructor(options: SimulatedActuatorOptions = {}) {
    this.latencyMs = Math.max(0, options.latencyMs ?? 0);
    this.log = options.log ?? logger.child({ component: 'actuator' });
  }

  open() {
    return this.drive('OPEN');
  }

  close() {
    return this.drive('CLOSE');
  }

  private async drive(action: GateAction) {
    if (this.latencyMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.latencyMs));
    }
    this.log.info({ action, simulated: true }, 'Gate actuator driven');
  }
}

export type CommandActuatorOptions = {
  openCommand: string[];
  closeCommand: string[];
  timeoutMs?: number;
  log?: LogSink;
};

export type ExecFileFn = (
  file: string,
  args: string[],
  options: { timeout: number },
  callback: (error: Error | null, stdout: string, stderr: string) => void
) => unknown;

export class ActuatorCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ActuatorCommandError';
  }
}

/**
 * Drives the gate through an external program, one argv per action. A
 * non-zero exit, a spawn error or an expired timeout is a failed actuation.
 */
export class CommandActuator implements Actuator {
  private readonly options: CommandActuatorOptions;
  private readonly exec: ExecFileFn;
  private readonly log: LogSink;

  constructor(
    options: CommandActuatorOptions,
    exec: ExecFileFn = (file, args, execOptions, callback) => execFile(file, args, execOptions, callback)
  ) {
    if (options.openCommand.length === 0 || options.closeCommand.length === 0) {
      throw new ActuatorCommandError('open and close commands must not be empty');
    }
    this.options = options;
    this.exec = exec;
    this.log = options.log ?? logger.child({ component: 'actuator' });
  }

  open() {
    return this.run('OPEN', this.options.openCommand);
  }

  close() {
    return this.run('CLOSE', this.options.closeCommand);
  }

  private run(action: GateAction, argv: string[]) {
    const [file, ...args] = argv;
    const timeout = this.options.timeoutMs ?? 5000;
    return new Promise<void>((resolve, reject) => {
      this.exec(file, args, { timeout }, (error, _stdout, stderr) => {
        if (error) {
          const detail = stderr.trim();
          reject(new ActuatorCommandError(detail ? `${error.message}: ${detail}` : error.message));
          return;
        }
        this.log.info({ action, command: file }, 'Gate actuator driven');
        resolve();
      });
    });
  }
}

export type ActuatorConfig =
  | { type: 'simulated'; latencyMs?: number }
  | { type: 'command'; openCommand: string[]; closeCommand: string[]; timeoutMs?: number };

export function createActuator(actuatorConfig: ActuatorConfig, log?: LogSink): Actuator {
  if (actuatorConfig.type === 'command') {
    return new CommandActuator({
      openCommand: actuatorConfig.openCommand,
      closeCommand: actuatorConfig.closeCommand,
      timeoutMs: actuatorConfig.timeoutMs,
      log
    });
  }
  return new SimulatedActuator({ latencyMs: actuatorConfig.latencyMs, log });
}
