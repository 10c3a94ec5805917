#!/usr/bin/env node
import process from 'node:process';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import { isMainModule, runUntilSignal } from './app.js';
import { ConfigValidationError, loadConfigFromFile, loadRuntimeConfig, type GatewardenConfig } from './config/index.js';
import { compileRules, explain, toDetectionSet } from './rules/engine.js';
import { startDashboard } from './run-dashboard.js';
import { startGate } from './run-gate.js';
import { describeError } from './utils/timeout.js';

export type CliIo = {
  stdout: Pick<NodeJS.WritableStream, 'write'>;
  stderr: Pick<NodeJS.WritableStream, 'write'>;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const USAGE_LINES = [
  'Usage: gatewarden <command> [options]',
  '',
  'Commands:',
  '  start gate                 Run the edge runtime next to the gate',
  '  start dashboard            Run the dashboard runtime',
  '  config check [file]        Validate a configuration file (default: config/ for NODE_ENV)',
  '  rules explain <label...>   Show which rules match the given labels',
  '  log-level get              Print the current log level',
  '  log-level set <level>      Change the log level for this process',
  '  help                       Show this message'
];

const USAGE = USAGE_LINES.join('\n');

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const [command, ...rest] = argv;

  switch (command) {
    case 'start':
      return runStartCommand(rest, io);
    case 'config':
      return runConfigCommand(rest, io);
    case 'rules':
      return runRulesCommand(rest, io);
    case 'log-level':
      return runLogLevelCommand(rest, io);
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      io.stdout.write(`${USAGE}\n`);
      return 0;
    default:
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE}\n`);
      return 1;
  }
}

async function runStartCommand(args: string[], io: CliIo): Promise<number> {
  const [target] = args;
  if (target === 'gate') {
    return runUntilSignal(() => startGate(), logger);
  }
  if (target === 'dashboard') {
    return runUntilSignal(() => startDashboard(), logger);
  }
  io.stderr.write(`Unknown start target: ${target ?? '(none)'}\n`);
  io.stderr.write('Expected "gate" or "dashboard"\n');
  return 1;
}

function loadConfigOrReport(file: string | undefined, io: CliIo): GatewardenConfig | null {
  try {
    return file ? loadConfigFromFile(file) : loadRuntimeConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      io.stderr.write('Configuration invalid:\n');
      for (const issue of error.issues) {
        io.stderr.write(`  - ${issue}\n`);
      }
    } else {
      io.stderr.write(`Failed to load configuration: ${describeError(error)}\n`);
    }
    return null;
  }
}

function runConfigCommand(args: string[], io: CliIo): number {
  const [subcommand, file] = args;
  if (subcommand !== 'check') {
    io.stderr.write(`Unknown config subcommand: ${subcommand ?? '(none)'}\n`);
    return 1;
  }

  const loaded = loadConfigOrReport(file, io);
  if (!loaded) {
    return 1;
  }
  io.stdout.write(
    `Configuration OK: gate ${loaded.gate.id}, ${loaded.rules.length} rule(s), tunnel ${loaded.tunnel.enabled ? 'enabled' : 'disabled'}\n`
  );
  return 0;
}

function runRulesCommand(args: string[], io: CliIo): number {
  const [subcommand, ...labels] = args;
  if (subcommand !== 'explain' || labels.length === 0) {
    io.stderr.write('Usage: gatewarden rules explain <label...>\n');
    return 1;
  }

  const loaded = loadConfigOrReport(undefined, io);
  if (!loaded) {
    return 1;
  }

  const detectionSet = toDetectionSet(labels.map(label => ({ label })));
  const explanation = explain(detectionSet, compileRules(loaded.rules));
  io.stdout.write(
    `${JSON.stringify({
      labels: Array.from(detectionSet.labels),
      matched: explanation.matched,
      action: explanation.action
    })}\n`
  );
  return 0;
}

function runLogLevelCommand(args: string[], io: CliIo): number {
  const [subcommand, level] = args;
  if (!subcommand || subcommand === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (subcommand === 'set') {
    if (!level) {
      io.stderr.write(`Missing level (available: ${getAvailableLogLevels().join(', ')})\n`);
      return 1;
    }
    try {
      io.stdout.write(`${setLogLevel(level)}\n`);
      return 0;
    } catch (error) {
      io.stderr.write(`${describeError(error)}\n`);
      return 1;
    }
  }

  io.stderr.write(`Unknown log-level subcommand: ${subcommand}\n`);
  return 1;
}

if (isMainModule(import.meta.url)) {
  runCli().then(
    exitCode => {
      process.exitCode = exitCode;
    },
    error => {
      logger.error({ err: error }, 'CLI failed');
      process.exitCode = 1;
    }
  );
}
