import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it } from 'vitest';
import { runCli, type CliIo } from '../src/cli.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';

function createIo() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const sink = (target: string[]) => ({
    write: (chunk: string | Uint8Array) => {
      target.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
      return true;
    }
  });
  const io: CliIo = { stdout: sink(stdout), stderr: sink(stderr) };
  return { io, stdout: () => stdout.join(''), stderr: () => stderr.join('') };
}

const defaultFile = fileURLToPath(new URL('../config/default.json', import.meta.url));

describe('gatewarden CLI', () => {
  const initialLevel = getLogLevel();
  const tempFiles: string[] = [];

  afterEach(() => {
    setLogLevel(initialLevel);
    for (const file of tempFiles.splice(0)) {
      fs.rmSync(file, { force: true });
    }
  });

  it('prints usage without arguments', async () => {
    const { io, stdout } = createIo();

    expect(await runCli([], io)).toBe(0);
    expect(stdout().split('\n')[0]).toBe('Usage: gatewarden <command> [options]');
  });

  it('fails on unknown commands', async () => {
    const { io, stderr } = createIo();

    expect(await runCli(['frobnicate'], io)).toBe(1);
    expect(stderr().split('\n')[0]).toBe('Unknown command: frobnicate');
  });

  it('checks a valid configuration file', async () => {
    const { io, stdout } = createIo();

    expect(await runCli(['config', 'check', defaultFile], io)).toBe(0);
    expect(stdout()).toBe('Configuration OK: gate 1, 2 rule(s), tunnel disabled\n');
  });

  it('lists every issue of an invalid configuration file', async () => {
    const defaults: unknown = JSON.parse(fs.readFileSync(defaultFile, 'utf8'));
    const broken = {
      ...(typeof defaults === 'object' && defaults !== null ? defaults : {}),
      rules: [
        { id: 'same', triggerLabels: ['dog'], action: 'OPEN' },
        { id: 'same', triggerLabels: ['cat'], action: 'CLOSE' }
      ]
    };
    const file = path.join(os.tmpdir(), `gatewarden-cli-${process.pid}.json`);
    fs.writeFileSync(file, JSON.stringify(broken));
    tempFiles.push(file);
    const { io, stderr } = createIo();

    expect(await runCli(['config', 'check', file], io)).toBe(1);
    expect(stderr()).toBe('Configuration invalid:\n  - config.rules[same] duplicates rule id "same"\n');
  });

  it('explains which rules match a set of labels', async () => {
    const { io, stdout } = createIo();

    expect(await runCli(['rules', 'explain', 'Dog', 'cat'], io)).toBe(0);
    expect(JSON.parse(stdout())).toEqual({ labels: ['dog', 'cat'], matched: ['dog-open', 'cat-close'], action: 'CLOSE' });
  });

  it('requires labels to explain', async () => {
    const { io, stderr } = createIo();

    expect(await runCli(['rules', 'explain'], io)).toBe(1);
    expect(stderr()).toBe('Usage: gatewarden rules explain <label...>\n');
  });

  it('reads and changes the log level', async () => {
    const get = createIo();
    expect(await runCli(['log-level', 'get'], get.io)).toBe(0);
    expect(get.stdout()).toBe(`${initialLevel}\n`);

    const set = createIo();
    expect(await runCli(['log-level', 'set', 'DEBUG'], set.io)).toBe(0);
    expect(set.stdout()).toBe('debug\n');
    expect(getLogLevel()).toBe('debug');
  });

  it('rejects unknown log levels', async () => {
    const { io, stderr } = createIo();

    expect(await runCli(['log-level', 'set', 'verbose'], io)).toBe(1);
    expect(stderr()).toBe(
      'Unknown log level "verbose" (available: debug, error, fatal, info, silent, trace, warn)\n'
    );
  });

  it('rejects unknown start targets', async () => {
    const { io, stderr } = createIo();

    expect(await runCli(['start', 'everything'], io)).toBe(1);
    expect(stderr()).toBe('Unknown start target: everything\nExpected "gate" or "dashboard"\n');
  });
});
