import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { getLogger, initLogger } from '@clientledger/logger';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { configureCliLogging, resolveLogLevel } from '../logging-setup.js';

describe('resolveLogLevel', () => {
  it('should keep the configured level without -v', () => {
    expect(resolveLogLevel(0, 'warn')).toBe('warn');
    expect(resolveLogLevel(0, 'error')).toBe('error');
  });

  it('should raise verbosity with each -v', () => {
    expect(resolveLogLevel(1, 'warn')).toBe('info');
    expect(resolveLogLevel(2, 'warn')).toBe('debug');
    expect(resolveLogLevel(3, 'warn')).toBe('trace');
    expect(resolveLogLevel(5, 'warn')).toBe('trace');
  });
});

describe('configureCliLogging', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'clientledger-logging-'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    initLogger({ sinks: [] });
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should also write entries to the log file', async () => {
    const logFile = path.join(tmpDir, 'logs', 'run.log');

    const logging = configureCliLogging({ verbose: 2, logFile });
    getLogger('logging-test').debug({ client: 1 }, 'opened');
    getLogger('logging-test').trace('hidden');
    logging.close();

    expect(logging.level).toBe('debug');
    const lines = (await fs.readFile(logFile, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'debug',
      category: 'logging-test',
      msg: 'opened',
      context: { client: 1 },
    });
  });

  it('should keep logs off stdout', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write');

    const logging = configureCliLogging({ verbose: 1, logFormat: 'text' });
    getLogger('logging-test').info('hello');
    logging.close();

    expect(stdoutSpy).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
