import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, normalizeConfig, resetConfigCache } from '../../src/config/config.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { setLogLevel } from '../../src/utils/logger.js';

describe('loadConfig', () => {
  let dir: string;
  let globalFile: string;

  beforeEach(async () => {
    setLogLevel('silent');
    resetConfigCache();
    dir = await mkdtemp(join(tmpdir(), 'skong-config-'));
    globalFile = join(dir, 'global.json');
  });

  afterEach(async () => {
    resetConfigCache();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeLocal(content: string): Promise<void> {
    await mkdir(join(dir, '.skong'), { recursive: true });
    await writeFile(join(dir, '.skong', 'config.json'), content);
  }

  it('waits on the scheduler indefinitely by default', () => {
    expect(DEFAULT_CONFIG.scheduler.timeoutMs).toBe(0);
  });

  it('falls back to defaults without config files', async () => {
    const config = await loadConfig({ cwd: dir, globalFile });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('layers local config over global config', async () => {
    await writeFile(globalFile, `{
      // site-wide wrapper around qsub
      scheduler: { command: 'qsub-site' },
      submitLimit: 3,
      jobScript: 'run.pbs',
    }`);
    await writeLocal(`{ submitLimit: 5, logLevel: 'debug' }`);

    const config = await loadConfig({ cwd: dir, globalFile });

    expect(config).toEqual({
      scheduler: { command: 'qsub-site', timeoutMs: 0 },
      jobScript: 'run.pbs',
      submitLimit: 5,
      logLevel: 'debug',
      jsonOutput: false,
    });
  });

  it('ignores a file that does not parse', async () => {
    await writeLocal('{ submitLimit: ');
    expect(await loadConfig({ cwd: dir, globalFile })).toEqual(DEFAULT_CONFIG);
  });

  it('ignores a file that is not an object', async () => {
    await writeFile(globalFile, '[1, 2, 3]');
    expect(await loadConfig({ cwd: dir, globalFile })).toEqual(DEFAULT_CONFIG);
  });

  it('caches the first result until reset', async () => {
    const first = await loadConfig({ cwd: dir, globalFile });
    await writeFile(globalFile, '{ submitLimit: 1 }');
    expect(await loadConfig({ cwd: dir, globalFile })).toBe(first);

    resetConfigCache();
    expect((await loadConfig({ cwd: dir, globalFile })).submitLimit).toBe(1);
  });
});

describe('normalizeConfig', () => {
  it('replaces ill-typed values with defaults', () => {
    const config = normalizeConfig({
      scheduler: { command: '', timeoutMs: -5 },
      jobScript: 42,
      submitLimit: 2.5,
      logLevel: 'loud',
      jsonOutput: 'yes',
    });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('keeps a zero timeout and limit', () => {
    const config = normalizeConfig({ scheduler: { timeoutMs: 0 }, submitLimit: 0 });
    expect(config.scheduler).toEqual({ command: 'qsub', timeoutMs: 0 });
    expect(config.submitLimit).toBe(0);
  });
});
