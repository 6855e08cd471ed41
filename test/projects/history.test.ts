import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { init, trackingDir } from '../../src/projects/store.js';
import { log, readHistory, historyLine, HISTORY_FILE } from '../../src/projects/history.js';
import { HistoryParseError, NotInitializedError } from '../../src/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';

describe('history', () => {
  let dir: string;

  beforeEach(async () => {
    setLogLevel('silent');
    dir = await mkdtemp(join(tmpdir(), 'skong-history-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends one JSON line per call, in order', async () => {
    await init(dir);
    await log({ step: 1, energy: -42.5 }, dir);
    await log({ step: 2 }, dir);
    await log({ note: 'converged' }, dir);

    const content = await readFile(join(trackingDir(dir), HISTORY_FILE), 'utf-8');
    const lines = content.split('\n');
    expect(lines).toEqual([
      '{"step":1,"energy":-42.5}',
      '{"step":2}',
      '{"note":"converged"}',
      '',
    ]);
  });

  it('does not truncate an existing log', async () => {
    await init(dir);
    await writeFile(join(trackingDir(dir), HISTORY_FILE), '{"old":true}\n');
    await log({ new: true }, dir);
    expect(await readHistory(dir)).toEqual([{ old: true }, { new: true }]);
  });

  it('requires initialization', async () => {
    await expect(log({ step: 1 }, dir)).rejects.toBeInstanceOf(NotInitializedError);
  });

  it('reads back what was logged', async () => {
    await init(dir);
    await log({ event: 'started', nested: { a: [1, 2] } }, dir);
    expect(await readHistory(dir)).toEqual([{ event: 'started', nested: { a: [1, 2] } }]);
  });

  it('returns an empty list when nothing was logged', async () => {
    await init(dir);
    expect(await readHistory(dir)).toEqual([]);
  });

  it('skips blank lines', async () => {
    await init(dir);
    await writeFile(join(trackingDir(dir), HISTORY_FILE), '{"a":1}\n\n   \n{"b":2}\n');
    expect(await readHistory(dir)).toEqual([{ a: 1 }, { b: 2 }]);
  });

  it('reports the line of a malformed entry', async () => {
    await init(dir);
    await writeFile(join(trackingDir(dir), HISTORY_FILE), '{"a":1}\nnot json\n');

    const err = await readHistory(dir).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HistoryParseError);
    expect(err).toMatchObject({ line: 2 });
  });

  it('rejects entries that are not objects', async () => {
    await init(dir);
    await writeFile(join(trackingDir(dir), HISTORY_FILE), '[1,2]\n');
    await expect(readHistory(dir)).rejects.toThrow('Invalid history entry on line 1: entry is not a JSON object');
  });

  it('writes text entries as typed so large integers survive', async () => {
    await init(dir);
    await log('{"seed": 12345678901234567890}', dir);
    const content = await readFile(join(trackingDir(dir), HISTORY_FILE), 'utf-8');
    expect(content).toBe('{"seed": 12345678901234567890}\n');
  });

  it('folds a multi-line text entry onto one line', async () => {
    await init(dir);
    await log('{\n  "a": 1\n}', dir);
    const content = await readFile(join(trackingDir(dir), HISTORY_FILE), 'utf-8');
    expect(content).toBe('{   "a": 1 }\n');
    expect(await readHistory(dir)).toEqual([{ a: 1 }]);
  });

  it('refuses text that is not a JSON object', async () => {
    expect(() => historyLine('[1, 2]')).toThrow('Entry must be a JSON object.');
    expect(() => historyLine('{"a": ')).toThrow(/^Invalid JSON: /);
  });

  it('does not touch the log when a text entry is invalid', async () => {
    await init(dir);
    await expect(log('not json', dir)).rejects.toThrow(SyntaxError);
    await expect(readFile(join(trackingDir(dir), HISTORY_FILE), 'utf-8')).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
