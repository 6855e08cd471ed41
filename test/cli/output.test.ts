import { describe, it, expect, vi, afterEach } from 'vitest';
import { printError, printInfo, printSuccess, printTable, setJsonOutput } from '../../src/cli/output.js';

describe('output', () => {
  function capture() {
    return {
      stdout: vi.spyOn(console, 'log').mockImplementation(() => {}),
      stderr: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
  }

  afterEach(() => {
    setJsonOutput(false);
    vi.restoreAllMocks();
  });

  it('keeps errors on stderr under --json', () => {
    const { stdout, stderr } = capture();
    setJsonOutput(true);
    printError('No status found.');
    expect(stderr).toHaveBeenCalledWith(JSON.stringify({ status: 'error', message: 'No status found.' }, null, 2));
    expect(stdout).not.toHaveBeenCalled();
  });

  it('keeps errors on stderr in text mode', () => {
    const { stdout, stderr } = capture();
    printError('boom');
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('boom'));
    expect(stdout).not.toHaveBeenCalled();
  });

  it('prints other notices on stdout under --json', () => {
    const { stdout, stderr } = capture();
    setJsonOutput(true);
    printSuccess('Entry logged.');
    printInfo('0 job(s) submitted.');
    expect(stdout.mock.calls).toEqual([
      [JSON.stringify({ status: 'success', message: 'Entry logged.' }, null, 2)],
      [JSON.stringify({ status: 'info', message: '0 job(s) submitted.' }, null, 2)],
    ]);
    expect(stderr).not.toHaveBeenCalled();
  });

  it('prints table rows keyed by header under --json', () => {
    const { stdout } = capture();
    setJsonOutput(true);
    printTable(['Directory', 'Job ID'], [['a', '1'], ['b', '2']]);
    expect(stdout).toHaveBeenCalledWith(JSON.stringify([
      { Directory: 'a', 'Job ID': '1' },
      { Directory: 'b', 'Job ID': '2' },
    ], null, 2));
  });
});
