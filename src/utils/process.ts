import { execFile } from 'node:child_process';
import { stat } from 'node:fs/promises';
import { promisify } from 'node:util';
import { CommandNotFoundError, WorkingDirectoryError } from '../errors.js';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  cwd?: string;
  /** Milliseconds before the child is killed; 0 or unset waits indefinitely */
  timeout?: number;
  env?: Record<string, string>;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Run a command to completion and capture its output.
 *
 * A non-zero exit is reported through `exitCode` rather than thrown.
 * Spawn failures are thrown instead: {@link WorkingDirectoryError} when `cwd`
 * is gone, {@link CommandNotFoundError} when the binary is not on PATH.
 * Node reports both as ENOENT, hence the directory check.
 */
export async function exec(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  try {
    const result = await execFileAsync(command, args, {
      cwd: options?.cwd,
      timeout: options?.timeout,
      env: options?.env ? { ...process.env, ...options.env } : undefined,
      maxBuffer: 10 * 1024 * 1024,
      encoding: 'utf-8',
    });
    return { stdout: result.stdout, stderr: result.stderr, exitCode: 0 };
  } catch (err: unknown) {
    const e = err as { stdout?: string; stderr?: string; code?: number | string };
    if (e.code === 'ENOENT') {
      if (options?.cwd && !(await isDirectory(options.cwd))) {
        throw new WorkingDirectoryError(options.cwd);
      }
      throw new CommandNotFoundError(command);
    }
    return {
      stdout: e.stdout ?? '',
      stderr: e.stderr ?? '',
      exitCode: typeof e.code === 'number' ? e.code : 1,
    };
  }
}
