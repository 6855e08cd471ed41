import { resolve } from 'node:path';

export class NotInitializedError extends Error {
  readonly path: string;

  constructor(path: string) {
    const abs = resolve(path);
    super(`No .skong directory found in ${abs}. Run 'skong init' first.`);
    this.name = 'NotInitializedError';
    this.path = abs;
  }
}

export class InvalidStatusError extends Error {
  constructor(readonly value: string) {
    super(`Unknown status: ${value}`);
    this.name = 'InvalidStatusError';
  }
}

/** The scheduler binary is not on PATH. Ends a whole submission sweep. */
export class CommandNotFoundError extends Error {
  constructor(readonly command: string) {
    super(`'${command}' not found. Are you on a cluster with PBS installed?`);
    this.name = 'CommandNotFoundError';
  }
}

/** The directory a command was meant to run in has gone away. */
export class WorkingDirectoryError extends Error {
  constructor(readonly cwd: string) {
    super(`Working directory not found: ${cwd}`);
    this.name = 'WorkingDirectoryError';
  }
}

/** The scheduler ran but rejected the job. Only the current directory is affected. */
export class SchedulerError extends Error {
  constructor(message: string, readonly exitCode: number, readonly stderr: string) {
    super(message);
    this.name = 'SchedulerError';
  }
}

export class HistoryParseError extends Error {
  constructor(readonly line: number, message: string) {
    super(`Invalid history entry on line ${line}: ${message}`);
    this.name = 'HistoryParseError';
  }
}
