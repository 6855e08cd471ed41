import chalk from 'chalk';
import Table from 'cli-table3';
import type { Status } from '../status/status.js';
import {
  CommandNotFoundError,
  HistoryParseError,
  InvalidStatusError,
  NotInitializedError,
  SchedulerError,
  WorkingDirectoryError,
} from '../errors.js';

let jsonMode = false;

export function setJsonOutput(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonOutput(): boolean {
  return jsonMode;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/** Rows keyed by header under --json, a cli-table3 grid otherwise. */
export function printTable(headers: string[], rows: string[][]): void {
  if (jsonMode) {
    printJson(rows.map(row => Object.fromEntries(headers.map((h, i) => [h, row[i]]))));
    return;
  }

  const table = new Table({
    head: headers.map(h => chalk.cyan(h)),
    style: { head: [], border: [] },
  });
  table.push(...rows);
  console.log(table.toString());
}

type Notice = 'success' | 'error' | 'info';

const MARKS: Record<Notice, string> = {
  success: chalk.green('✓ '),
  error: chalk.red('✗ '),
  info: chalk.blue('ℹ '),
};

// Errors go to stderr in both modes.
function notify(kind: Notice, msg: string): void {
  const text = jsonMode
    ? JSON.stringify({ status: kind, message: msg }, null, 2)
    : MARKS[kind] + msg;
  if (kind === 'error') {
    console.error(text);
  } else {
    console.log(text);
  }
}

export function printSuccess(msg: string): void {
  notify('success', msg);
}

export function printError(msg: string): void {
  notify('error', msg);
}

export function printInfo(msg: string): void {
  notify('info', msg);
}

export function statusColor(status: Status): string {
  switch (status) {
    case 'INITIALIZED': return chalk.cyan(status);
    case 'SUBMITTED': return chalk.yellow(status);
    case 'RUNNING': return chalk.blue(status);
    case 'PARTIAL': return chalk.magenta(status);
    case 'DONE': case 'FINISHED': return chalk.green(status);
    case 'FAILED': return chalk.red(status);
    default: {
      const unreachable: never = status;
      return unreachable;
    }
  }
}

/**
 * Report an error raised by the library and mark the process as failed.
 * Errors that are not ours are rethrown for commander to surface.
 */
export function failWith(err: unknown): void {
  if (
    err instanceof NotInitializedError
    || err instanceof InvalidStatusError
    || err instanceof CommandNotFoundError
    || err instanceof SchedulerError
    || err instanceof WorkingDirectoryError
    || err instanceof HistoryParseError
  ) {
    printError(err.message);
    process.exitCode = 1;
    return;
  }
  throw err;
}
