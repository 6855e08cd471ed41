import { InvalidStatusError } from '../errors.js';

/**
 * Every status a project can be in, in declaration order.
 *
 * The order matters: when several marker files coexist, `readStatus`
 * reports the first one listed here.
 */
export const STATUSES = [
  'INITIALIZED',
  'FINISHED',
  'RUNNING',
  'DONE',
  'SUBMITTED',
  'FAILED',
  'PARTIAL',
] as const;

export type Status = typeof STATUSES[number];

export function isStatus(value: unknown): value is Status {
  return typeof value === 'string' && (STATUSES as readonly string[]).includes(value);
}

export function parseStatus(value: string): Status {
  if (!isStatus(value)) {
    throw new InvalidStatusError(value);
  }
  return value;
}

/** Restart flag handed to the job script: only partial runs resume. */
export function restartFlag(status: Status): 0 | 1 {
  return status === 'PARTIAL' ? 1 : 0;
}
