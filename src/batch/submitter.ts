import { stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { restartFlag, type Status } from '../status/status.js';
import { setStatus } from '../projects/store.js';
import { log, type SubmittedEvent } from '../projects/history.js';
import { submitScript } from '../scheduler/qsub.js';
import { listStatus } from './scanner.js';
import { CommandNotFoundError, SchedulerError, WorkingDirectoryError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_JOB_SCRIPT = 'job.pbs';
export const DEFAULT_SUBMIT_LIMIT = 10;

/** Anything able to enqueue a script from a job directory and hand back its id. */
export interface JobScheduler {
  submit(scriptName: string, options: { cwd: string; restart: 0 | 1 }): Promise<{ jobId: string }>;
}

export interface SubmissionRecord {
  dir: string;
  jobId: string;
  timestamp: string;
}

export interface SubmitJobsOptions {
  limit?: number;
  jobScript?: string;
  path?: string;
  scheduler?: JobScheduler;
  now?: () => Date;
  onSubmitted?: (record: SubmissionRecord) => void;
}

export function qsubScheduler(options?: { command?: string; timeoutMs?: number }): JobScheduler {
  return {
    submit: (scriptName, { cwd, restart }) => submitScript(scriptName, {
      cwd,
      restart,
      command: options?.command,
      timeoutMs: options?.timeoutMs,
    }),
  };
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function submittedMarker(timestamp: string, jobId: string): string {
  return `Timestamp: ${timestamp}\nJob ID: ${jobId}\n`;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Submit every sub-directory of `path` marked `targetStatus`, one at a time
 * and in name order, until `limit` jobs have gone out.
 *
 * Directories without the job script, directories that vanish mid-sweep and
 * rejected submissions are skipped.
 * A missing scheduler binary ends the sweep; whatever was submitted before
 * that point is still returned.
 */
export async function submitJobs(targetStatus: Status, options: SubmitJobsOptions = {}): Promise<SubmissionRecord[]> {
  const path = resolve(options.path ?? process.cwd());
  const jobScript = options.jobScript ?? DEFAULT_JOB_SCRIPT;
  const scheduler = options.scheduler ?? qsubScheduler();
  const now = options.now ?? (() => new Date());
  const restart = restartFlag(targetStatus);
  let remaining = options.limit ?? DEFAULT_SUBMIT_LIMIT;

  const submitted: SubmissionRecord[] = [];
  const candidates = await listStatus(targetStatus, path);
  logger.debug(`${candidates.length} candidate(s) with status ${targetStatus} in ${path}`);

  for (const dir of candidates) {
    if (remaining <= 0) {
      logger.info('Job limit reached. Stopping submission.');
      break;
    }

    const jobLog = logger.scoped(basename(dir));
    if (!(await fileExists(join(dir, jobScript)))) {
      jobLog.warn(`No ${jobScript}. Skipping.`);
      continue;
    }

    let jobId: string;
    try {
      ({ jobId } = await scheduler.submit(basename(jobScript), { cwd: dir, restart }));
    } catch (err) {
      if (err instanceof CommandNotFoundError) {
        logger.error(err.message);
        break;
      }
      if (err instanceof SchedulerError) {
        jobLog.error(`qsub failed: ${err.stderr || err.message}`);
        continue;
      }
      if (err instanceof WorkingDirectoryError) {
        jobLog.warn(`${err.message}. Skipping.`);
        continue;
      }
      throw err;
    }

    const timestamp = formatTimestamp(now());
    await setStatus('SUBMITTED', dir, submittedMarker(timestamp, jobId));
    const event: SubmittedEvent = {
      event: 'submitted',
      job_id: jobId,
      timestamp,
      restart,
      previous_status: targetStatus,
    };
    await log(event, dir);

    jobLog.info(`${jobScript} submitted with ID: ${jobId}`);
    const record = { dir, jobId, timestamp };
    submitted.push(record);
    options.onSubmitted?.(record);
    remaining--;
  }

  return submitted;
}
