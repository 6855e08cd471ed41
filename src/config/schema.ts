import type { LogLevel } from '../utils/logger.js';

export interface SchedulerConfig {
  /** Scheduler binary, looked up on PATH */
  command: string;
  /**
   * Kill a submission that has not returned after this long. 0 waits for the
   * scheduler; a killed qsub may already have queued the job.
   */
  timeoutMs: number;
}

export interface SkongConfig {
  scheduler: SchedulerConfig;
  /** Job script expected in every project directory */
  jobScript: string;
  /** Default number of jobs per `sub` / `continue` sweep */
  submitLimit: number;
  logLevel: LogLevel;
  jsonOutput: boolean;
}
