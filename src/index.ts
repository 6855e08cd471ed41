// Status model
export type { Status } from './status/status.js';
export { STATUSES, isStatus, parseStatus, restartFlag } from './status/status.js';

// Project store
export { TRACKING_DIR, trackingDir, isInitialized, init, setStatus, readStatus, listMarkers, readMarker } from './projects/store.js';
export type { HistoryEntry, SubmittedEvent } from './projects/history.js';
export { HISTORY_FILE, log, readHistory, parseEntry, historyLine } from './projects/history.js';

// Batch operations
export { listStatus } from './batch/scanner.js';
export type { JobScheduler, SubmissionRecord, SubmitJobsOptions } from './batch/submitter.js';
export { submitJobs, qsubScheduler, formatTimestamp, DEFAULT_JOB_SCRIPT, DEFAULT_SUBMIT_LIMIT } from './batch/submitter.js';

// Scheduler
export type { SubmitScriptOptions, SubmitScriptResult } from './scheduler/qsub.js';
export { submitScript, buildQsubArgs, parseJobId } from './scheduler/qsub.js';

// Errors
export { NotInitializedError, InvalidStatusError, CommandNotFoundError, WorkingDirectoryError, SchedulerError, HistoryParseError } from './errors.js';

// Config
export type { SkongConfig, SchedulerConfig } from './config/schema.js';
export { loadConfig, resetConfigCache } from './config/config.js';
export { DEFAULT_CONFIG } from './config/defaults.js';

// Utils
export { logger, setLogLevel, setLogWriter } from './utils/logger.js';
export type { LogLevel, Logger, LogWriter } from './utils/logger.js';
