import type { SkongConfig } from './schema.js';

export const DEFAULT_CONFIG: SkongConfig = {
  scheduler: {
    command: 'qsub',
    timeoutMs: 0,
  },
  jobScript: 'job.pbs',
  submitLimit: 10,
  logLevel: 'info',
  jsonOutput: false,
};
