import type { SkongConfig } from '../config/schema.js';
import { loadConfig } from '../config/config.js';
import { qsubScheduler, type JobScheduler } from '../batch/submitter.js';
import { setLogLevel } from '../utils/logger.js';
import { setJsonOutput } from './output.js';

export interface AppContext {
  config: SkongConfig;
  scheduler: JobScheduler;
}

let cachedContext: AppContext | null = null;

export async function getContext(): Promise<AppContext> {
  if (cachedContext) return cachedContext;

  const config = await loadConfig();
  setLogLevel(config.logLevel);
  if (config.jsonOutput) {
    setJsonOutput(true);
  }

  const scheduler = qsubScheduler({
    command: config.scheduler.command,
    timeoutMs: config.scheduler.timeoutMs,
  });

  cachedContext = { config, scheduler };
  return cachedContext;
}
